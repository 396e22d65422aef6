export type {
  EdgeKind,
  PathStatus,
  Waypoint,
  Path,
  PlanResult,
  PlanOptions,
  PlannerConfig,
} from './interfaces/IPathfinding.ts'
export { RoutePlanner, DEFAULT_PLANNER_CONFIG } from './RoutePlanner.ts'
export { RouteSearch, generatePathId, type ResumableSearch, type SearchStatus } from './RouteSearch.ts'
export { RegionRouteSearch } from './RegionRouteSearch.ts'
export { NavigationGrid, type StandKind } from './NavigationGrid.ts'
export { EdgeExpander, requiredCapabilities, type Edge } from './EdgeExpander.ts'
export { smoothWaypoints } from './PathSmoother.ts'
export { PriorityQueue } from './PriorityQueue.ts'
export {
  PathfindingService,
  DEFAULT_SERVICE_CONFIG,
  type PathCallback,
  type PathRequestOptions,
  type PathfindingServiceConfig,
  type PathfindingStats,
} from './PathfindingService.ts'
