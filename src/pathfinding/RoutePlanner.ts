import type { IPosition } from '../world/interfaces/ICoordinates.ts'
import type { IWorldQuery } from '../world/interfaces/IWorldQuery.ts'
import type { CapabilitySet } from '../movement/interfaces/IMovement.ts'
import type { PlanOptions, PlanResult, PlannerConfig } from './interfaces/IPathfinding.ts'
import { DEFAULT_SLIPPERY_RISK_SCALE } from '../movement/constants.ts'
import { DEFAULT_REGION_SIZE, straightLineDistance } from '../world/coordinates/CoordinateUtils.ts'
import { HazardAvoidanceEngine } from '../hazards/HazardAvoidance.ts'
import { NavigationGrid } from './NavigationGrid.ts'
import { RegionRouteSearch } from './RegionRouteSearch.ts'
import { RouteSearch, type ResumableSearch } from './RouteSearch.ts'

export const DEFAULT_PLANNER_CONFIG: PlannerConfig = {
  maxNodes: 20000,
  maxDistance: 256,
  maxRegionTrip: 1600,
  maxFallDistance: 3,
  maxAscent: 6,
  maxBridgeSpan: 6,
  swimThreshold: 4,
  maxLiquidCrossing: 16,
  jumpSuccessProbability: 0.85,
  bridgeSecondsPerCell: 1.5,
  ascentSetupSeconds: 2,
  ascentSecondsPerCell: 1.2,
  stepSecondsPerCell: 0.25,
  fallSecondsPerCell: 0.1,
  vesselBoardingSeconds: 3,
  riskPenaltyWeight: 2,
  slipperyRiskScale: DEFAULT_SLIPPERY_RISK_SCALE,
  regionSize: DEFAULT_REGION_SIZE,
  initialConfidence: 0.5,
  debug: false,
}

/**
 * Produces waypoint paths over a world snapshot.
 */
export class RoutePlanner {
  readonly config: PlannerConfig
  readonly hazardEngine: HazardAvoidanceEngine

  constructor(
    readonly world: IWorldQuery,
    config: Partial<PlannerConfig> = {},
    hazardEngine: HazardAvoidanceEngine = new HazardAvoidanceEngine()
  ) {
    this.config = { ...DEFAULT_PLANNER_CONFIG, ...config }
    this.hazardEngine = hazardEngine
  }

  /**
   * Start a resumable search. Each search reads the world through its own cache,
   * so the world must not change while it runs.
   *
   * Trips longer than `maxDistance` are planned region by region.
   */
  createSearch(
    origin: IPosition,
    destination: IPosition,
    capabilities: CapabilitySet,
    options: PlanOptions = {}
  ): ResumableSearch {
    const grid = new NavigationGrid(this.world)
    if (straightLineDistance(origin, destination) > this.config.maxDistance) {
      return new RegionRouteSearch(grid, origin, destination, capabilities, this.config, this.hazardEngine, options)
    }
    return new RouteSearch(grid, origin, destination, capabilities, this.config, this.hazardEngine, options)
  }

  /**
   * Plan in one go. Blocks the caller until the search finishes.
   */
  plan(
    origin: IPosition,
    destination: IPosition,
    capabilities: CapabilitySet,
    options: PlanOptions = {}
  ): PlanResult {
    const search = this.createSearch(origin, destination, capabilities, options)
    for (;;) {
      const status = search.step()
      if (status.done) return status.result
    }
  }
}
