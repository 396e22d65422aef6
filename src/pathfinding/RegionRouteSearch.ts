import type { IPosition, IRegionCoordinate } from '../world/interfaces/ICoordinates.ts'
import type { Capability, CapabilitySet, MovementMode } from '../movement/interfaces/IMovement.ts'
import type { Path, PlanOptions, PlanResult, PlannerConfig, Waypoint } from './interfaces/IPathfinding.ts'
import type { HazardAvoidanceEngine } from '../hazards/HazardAvoidance.ts'
import { createRegionKey } from '../world/interfaces/ICoordinates.ts'
import { MOVEMENT_MODES } from '../movement/interfaces/IMovement.ts'
import { NoPathFound, type NoPathReason } from '../core/errors.ts'
import { SliceBudget } from '../core/SliceBudget.ts'
import {
  positionKey,
  regionKeyOf,
  samePosition,
  straightLineDistance,
  toRegion,
} from '../world/coordinates/CoordinateUtils.ts'
import { NavigationGrid } from './NavigationGrid.ts'
import { PriorityQueue } from './PriorityQueue.ts'
import { RouteSearch, generatePathId, type ResumableSearch, type SearchStatus } from './RouteSearch.ts'
import { smoothWaypoints } from './PathSmoother.ts'

/** Regions outside the endpoints' bounding box the corridor may detour through */
const REGION_MARGIN = 1

const REGION_NEIGHBOURS: ReadonlyArray<readonly [number, number]> = [
  [1, 0], [-1, 0], [0, 1], [0, -1],
  [1, 1], [1, -1], [-1, 1], [-1, -1],
]

interface RegionNode {
  region: IRegionCoordinate
  g: number
  f: number
  seq: number
  parent: RegionNode | null
}

/**
 * Two-level search for trips longer than one cell search may span.
 *
 * A coarse A* over regions picks a corridor; every region on it contributes one
 * standable anchor cell near its centre. Legs between anchors no further apart
 * than `maxDistance` are then searched cell by cell and stitched into one path.
 * Like RouteSearch it is stepped until done, so the service can slice it.
 */
export class RegionRouteSearch implements ResumableSearch {
  private readonly anchors = new Map<string, IPosition | null>()
  private readonly legs: Path[] = []
  private readonly budget = new SliceBudget()
  private readonly startedAt = performance.now()

  private pending: IPosition[] | null = null
  private legOrigin: IPosition
  private leg: RouteSearch | null = null
  private legNodes = 0
  private seq = 0
  private outcome: PlanResult | null = null

  constructor(
    private readonly grid: NavigationGrid,
    readonly origin: IPosition,
    readonly destination: IPosition,
    private readonly capabilities: CapabilitySet,
    private readonly config: PlannerConfig,
    private readonly hazardEngine: HazardAvoidanceEngine,
    private readonly options: PlanOptions = {}
  ) {
    this.legOrigin = origin
  }

  get explored(): number {
    return this.legNodes + (this.leg?.explored ?? 0)
  }

  /**
   * Number of cell searches the trip has been split into so far.
   */
  get legCount(): number {
    return this.legs.length + (this.leg ? 1 : 0)
  }

  step(budgetMs: number = Infinity): SearchStatus {
    if (this.outcome) return { done: true, result: this.outcome }

    this.budget.open(budgetMs)

    if (this.pending === null) {
      const rejected = this.validateTrip()
      if (rejected) return this.finish(rejected)
      const corridor = this.findCorridor()
      if (!corridor) {
        return this.finish(this.failure('unreachable', 'No corridor of passable regions between endpoints'))
      }
      this.pending = corridor
    }

    for (;;) {
      const leg = this.leg ?? this.nextLeg(this.pending)
      this.leg = leg

      const status = leg.step(Math.max(0, this.budget.remainingMs))
      if (!status.done) return { done: false, nodesExplored: this.explored }

      this.leg = null
      this.legNodes += status.result.nodesExplored
      if (!status.result.success) {
        return this.finish({ success: false, error: status.result.error, nodesExplored: this.legNodes })
      }

      this.legs.push(status.result.path)
      this.legOrigin = leg.destination
      if (samePosition(this.legOrigin, this.destination)) {
        return this.finish({
          success: true,
          path: this.stitch(),
          nodesExplored: this.legNodes,
          fromMemory: false,
        })
      }
      if (!this.budget.hasTimeRemaining()) {
        return { done: false, nodesExplored: this.explored }
      }
    }
  }

  private validateTrip(): PlanResult | null {
    if (!this.grid.isStandable(this.origin)) {
      return this.failure('invalid-endpoint', `Origin ${positionKey(this.origin)} is not standable`)
    }
    if (!this.grid.isStandable(this.destination)) {
      return this.failure('invalid-endpoint', `Destination ${positionKey(this.destination)} is not standable`)
    }
    const distance = straightLineDistance(this.origin, this.destination)
    if (distance > this.config.maxRegionTrip) {
      return this.failure('out-of-range', `Distance ${distance.toFixed(1)} exceeds ${this.config.maxRegionTrip}`)
    }
    return null
  }

  /**
   * Anchors of the regions between the endpoints' regions, then the destination.
   */
  private findCorridor(): IPosition[] | null {
    const size = this.config.regionSize
    const start = toRegion(this.origin, size)
    const goal = toRegion(this.destination, size)
    const minX = Math.min(start.x, goal.x) - REGION_MARGIN
    const maxX = Math.max(start.x, goal.x) + REGION_MARGIN
    const minZ = Math.min(start.z, goal.z) - REGION_MARGIN
    const maxZ = Math.max(start.z, goal.z) + REGION_MARGIN

    const open = new PriorityQueue<RegionNode>((a, b) => a.f - b.f || a.seq - b.seq)
    const closed = new Set<string>()
    const bestCost = new Map<string, number>()
    open.push({ region: start, g: 0, f: Math.hypot(goal.x - start.x, goal.z - start.z), seq: this.seq++, parent: null })

    while (!open.isEmpty()) {
      const current = open.pop()
      if (!current) break

      const key = createRegionKey(current.region.x, current.region.z)
      if (closed.has(key)) continue
      closed.add(key)

      if (current.region.x === goal.x && current.region.z === goal.z) {
        return this.anchorsAlong(current)
      }

      for (const [dx, dz] of REGION_NEIGHBOURS) {
        const next = { x: current.region.x + dx, z: current.region.z + dz }
        if (next.x < minX || next.x > maxX || next.z < minZ || next.z > maxZ) continue

        const nextKey = createRegionKey(next.x, next.z)
        if (closed.has(nextKey)) continue
        const isGoal = next.x === goal.x && next.z === goal.z
        if (!isGoal && this.anchorOf(next) === null) continue

        const g = current.g + Math.hypot(dx, dz)
        const best = bestCost.get(nextKey)
        if (best !== undefined && g >= best) continue
        bestCost.set(nextKey, g)

        open.push({
          region: next,
          g,
          f: g + Math.hypot(goal.x - next.x, goal.z - next.z),
          seq: this.seq++,
          parent: current,
        })
      }
    }

    return null
  }

  private anchorsAlong(goal: RegionNode): IPosition[] {
    const anchors: IPosition[] = [this.destination]
    // the origin's own region contributes no anchor
    for (let node = goal.parent; node !== null && node.parent !== null; node = node.parent) {
      const anchor = this.anchorOf(node.region)
      if (anchor) anchors.unshift(anchor)
    }
    return anchors
  }

  private anchorOf(region: IRegionCoordinate): IPosition | null {
    const key = createRegionKey(region.x, region.z)
    const cached = this.anchors.get(key)
    if (cached !== undefined) return cached

    const anchor = this.scanRegion(region)
    this.anchors.set(key, anchor)
    return anchor
  }

  /**
   * Standable cell nearest the region's centre, looked for within a fall or
   * ascent of the trip's mean height.
   */
  private scanRegion(region: IRegionCoordinate): IPosition | null {
    const size = this.config.regionSize
    const centreX = region.x * size + Math.floor(size / 2)
    const centreZ = region.z * size + Math.floor(size / 2)

    const columns: Array<{ x: number; z: number; distance: number }> = []
    for (let dx = 0; dx < size; dx++) {
      for (let dz = 0; dz < size; dz++) {
        const x = region.x * size + dx
        const z = region.z * size + dz
        columns.push({ x, z, distance: (x - centreX) ** 2 + (z - centreZ) ** 2 })
      }
    }
    columns.sort((a, b) => a.distance - b.distance)

    const base = Math.round((this.origin.y + this.destination.y) / 2)
    const reach = this.config.maxAscent + this.config.maxFallDistance
    for (const column of columns) {
      for (let d = 0; d <= reach; d++) {
        for (const y of d === 0 ? [base] : [base - d, base + d]) {
          const cell = { x: column.x, y, z: column.z }
          if (this.grid.isStandable(cell)) return cell
        }
      }
    }
    return null
  }

  /**
   * Search toward the furthest pending anchor still within one search's range.
   */
  private nextLeg(pending: IPosition[]): RouteSearch {
    let taken = 1
    for (let i = 0; i < pending.length; i++) {
      if (straightLineDistance(this.legOrigin, pending[i]) <= this.config.maxDistance) taken = i + 1
    }
    const target = pending[taken - 1]
    pending.splice(0, taken)

    if (this.config.debug) {
      console.log(`[RegionRouteSearch] leg ${positionKey(this.legOrigin)} -> ${positionKey(target)}`)
    }

    const deadline = this.options.deadlineMs
    return new RouteSearch(this.grid, this.legOrigin, target, this.capabilities, this.config, this.hazardEngine, {
      ...this.options,
      deadlineMs: deadline === undefined ? undefined : Math.max(0, deadline - (performance.now() - this.startedAt)),
    })
  }

  private stitch(): Path {
    const waypoints: Waypoint[] = []
    const capabilities = new Set<Capability>()
    let elapsed = 0
    for (const leg of this.legs) {
      const offset = elapsed
      const joined = waypoints.length === 0 ? leg.waypoints : leg.waypoints.slice(1)
      for (const waypoint of joined) {
        waypoints.push({ ...waypoint, arrivalTime: waypoint.arrivalTime + offset })
      }
      for (const capability of leg.requiredCapabilities) capabilities.add(capability)
      elapsed += leg.timeEstimate
    }

    const smoothed = smoothWaypoints(waypoints)
    const modeSequence: MovementMode[] = []
    for (const waypoint of smoothed) {
      if (modeSequence[modeSequence.length - 1] !== waypoint.mode) {
        modeSequence.push(waypoint.mode)
      }
    }

    const requiredCapabilities = MOVEMENT_MODES.filter((mode) => capabilities.has(mode))
    const first = this.legs[0]
    return {
      ...first,
      id: generatePathId(),
      originRegion: regionKeyOf(this.origin, this.config.regionSize),
      destinationRegion: regionKeyOf(this.destination, this.config.regionSize),
      waypoints: smoothed,
      modeSequence,
      timeEstimate: elapsed,
      requiredCapabilities: capabilities.has('build') ? [...requiredCapabilities, 'build'] : requiredCapabilities,
    }
  }

  private failure(reason: NoPathReason, message: string): PlanResult {
    return { success: false, error: new NoPathFound(reason, message), nodesExplored: this.legNodes }
  }

  private finish(result: PlanResult): SearchStatus {
    this.outcome = result
    if (this.config.debug) {
      const summary = result.success
        ? `found ${result.path.id} over ${this.legs.length} legs`
        : `failed (${result.error.reason})`
      console.log(`[RegionRouteSearch] ${positionKey(this.origin)} -> ${positionKey(this.destination)}: ${summary}, nodes: ${this.legNodes}`)
    }
    return { done: true, result }
  }
}
