import type { IPosition } from '../world/interfaces/ICoordinates.ts'
import type { CapabilitySet, MovementMode } from '../movement/interfaces/IMovement.ts'
import type { ClearanceConstraint, HazardRecord } from '../hazards/interfaces/IHazard.ts'
import type { Path, PlanOptions, PlanResult, PlannerConfig, Waypoint } from './interfaces/IPathfinding.ts'
import type { HazardAvoidanceEngine } from '../hazards/HazardAvoidance.ts'
import { NoPathFound, type NoPathReason } from '../core/errors.ts'
import { SliceBudget } from '../core/SliceBudget.ts'
import { clearanceTo } from '../hazards/HazardVolume.ts'
import {
  positionKey,
  regionKeyOf,
  samePosition,
  straightLineDistance,
} from '../world/coordinates/CoordinateUtils.ts'
import { EdgeExpander, requiredCapabilities, type Edge } from './EdgeExpander.ts'
import { NavigationGrid } from './NavigationGrid.ts'
import { PriorityQueue } from './PriorityQueue.ts'
import { smoothWaypoints } from './PathSmoother.ts'

/** Deadline and cancellation are checked every this many expansions */
const CHECK_INTERVAL = 32

const EPSILON = 1e-9

/**
 * A node in the A* search.
 */
interface SearchNode {
  pos: IPosition
  /** Weighted cost from start (time plus penalties) */
  g: number
  f: number
  /** Unweighted seconds from start */
  time: number
  /** Seconds spent inside dangerous hazard volumes */
  exposure: number
  /** Number of movement mode changes so far */
  transitions: number
  /** Insertion order, last tie-breaker */
  seq: number
  edge: Edge | null
  parent: SearchNode | null
}

/**
 * Lower f first, then lower exposure, fewer transitions, shorter time, insertion order.
 */
function compareNodes(a: SearchNode, b: SearchNode): number {
  if (Math.abs(a.f - b.f) > EPSILON) return a.f - b.f
  if (Math.abs(a.exposure - b.exposure) > EPSILON) return a.exposure - b.exposure
  if (a.transitions !== b.transitions) return a.transitions - b.transitions
  if (Math.abs(a.time - b.time) > EPSILON) return a.time - b.time
  return a.seq - b.seq
}

export type SearchStatus = { done: false; nodesExplored: number } | { done: true; result: PlanResult }

/**
 * A search that is advanced in slices until it reports `done`.
 */
export interface ResumableSearch {
  readonly explored: number
  step(budgetMs?: number): SearchStatus
}

let nextPathId = 0

export function generatePathId(): string {
  return `path-${++nextPathId}-${Date.now().toString(36)}`
}

/**
 * Resumable A* over standable cells.
 *
 * Call `step()` repeatedly until it reports `done`. Each call works for at most
 * `budgetMs` so a caller can interleave searches with other agents' ticks.
 */
export class RouteSearch implements ResumableSearch {
  private readonly grid: NavigationGrid
  private readonly expander: EdgeExpander
  private readonly open = new PriorityQueue<SearchNode>(compareNodes)
  private readonly closed = new Set<string>()
  private readonly bestCost = new Map<string, number>()
  private readonly hazards: readonly HazardRecord[]
  private readonly constraints: readonly ClearanceConstraint[]
  private readonly budget = new SliceBudget()
  private readonly startedAt = performance.now()

  private nodesExplored = 0
  private seq = 0
  private started = false
  private outcome: PlanResult | null = null

  constructor(
    world: NavigationGrid,
    readonly origin: IPosition,
    readonly destination: IPosition,
    capabilities: CapabilitySet,
    private readonly config: PlannerConfig,
    private readonly hazardEngine: HazardAvoidanceEngine,
    private readonly options: PlanOptions = {}
  ) {
    this.grid = world
    this.expander = new EdgeExpander(world, capabilities, config)
    this.hazards = options.hazards ?? []
    this.constraints = options.constraints ?? []
  }

  get explored(): number {
    return this.nodesExplored
  }

  /**
   * Advance the search for up to `budgetMs` milliseconds.
   */
  step(budgetMs: number = Infinity): SearchStatus {
    if (this.outcome) return { done: true, result: this.outcome }

    this.budget.open(budgetMs)

    if (!this.started) {
      this.started = true
      const rejected = this.validateEndpoints()
      if (rejected) return this.finish(rejected)
      this.open.push(this.createNode(this.origin, 0, 0, 0, 0, null, null))
    }

    let iterations = 0
    while (!this.open.isEmpty()) {
      if (iterations++ % CHECK_INTERVAL === 0) {
        const interrupted = this.checkInterrupts()
        if (interrupted) return this.finish(interrupted)
        if (iterations > 1 && !this.budget.hasTimeRemaining()) {
          return { done: false, nodesExplored: this.nodesExplored }
        }
      }

      const current = this.open.pop()
      if (!current) break

      const key = positionKey(current.pos)
      if (this.closed.has(key)) continue
      this.closed.add(key)
      this.nodesExplored++

      if (samePosition(current.pos, this.destination)) {
        return this.finish({
          success: true,
          path: this.buildPath(current),
          nodesExplored: this.nodesExplored,
          fromMemory: false,
        })
      }

      if (this.nodesExplored >= this.config.maxNodes) {
        return this.finish(this.failure('node-limit', `Node limit ${this.config.maxNodes} reached`))
      }

      this.expandNode(current)
    }

    return this.finish(this.failure('unreachable', 'No traversable route between endpoints'))
  }

  private expandNode(current: SearchNode): void {
    for (const edge of this.expander.expand(current.pos)) {
      const key = positionKey(edge.to)
      if (this.closed.has(key)) continue

      const score = this.hazardEngine.scoreEdge(current.pos, edge.to, edge.time, this.hazards, this.constraints)
      if (score.blockedBy) continue

      const penalty =
        this.hazardEngine.exposurePenalty(score.exposureSeconds) +
        edge.time * edge.risk * this.config.riskPenaltyWeight
      const g = current.g + edge.time + penalty

      const best = this.bestCost.get(key)
      if (best !== undefined && g > best + EPSILON) continue
      if (best === undefined || g < best) this.bestCost.set(key, g)

      const previousMode: MovementMode | null = current.edge?.mode ?? null
      const transitions = current.transitions + (previousMode !== null && previousMode !== edge.mode ? 1 : 0)

      this.open.push(
        this.createNode(
          edge.to,
          g,
          current.time + edge.time,
          current.exposure + score.exposureSeconds,
          transitions,
          edge,
          current
        )
      )
    }
  }

  private createNode(
    pos: IPosition,
    g: number,
    time: number,
    exposure: number,
    transitions: number,
    edge: Edge | null,
    parent: SearchNode | null
  ): SearchNode {
    return {
      pos,
      g,
      f: g + this.heuristic(pos),
      time,
      exposure,
      transitions,
      seq: this.seq++,
      edge,
      parent,
    }
  }

  /**
   * Straight-line time at the speed ceiling. Never overestimates.
   */
  private heuristic(pos: IPosition): number {
    return straightLineDistance(pos, this.destination) / this.expander.speedCeiling
  }

  private validateEndpoints(): PlanResult | null {
    if (this.expander.speedCeiling <= 0) {
      return this.failure('invalid-endpoint', 'Agent has no movement mode')
    }
    if (!this.grid.isStandable(this.origin)) {
      return this.failure('invalid-endpoint', `Origin ${positionKey(this.origin)} is not standable`)
    }
    if (!this.grid.isStandable(this.destination)) {
      return this.failure('invalid-endpoint', `Destination ${positionKey(this.destination)} is not standable`)
    }
    const distance = straightLineDistance(this.origin, this.destination)
    if (distance > this.config.maxDistance) {
      return this.failure('out-of-range', `Distance ${distance.toFixed(1)} exceeds ${this.config.maxDistance}`)
    }
    return null
  }

  private checkInterrupts(): PlanResult | null {
    if (this.options.signal?.aborted) {
      return this.failure('cancelled', 'Search cancelled')
    }
    const deadline = this.options.deadlineMs
    if (deadline !== undefined && performance.now() - this.startedAt > deadline) {
      return this.failure('timeout', `Search exceeded ${deadline}ms`)
    }
    return null
  }

  private failure(reason: NoPathReason, message: string): PlanResult {
    return { success: false, error: new NoPathFound(reason, message), nodesExplored: this.nodesExplored }
  }

  private finish(result: PlanResult): SearchStatus {
    this.outcome = result
    if (this.config.debug) {
      const summary = result.success
        ? `found ${result.path.id}, ${result.path.waypoints.length} waypoints, ${result.path.timeEstimate.toFixed(2)}s`
        : `failed (${result.error.reason})`
      console.log(`[RouteSearch] ${positionKey(this.origin)} -> ${positionKey(this.destination)}: ${summary}, nodes: ${this.nodesExplored}`)
    }
    return { done: true, result }
  }

  private buildPath(goal: SearchNode): Path {
    const chain: SearchNode[] = []
    let current: SearchNode | null = goal
    while (current !== null) {
      chain.unshift(current)
      current = current.parent
    }

    const edges: Edge[] = []
    for (const node of chain) {
      if (node.edge) edges.push(node.edge)
    }

    const startMode = edges[0]?.mode ?? 'walk'
    const waypoints: Waypoint[] = chain.map((node) => ({
      position: node.pos,
      terrainFactor: node.edge?.terrainFactor ?? 1,
      hazardRefs: this.hazardRefsAt(node.pos),
      edge: node.edge?.kind ?? 'start',
      mode: node.edge?.mode ?? startMode,
      arrivalTime: node.time,
    }))

    const smoothed = smoothWaypoints(waypoints)
    const modeSequence: MovementMode[] = []
    for (const waypoint of smoothed) {
      if (modeSequence[modeSequence.length - 1] !== waypoint.mode) {
        modeSequence.push(waypoint.mode)
      }
    }

    const now = this.options.now ?? Date.now()
    return {
      id: generatePathId(),
      originRegion: regionKeyOf(this.origin, this.config.regionSize),
      destinationRegion: regionKeyOf(this.destination, this.config.regionSize),
      waypoints: smoothed,
      modeSequence,
      timeEstimate: goal.time,
      confidenceRating: this.config.initialConfidence,
      createdAt: now,
      lastValidatedAt: now,
      status: 'fresh',
      requiredCapabilities: requiredCapabilities(edges),
      verifiedThrough: -1,
      version: 1,
    }
  }

  private hazardRefsAt(position: IPosition): string[] {
    return this.hazards
      .filter((hazard) => clearanceTo(position, hazard) === 0)
      .map((hazard) => hazard.id)
      .sort()
  }
}
