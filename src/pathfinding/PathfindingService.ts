/**
 * Service for managing route searches and the request queue.
 * Checks path memory first, then plans in time slices so a long search never
 * stalls other agents' ticks.
 */

import type { IPosition } from '../world/interfaces/ICoordinates.ts'
import type { CapabilitySet } from '../movement/interfaces/IMovement.ts'
import type { ClearanceConstraint, HazardRecord } from '../hazards/interfaces/IHazard.ts'
import type { Path, PlanResult } from './interfaces/IPathfinding.ts'
import type { RoutePlanner } from './RoutePlanner.ts'
import type { PathMemoryStore } from '../memory/PathMemoryStore.ts'
import { NoPathFound, type NoPathReason } from '../core/errors.ts'
import { SliceBudget } from '../core/SliceBudget.ts'
import { mergeConstraints } from '../hazards/HazardAvoidance.ts'
import { HazardRegistry, mergeHazards } from '../hazards/HazardRegistry.ts'
import { samePosition, straightLineDistance } from '../world/coordinates/CoordinateUtils.ts'

/**
 * Callback function called when a request completes.
 */
export type PathCallback = (result: PlanResult) => void

export interface PathRequestOptions {
  /** Aborting resolves the request as NoPathFound('cancelled') */
  signal?: AbortSignal
  /** Higher priority requests are started first (default: 0) */
  priority?: number
  /** Overrides the service deadline for this request */
  deadlineMs?: number
  /** Skip path memory and always search */
  bypassMemory?: boolean
  /** Neither read nor record path memory (formation sub-paths) */
  transient?: boolean
}

/**
 * A queued request.
 */
interface PathJob {
  requestId: string
  origin: IPosition
  destination: IPosition
  capabilities: CapabilitySet
  options: PathRequestOptions
  callback: PathCallback
  priority: number
  sequence: number
  controller: AbortController
  detach: () => void
  settled: boolean
}

/**
 * Configuration for the pathfinding service.
 */
export interface PathfindingServiceConfig {
  /** Searches allowed to run at once (default: 2) */
  maxConcurrentSearches: number
  /** Milliseconds of search per slice before yielding (default: 4) */
  sliceBudgetMs: number
  /** Wall-clock budget per request (default: 500) */
  planningDeadlineMs: number
  /** Searches after the first when the hazard filter asks for a reroute (default: 4) */
  maxRerouteIterations: number
  /** Extra radius around the trip when gathering hazards (default: 16) */
  searchMargin: number
  /** Enable debug logging (default: false) */
  debug: boolean
}

export const DEFAULT_SERVICE_CONFIG: PathfindingServiceConfig = {
  maxConcurrentSearches: 2,
  sliceBudgetMs: 4,
  planningDeadlineMs: 500,
  maxRerouteIterations: 4,
  searchMargin: 16,
  debug: false,
}

export interface PathfindingStats {
  queued: number
  processing: number
  completed: number
  failed: number
  memoryHits: number
  reroutes: number
}

export class PathfindingService {
  readonly config: PathfindingServiceConfig

  private readonly jobQueue: PathJob[] = []
  private readonly runningJobs = new Map<string, PathJob>()
  private readonly budget: SliceBudget
  private nextRequestId = 0
  private nextSequence = 0
  private tick = 0
  private disposed = false

  private completed = 0
  private failed = 0
  private memoryHits = 0
  private reroutes = 0

  constructor(
    private readonly planner: RoutePlanner,
    private readonly memory: PathMemoryStore,
    readonly hazardRegistry: HazardRegistry = new HazardRegistry(),
    config: Partial<PathfindingServiceConfig> = {}
  ) {
    this.config = { ...DEFAULT_SERVICE_CONFIG, ...config }
    this.budget = new SliceBudget(this.config.sliceBudgetMs)

    if (this.config.debug) {
      console.log(`PathfindingService initialized with ${this.config.maxConcurrentSearches} search slots`)
    }
  }

  /**
   * Request a path; the callback fires exactly once, also on cancellation.
   *
   * @returns Request ID that can be used to cancel the request
   */
  findPath(
    origin: IPosition,
    destination: IPosition,
    capabilities: CapabilitySet,
    callback: PathCallback,
    options: PathRequestOptions = {}
  ): string {
    const requestId = this.generateRequestId()
    const controller = new AbortController()

    const onAbort = (): void => {
      this.cancel(requestId)
    }
    options.signal?.addEventListener('abort', onAbort, { once: true })

    const job: PathJob = {
      requestId,
      origin,
      destination,
      capabilities,
      options,
      callback,
      priority: options.priority ?? 0,
      sequence: this.nextSequence++,
      controller,
      detach: () => options.signal?.removeEventListener('abort', onAbort),
      settled: false,
    }

    if (this.disposed || options.signal?.aborted) {
      this.complete(job, this.failure('cancelled', 'Request cancelled before start'))
      return requestId
    }

    this.jobQueue.push(job)
    this.sortQueue()
    this.processQueue()

    if (this.config.debug) {
      console.log(`Queued path request ${requestId} with priority ${job.priority}`)
    }

    return requestId
  }

  /**
   * Promise form of `findPath`.
   */
  requestPath(
    origin: IPosition,
    destination: IPosition,
    capabilities: CapabilitySet,
    options: PathRequestOptions = {}
  ): Promise<PlanResult> {
    return new Promise((resolve) => {
      this.findPath(origin, destination, capabilities, resolve, options)
    })
  }

  /**
   * Cancel a request. Queued requests complete immediately; running searches stop
   * at their next checkpoint. Either way the result is NoPathFound('cancelled').
   *
   * @returns true if the request was found
   */
  cancel(requestId: string): boolean {
    const queueIndex = this.jobQueue.findIndex((job) => job.requestId === requestId)
    if (queueIndex !== -1) {
      const [job] = this.jobQueue.splice(queueIndex, 1)
      this.complete(job, this.failure('cancelled', 'Request cancelled while queued'))
      if (this.config.debug) {
        console.log(`Cancelled queued request ${requestId}`)
      }
      return true
    }

    const running = this.runningJobs.get(requestId)
    if (running) {
      running.controller.abort()
      if (this.config.debug) {
        console.log(`Cancelled running request ${requestId}`)
      }
      return true
    }

    return false
  }

  /**
   * Forward a waypoint failure to path memory.
   */
  async invalidateWaypoint(pathId: string, waypointIndex: number): Promise<void> {
    await this.memory.invalidate(pathId, waypointIndex)
  }

  /**
   * Current simulation tick, used to expire injected hazards.
   */
  setTick(tick: number): void {
    this.tick = tick
    this.hazardRegistry.expire(tick)
  }

  /**
   * Hazards within `radius` of a point, world and injected combined.
   */
  hazardsNear(position: IPosition, radius: number): HazardRecord[] {
    return mergeHazards(
      this.planner.world.hazardsNear(position, radius),
      this.hazardRegistry.near(position, radius, this.tick)
    )
  }

  /**
   * Hazards that could touch any segment of a path.
   */
  hazardsAlong(path: Path): HazardRecord[] {
    const waypoints = path.waypoints
    const lists: HazardRecord[][] = []
    for (let i = 1; i < waypoints.length; i++) {
      const a = waypoints[i - 1].position
      const b = waypoints[i].position
      const midpoint = { x: (a.x + b.x) / 2, y: (a.y + b.y) / 2, z: (a.z + b.z) / 2 }
      lists.push(this.hazardsNear(midpoint, straightLineDistance(a, b) / 2 + this.config.searchMargin))
    }
    return mergeHazards(...lists)
  }

  getStats(): PathfindingStats {
    return {
      queued: this.jobQueue.length,
      processing: this.runningJobs.size,
      completed: this.completed,
      failed: this.failed,
      memoryHits: this.memoryHits,
      reroutes: this.reroutes,
    }
  }

  /**
   * Cancel everything and refuse further requests.
   */
  dispose(): void {
    this.disposed = true
    for (const job of this.jobQueue.splice(0)) {
      this.complete(job, this.failure('cancelled', 'Service disposed'))
    }
    for (const job of this.runningJobs.values()) {
      job.controller.abort()
    }

    if (this.config.debug) {
      console.log('PathfindingService disposed')
    }
  }

  private generateRequestId(): string {
    return `pf-${++this.nextRequestId}-${Date.now()}`
  }

  /**
   * Sort the queue by priority (higher first), then by arrival (older first).
   */
  private sortQueue(): void {
    this.jobQueue.sort((a, b) => {
      if (a.priority !== b.priority) {
        return b.priority - a.priority
      }
      return a.sequence - b.sequence
    })
  }

  private processQueue(): void {
    while (this.jobQueue.length > 0 && this.runningJobs.size < this.config.maxConcurrentSearches) {
      const job = this.jobQueue.shift()
      if (!job) break
      this.runningJobs.set(job.requestId, job)

      this.run(job)
        .then((result) => this.complete(job, result))
        .catch((err: unknown) => {
          console.error(`Path request ${job.requestId} failed:`, err)
          this.complete(job, this.failure('unreachable', err instanceof Error ? err.message : String(err)))
        })
    }
  }

  private complete(job: PathJob, result: PlanResult): void {
    if (job.settled) return
    job.settled = true
    job.detach()
    this.runningJobs.delete(job.requestId)

    if (result.success) {
      this.completed++
      if (result.fromMemory) this.memoryHits++
    } else {
      this.failed++
    }

    if (this.config.debug) {
      console.log(
        `Path request ${job.requestId} done: ` +
        `${result.success ? `found ${result.path.id}` : `failed (${result.error.reason})`}, ` +
        `nodes: ${result.nodesExplored}`
      )
    }

    job.callback(result)
    this.processQueue()
  }

  private async run(job: PathJob): Promise<PlanResult> {
    const { origin, destination, capabilities, options } = job
    const engine = this.planner.hazardEngine

    if (!options.bypassMemory && !options.transient) {
      const cached = this.fromMemory(job)
      if (cached) return cached
    }

    const deadlineMs = options.deadlineMs ?? this.config.planningDeadlineMs
    const startedAt = performance.now()
    const midpoint = {
      x: (origin.x + destination.x) / 2,
      y: (origin.y + destination.y) / 2,
      z: (origin.z + destination.z) / 2,
    }
    let hazards = this.hazardsNear(
      midpoint,
      straightLineDistance(origin, destination) / 2 + this.config.searchMargin
    )

    const blocked = engine.endpointViolation(origin, destination, hazards)
    if (blocked) {
      return this.failure('hazard-rejected', blocked.message)
    }

    let constraints: ClearanceConstraint[] = []
    let nodesExplored = 0

    for (let iteration = 0; iteration <= this.config.maxRerouteIterations; iteration++) {
      const search = this.planner.createSearch(origin, destination, capabilities, {
        signal: job.controller.signal,
        deadlineMs: Math.max(0, deadlineMs - (performance.now() - startedAt)),
        hazards,
        constraints,
      })

      let status = search.step(this.config.sliceBudgetMs)
      while (!status.done) {
        await this.budget.handOff()
        status = search.step(this.config.sliceBudgetMs)
      }

      const result = status.result
      nodesExplored += result.nodesExplored
      if (!result.success) {
        return { ...result, nodesExplored }
      }

      const alongPath = this.hazardsAlong(result.path)
      const verdict = engine.filter(result.path, alongPath, constraints)
      if (verdict.verdict === 'accept') {
        if (options.transient) {
          return { success: true, path: result.path, nodesExplored, fromMemory: false }
        }
        const recorded = await this.memory.record(result.path)
        return { success: true, path: recorded, nodesExplored, fromMemory: false }
      }
      if (verdict.verdict === 'reject') {
        return this.failure('hazard-rejected', verdict.error.message, nodesExplored)
      }

      this.reroutes++
      // a detour can reach hazards outside the first gathering radius
      hazards = mergeHazards(hazards, alongPath)
      constraints = mergeConstraints(constraints, verdict.constraints)
      if (this.config.debug) {
        console.log(`Path request ${job.requestId} rerouting (${verdict.reason}), ${constraints.length} constraint(s)`)
      }
    }

    return this.failure(
      'hazard-rejected',
      `No hazard-clear route after ${this.config.maxRerouteIterations} reroutes`,
      nodesExplored
    )
  }

  /**
   * A fresh cached path with the same endpoints that still passes the hazard filter.
   */
  private fromMemory(job: PathJob): PlanResult | null {
    const engine = this.planner.hazardEngine
    for (const path of this.memory.lookup(job.origin, job.destination, job.capabilities)) {
      if (path.status !== 'fresh') continue

      const waypoints = path.waypoints
      if (
        waypoints.length === 0 ||
        !samePosition(waypoints[0].position, job.origin) ||
        !samePosition(waypoints[waypoints.length - 1].position, job.destination)
      ) {
        continue
      }

      if (engine.filter(path, this.hazardsAlong(path)).verdict === 'accept') {
        return { success: true, path, nodesExplored: 0, fromMemory: true }
      }
    }
    return null
  }

  private failure(reason: NoPathReason, message: string, nodesExplored: number = 0): PlanResult {
    return { success: false, error: new NoPathFound(reason, message), nodesExplored }
  }
}
