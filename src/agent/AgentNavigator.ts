import * as THREE from 'three'
import type { IPosition } from '../world/interfaces/ICoordinates.ts'
import type { CapabilitySet } from '../movement/interfaces/IMovement.ts'
import type { Path, PlanResult } from '../pathfinding/interfaces/IPathfinding.ts'
import type { PathfindingService } from '../pathfinding/PathfindingService.ts'
import type { PathMemoryStore } from '../memory/PathMemoryStore.ts'
import type { LeaseRelease } from '../memory/interfaces/IPathMemory.ts'
import type {
  AgentNavState,
  RecoveryAction,
  RecoveryConfig,
  RecoveryStats,
  StuckDetectorConfig,
} from '../recovery/interfaces/IRecovery.ts'
import type { IMotionController, MotionSegment, ProgressEvent } from './interfaces/IMotionController.ts'
import type { AssistanceRequest } from '../coordination/interfaces/ICoordination.ts'
import { TaskPriority, type ITask, type ITaskResult } from '../core/interfaces/ITask.ts'
import { AgentEscalated, NoPathFound, StuckTimeout } from '../core/errors.ts'
import { RecoveryStateMachine } from '../recovery/RecoveryStateMachine.ts'
import { StuckDetector } from '../recovery/StuckDetector.ts'
import { facingBetween, fromVector3, toCell, toVector3 } from '../world/coordinates/CoordinateUtils.ts'

const UP = new THREE.Vector3(0, 1, 0)

/**
 * Callbacks an agent raises toward its mission and telemetry.
 */
export interface AgentNavigatorHooks {
  onStuck?(error: StuckTimeout): void
  onEscalated?(error: AgentEscalated): void
  onAssistance?(agentId: string, position: IPosition): void
  onArrived?(agentId: string, destination: IPosition): void
  onNoPath?(agentId: string, error: NoPathFound): void
}

export interface AgentNavigatorOptions {
  agentId: string
  capabilities: CapabilitySet
  position: IPosition
  motion: IMotionController
  service: PathfindingService
  memory: PathMemoryStore
  recovery?: Partial<RecoveryConfig>
  stuck?: Partial<StuckDetectorConfig>
  /** Mission abort signal; observed at the start of every tick */
  signal?: AbortSignal
  hooks?: AgentNavigatorHooks
  debug?: boolean
}

type SegmentKind = 'route' | 'recovery'

/**
 * Per-agent navigation task.
 *
 * Consumes motion progress events (deduplicated by sequence number), feeds the
 * stuck machine, carries out recovery steps and keeps path memory informed of
 * how traversals went.
 */
export class AgentNavigator implements ITask {
  readonly id: string
  readonly priority = TaskPriority.HIGH
  /** Held back for budget at most two ticks in a row */
  readonly maxDeferredTicks = 2
  enabled = true

  readonly agentId: string
  readonly capabilities: CapabilitySet
  readonly machine: RecoveryStateMachine

  private readonly motion: IMotionController
  private readonly service: PathfindingService
  private readonly memory: PathMemoryStore
  private readonly debug: boolean
  private hooks: AgentNavigatorHooks
  private signal: AbortSignal | undefined

  private position: IPosition
  private destination: IPosition | null = null
  private path: Path | null = null
  private nextIndex = 0
  private release: LeaseRelease | null = null
  private lastGoodPathId: string | null = null
  /** Whether the current destination is a formation slot rather than a goal */
  private following = false
  /** Whether the current path lives in path memory */
  private tracked = true

  private segment: MotionSegment | null = null
  private segmentKind: SegmentKind = 'route'
  private segmentCounter = 0
  private commandOutstanding = false
  private blocked = false
  private blockedIndex = 0
  private pendingRequest: string | null = null
  private requestToken = 0
  private pace = 1
  private arrived = false
  private noPath: NoPathFound | null = null

  private readonly inbox: ProgressEvent[] = []
  private readonly received: AssistanceRequest[] = []
  private lastSeq = -1
  private readonly unsubscribe: () => void

  constructor(options: AgentNavigatorOptions) {
    this.agentId = options.agentId
    this.id = `agent:${options.agentId}`
    this.capabilities = options.capabilities
    this.position = options.position
    this.motion = options.motion
    this.service = options.service
    this.memory = options.memory
    this.signal = options.signal
    this.hooks = options.hooks ?? {}
    this.debug = options.debug ?? false
    this.machine = new RecoveryStateMachine(
      options.agentId,
      { ...options.recovery, debug: options.debug ?? false },
      new StuckDetector(options.stuck)
    )
    this.unsubscribe = this.motion.subscribe(this.agentId, (event) => this.inbox.push(event))
  }

  get currentPosition(): IPosition {
    return this.position
  }

  get currentPath(): Path | null {
    return this.path
  }

  /** Index of the waypoint the agent is heading for on its current path */
  get nextWaypointIndex(): number {
    return this.nextIndex
  }

  get state(): AgentNavState {
    return this.machine.state
  }

  get hasArrived(): boolean {
    return this.arrived
  }

  get isPlanning(): boolean {
    return this.pendingRequest !== null
  }

  get lastNoPath(): NoPathFound | null {
    return this.noPath
  }

  get lastGoodPath(): string | null {
    return this.lastGoodPathId
  }

  get currentDestination(): IPosition | null {
    return this.destination
  }

  get recoveryStats(): RecoveryStats {
    return this.machine.getStats()
  }

  /** Assistance requests other agents have broadcast to this one */
  get assistanceRequests(): readonly AssistanceRequest[] {
    return this.received
  }

  /**
   * Rebind to a mission: its abort signal and hooks.
   */
  attach(signal: AbortSignal | undefined, hooks: AgentNavigatorHooks): void {
    this.signal = signal
    this.hooks = hooks
  }

  /**
   * Plan to `destination` and start moving once a path comes back.
   */
  navigateTo(destination: IPosition): void {
    this.assertActive()
    this.destination = toCell(destination)
    this.arrived = false
    this.noPath = null
    this.following = false
    this.requestRoute(false)
  }

  /**
   * Plan a sub-path to a formation slot. The agent keeps to its current route
   * until the new one comes back; slot routes stay out of path memory.
   */
  follow(slot: IPosition): void {
    this.assertActive()
    if (this.machine.state === 'escalated') return
    this.destination = toCell(slot)
    this.arrived = false
    this.noPath = null
    this.following = true
    this.requestRoute(false)
  }

  /**
   * Another agent on the mission asked for help.
   */
  receiveAssistance(request: AssistanceRequest): void {
    if (request.agentId === this.agentId) return
    this.received.push(request)
    if (this.debug) {
      console.log(`[AgentNavigator] ${this.agentId} received assistance request from ${request.agentId}`)
    }
  }

  setPace(pace: number): void {
    this.pace = pace
    if (this.commandOutstanding) {
      this.motion.setPace(this.agentId, pace)
    }
  }

  /**
   * Stop moving and drop the current plan.
   */
  halt(): void {
    this.cancelRequest()
    this.motion.cancel(this.agentId)
    this.commandOutstanding = false
    this.segment = null
    this.releasePath()
    this.machine.settle()
  }

  /**
   * One-way: cancel everything and ignore further commands.
   */
  abort(): void {
    if (this.machine.state === 'aborted') return
    this.cancelRequest()
    this.motion.cancel(this.agentId)
    this.commandOutstanding = false
    this.segment = null
    this.releasePath()
    this.machine.abort()
    if (this.debug) {
      console.log(`[AgentNavigator] ${this.agentId} aborted`)
    }
  }

  dispose(): void {
    this.abort()
    this.unsubscribe()
  }

  execute(tick: number, _remainingBudgetMs: number): ITaskResult {
    const start = performance.now()

    if (this.signal?.aborted) {
      this.abort()
    }
    if (this.machine.state === 'aborted') {
      this.inbox.length = 0
      return { completed: true, elapsedMs: performance.now() - start }
    }

    const processed = this.drainInbox()

    const events = this.machine.observe({
      tick,
      position: this.position,
      target: this.destination,
      commandOutstanding: this.commandOutstanding,
      blocked: this.blocked,
      pace: this.pace,
    })
    this.blocked = false

    for (const event of events) {
      switch (event.type) {
        case 'stuck':
          this.onStuck(event.stuckType === 'path' ? this.blockedIndex : this.nextIndex, event.tick, event.stuckType)
          break
        case 'recovery-step':
          this.perform(event.action)
          break
        case 'recovered':
          break
        case 'escalated':
          this.cancelRequest()
          this.motion.cancel(this.agentId)
          this.commandOutstanding = false
          this.segment = null
          this.hooks.onEscalated?.(new AgentEscalated(this.agentId, event.attempts, this.lastGoodPathId))
          break
      }
    }

    return { completed: true, elapsedMs: performance.now() - start, workUnits: processed }
  }

  onSkipped(): void {
    // Events stay queued in the inbox until the next tick this task runs
  }

  private drainInbox(): number {
    if (this.inbox.length === 0) return 0

    const events = this.inbox.splice(0).sort((a, b) => a.seq - b.seq)
    let processed = 0

    for (const event of events) {
      // At-least-once delivery: anything at or below the last seq is a repeat
      if (event.seq <= this.lastSeq) continue
      this.lastSeq = event.seq
      processed++

      this.position = event.position
      if (!this.segment || event.segmentId !== this.segment.id) continue

      switch (event.type) {
        case 'progress':
          break
        case 'waypoint-reached':
          if (this.segmentKind === 'route') {
            this.nextIndex = event.waypointIndex + 1
            this.trackMemory(this.path?.id, (id) => this.memory.recordProgress(id, event.waypointIndex))
          }
          break
        case 'blocked':
          this.blocked = true
          this.blockedIndex = event.waypointIndex
          break
        case 'segment-complete':
          this.onSegmentComplete()
          break
      }
    }

    return processed
  }

  private onSegmentComplete(): void {
    this.commandOutstanding = false
    this.segment = null

    if (this.segmentKind === 'recovery') {
      // Retry the same edge from wherever the recovery move left us
      this.resumeRoute()
      return
    }

    if (this.segmentKind === 'route' && this.path) {
      this.trackMemory(this.path.id, (id) => this.memory.recordSuccess(id))
    }

    this.arrived = true
    this.releasePath()
    this.machine.settle()
    if (this.destination) {
      this.hooks.onArrived?.(this.agentId, this.destination)
    }
  }

  private onStuck(failingIndex: number, tick: number, stuckType: StuckTimeout['stuckType']): void {
    const error = new StuckTimeout(this.agentId, stuckType, tick, this.lastGoodPathId)
    if (this.debug) {
      console.log(`[AgentNavigator] ${error.message}`)
    }
    if (this.path && this.segmentKind === 'route') {
      this.trackMemory(this.path.id, (id) => this.memory.recordFailure(id, failingIndex))
    }
    this.hooks.onStuck?.(error)
  }

  private perform(action: RecoveryAction): void {
    const config = this.machine.config
    const here = toVector3(this.position)
    const ahead = this.nextWaypoint() ?? this.destination
    const facing = ahead ? facingBetween(this.position, ahead) : null
    const forward = facing ? new THREE.Vector3(facing.x, 0, facing.z) : new THREE.Vector3(1, 0, 0)

    switch (action.step) {
      case 'retreat': {
        // Back off, swung sideways so the retry comes in at a different angle
        const angle = THREE.MathUtils.degToRad(config.approachAngleDegrees)
        const back = forward.clone().negate().applyAxisAngle(UP, angle).multiplyScalar(config.retreatCells)
        this.issue('recovery', null, [fromVector3(here.clone().add(back))], this.nextIndex)
        break
      }
      case 'vertical-bypass': {
        const raised = here.clone().addScaledVector(UP, config.bypassHeight)
        const over = raised.clone().add(forward)
        this.issue('recovery', null, [fromVector3(raised), fromVector3(over)], this.nextIndex)
        break
      }
      case 'replan': {
        const path = this.path
        if (path && this.tracked) {
          this.service.invalidateWaypoint(path.id, this.nextIndex).catch((err: unknown) => {
            console.error(`Failed to invalidate ${path.id} for ${this.agentId}:`, err)
          })
        }
        // The failing path is still fresh in memory until the invalidation lands
        this.requestRoute(true)
        break
      }
      case 'assistance':
        this.hooks.onAssistance?.(this.agentId, this.position)
        break
    }
  }

  private requestRoute(recovering: boolean): void {
    const destination = this.destination
    if (!destination) return

    this.cancelRequest()
    const token = ++this.requestToken
    const following = this.following
    let answered = false

    const requestId = this.service.findPath(
      toCell(this.position),
      destination,
      this.capabilities,
      (result) => {
        answered = true
        // Results of superseded requests are dropped
        if (token !== this.requestToken) return
        this.pendingRequest = null
        this.onPlanned(result, recovering, following)
      },
      {
        signal: this.signal,
        priority: recovering ? 1 : 0,
        bypassMemory: recovering,
        transient: following,
      }
    )
    this.pendingRequest = answered ? null : requestId
  }

  private onPlanned(result: PlanResult, recovering: boolean, following: boolean): void {
    const state = this.machine.state
    if (state === 'aborted' || state === 'escalated') return

    if (!result.success) {
      if (result.error.reason === 'cancelled') return
      this.noPath = new NoPathFound(result.error.reason, result.error.message, this.lastGoodPathId)

      if (following) {
        // An unreachable slot is retried when it moves; the mission isn't told
        if (!recovering && !this.commandOutstanding) {
          this.machine.settle()
        }
        if (this.debug) {
          console.log(`[AgentNavigator] ${this.agentId} has no route to its slot: ${result.error.reason}`)
        }
        return
      }

      if (!recovering) {
        this.machine.settle()
      }
      this.hooks.onNoPath?.(this.agentId, this.noPath)
      return
    }

    this.adopt(result.path, recovering, !following)
  }

  private adopt(path: Path, recovering: boolean, tracked: boolean): void {
    this.releasePath()
    this.path = path
    this.tracked = tracked
    this.release = tracked ? this.memory.lease(path.id) : null
    if (tracked) {
      this.lastGoodPathId = path.id
    }
    this.nextIndex = 1

    if (!recovering) {
      this.machine.begin()
    }

    if (path.waypoints.length <= 1) {
      this.segmentKind = 'route'
      this.onSegmentComplete()
      return
    }

    this.resumeRoute()
  }

  private resumeRoute(): void {
    const path = this.path
    if (!path) return

    const remaining = path.waypoints.slice(this.nextIndex).map((waypoint) => waypoint.position)
    if (remaining.length === 0) {
      this.segmentKind = 'route'
      this.onSegmentComplete()
      return
    }
    this.issue('route', path.id, remaining, this.nextIndex)
  }

  private issue(kind: SegmentKind, pathId: string | null, waypoints: IPosition[], startIndex: number): void {
    const segment: MotionSegment = {
      id: `${this.agentId}-seg-${++this.segmentCounter}`,
      pathId,
      waypoints,
      startIndex,
    }
    this.segment = segment
    this.segmentKind = kind
    this.commandOutstanding = true
    this.motion.execute(this.agentId, segment, { pace: this.pace, signal: this.signal })
  }

  private nextWaypoint(): IPosition | null {
    const waypoint = this.path?.waypoints[this.nextIndex]
    return waypoint ? waypoint.position : null
  }

  private cancelRequest(): void {
    this.requestToken++
    if (this.pendingRequest !== null) {
      const requestId = this.pendingRequest
      this.pendingRequest = null
      this.service.cancel(requestId)
    }
  }

  private releasePath(): void {
    this.release?.()
    this.release = null
    this.path = null
  }

  private trackMemory(pathId: string | undefined, write: (id: string) => Promise<unknown>): void {
    if (pathId === undefined || !this.tracked) return
    write(pathId).catch((err: unknown) => {
      console.error(`Path memory update for ${pathId} failed:`, err)
    })
  }

  private assertActive(): void {
    if (this.machine.state === 'aborted') {
      throw new Error(`Agent ${this.agentId} was aborted and takes no further commands`)
    }
  }
}
