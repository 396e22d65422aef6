import type { IPosition } from '../world/interfaces/ICoordinates.ts'
import type { AgentNavigator, AgentNavigatorHooks } from '../agent/AgentNavigator.ts'
import type {
  AssistanceRequest,
  MissionConfig,
  MissionReport,
  MissionRequest,
  MissionStatus,
  RegroupCause,
  Role,
} from './interfaces/ICoordination.ts'
import { TaskPriority, type ITask, type ITaskResult } from '../core/interfaces/ITask.ts'
import {
  MissionAborted,
  type AbortReason,
  type AgentEscalated,
  type HazardCritical,
  type NavigationError,
  type NoPathFound,
  type StuckTimeout,
} from '../core/errors.ts'
import { straightLineDistance } from '../world/coordinates/CoordinateUtils.ts'
import { FormationController } from './FormationController.ts'

export const DEFAULT_MISSION_CONFIG: MissionConfig = {
  arrivalRadius: 1.5,
  regroupTimeoutTicks: 200,
  regroupQuorum: 'all',
  debug: false,
}

const TRANSITIONS: Readonly<Record<MissionStatus, readonly MissionStatus[]>> = {
  planning: ['en-route', 'regrouping', 'aborted'],
  'en-route': ['regrouping', 'complete', 'aborted'],
  regrouping: ['planning', 'aborted'],
  complete: [],
  aborted: [],
}

/**
 * Telemetry and decision callbacks raised by a mission.
 */
export interface MissionHooks {
  onStatusChange?(missionId: string, from: MissionStatus, to: MissionStatus): void
  onStuck?(error: StuckTimeout): void
  onEscalated?(error: AgentEscalated): void
  onAssistance?(request: AssistanceRequest): void
  onAborted?(error: MissionAborted): void
}

/**
 * Conditions surfaced by agents or collaborators, handled on the mission's next tick.
 */
type MissionSignal =
  | { type: 'escalated'; error: AgentEscalated }
  | { type: 'no-path'; agentId: string; error: NoPathFound }
  | { type: 'hazard'; error: HazardCritical }
  | { type: 'assistance'; agentId: string; position: IPosition }

let missionCounter = 0

/**
 * Mission control for one squad.
 *
 * Runs as a CRITICAL task ahead of the agents it coordinates. It owns the
 * formation loop and decides, for everything an agent surfaces, whether to
 * regroup, substitute, drop the agent or abort. Abort is one-way and reaches
 * every agent through a shared AbortSignal.
 */
export class MissionController implements ITask {
  readonly id: string
  readonly priority = TaskPriority.CRITICAL
  enabled = true

  readonly missionId: string
  readonly config: MissionConfig
  readonly formation: FormationController
  readonly destination: IPosition
  readonly regroupPoint: IPosition

  private readonly controller = new AbortController()
  private readonly navigators: ReadonlyMap<string, AgentNavigator>
  private readonly hooks: MissionHooks
  private readonly originalCount: number
  private readonly standby: string[]
  private readonly pending: MissionSignal[] = []
  private readonly followTargets = new Map<string, IPosition>()
  /** Followers sent to help a stuck agent, keyed by helper */
  private readonly helping = new Map<string, string>()

  private current: MissionStatus = 'planning'
  private currentTick = 0
  private regroupStartedAt = 0
  private regroups = 0
  private lastRegroupCause: RegroupCause | null = null
  private abortReason: AbortReason | null = null
  private raisedBy: string | null = null
  private lastError: NavigationError | null = null
  private readonly dropped: string[] = []
  private readonly substitutions: Array<{ escalated: string; replacement: string }> = []
  private readonly assistance: AssistanceRequest[] = []

  constructor(request: MissionRequest, navigators: ReadonlyMap<string, AgentNavigator>, hooks: MissionHooks = {}) {
    this.missionId = request.id ?? `mission-${++missionCounter}`
    this.id = `mission:${this.missionId}`
    this.config = { ...DEFAULT_MISSION_CONFIG, ...request.mission }
    this.destination = request.destination
    this.regroupPoint = request.regroupPoint
    this.navigators = navigators
    this.hooks = hooks
    this.standby = [...(request.standbyIds ?? [])]

    const everyone = [request.leaderId, ...request.followerIds, ...this.standby]
    if (new Set(everyone).size !== everyone.length) {
      throw new Error(`Mission ${this.missionId} lists an agent more than once`)
    }
    for (const agentId of everyone) {
      if (!navigators.has(agentId)) {
        throw new Error(`Mission ${this.missionId} references unknown agent ${agentId}`)
      }
    }

    this.originalCount = 1 + request.followerIds.length
    const quorum = this.config.regroupQuorum
    if (quorum !== 'all' && (quorum < 1 || quorum > this.originalCount)) {
      throw new Error(`Regroup quorum ${quorum} outside 1..${this.originalCount}`)
    }

    this.formation = new FormationController(request.leaderId, request.followerIds, request.formation)
  }

  get status(): MissionStatus {
    return this.current
  }

  get signal(): AbortSignal {
    return this.controller.signal
  }

  get participants(): string[] {
    return [this.formation.leader, ...this.formation.followerIds]
  }

  /**
   * Bind the participants to this mission and send the leader off.
   */
  start(): void {
    for (const agentId of this.participants) {
      this.enlist(agentId)
    }
    for (const agentId of this.formation.followerIds) {
      this.navigator(agentId).halt()
    }
    this.navigator(this.formation.leader).navigateTo(this.destination)

    if (this.config.debug) {
      console.log(`[Mission] ${this.missionId} started with ${this.originalCount} agents`)
    }
  }

  roleOf(agentId: string): Role | null {
    if (agentId === this.formation.leader) return 'navigator'
    const followers = this.formation.followerIds
    const index = followers.indexOf(agentId)
    if (index === -1) return null
    return index === followers.length - 1 ? 'rear-guard' : 'support'
  }

  /**
   * A lethal hazard was found on an active path.
   */
  raiseHazard(error: HazardCritical): void {
    this.pending.push({ type: 'hazard', error })
  }

  /**
   * Any participant or collaborator may abort. One-way.
   */
  abort(reason: AbortReason = 'requested', raisedBy: string | null = null): MissionAborted | null {
    if (this.isTerminal()) return null

    this.transition('aborted')
    this.abortReason = reason
    this.raisedBy = raisedBy
    this.controller.abort()

    for (const agentId of this.participants) {
      this.navigator(agentId).abort()
    }

    const error = new MissionAborted(this.missionId, reason, raisedBy, this.lastGoodPathId())
    this.lastError = error
    console.warn(`${error.message}${raisedBy ? ` (raised by ${raisedBy})` : ''}`)
    this.hooks.onAborted?.(error)
    return error
  }

  execute(tick: number, _remainingBudgetMs: number): ITaskResult {
    const start = performance.now()
    this.currentTick = tick

    if (!this.isTerminal()) {
      this.handleSignals()
    }

    switch (this.current) {
      case 'planning':
        this.checkDeparture()
        break
      case 'en-route':
        this.keepFormation(tick)
        break
      case 'regrouping':
        this.checkRegroup(tick)
        break
      default:
        break
    }

    return { completed: true, elapsedMs: performance.now() - start }
  }

  report(): MissionReport {
    return {
      missionId: this.missionId,
      status: this.current,
      tick: this.currentTick,
      leaderId: this.formation.leader,
      followerIds: [...this.formation.followerIds],
      standbyIds: [...this.standby],
      dropped: [...this.dropped],
      substitutions: this.substitutions.map((entry) => ({ ...entry })),
      regroups: this.regroups,
      lastRegroupCause: this.lastRegroupCause,
      abortReason: this.abortReason,
      raisedBy: this.raisedBy,
      lastGoodPathId: this.lastGoodPathId(),
      assistance: this.assistance.map((request) => ({ ...request })),
      lastError: this.lastError,
    }
  }

  private handleSignals(): void {
    for (const signal of this.pending.splice(0)) {
      if (this.isTerminal()) return

      switch (signal.type) {
        case 'escalated':
          this.onEscalated(signal.error)
          break
        case 'no-path':
          this.lastError = signal.error
          // Surfaced, never retried automatically
          this.abort('no-path', signal.agentId)
          break
        case 'hazard':
          this.lastError = signal.error
          this.regroup('hazard-critical')
          break
        case 'assistance':
          this.offerAssistance(signal.agentId, signal.position)
          break
      }
    }
  }

  private onEscalated(error: AgentEscalated): void {
    const agentId = error.agentId
    if (!this.participants.includes(agentId)) return
    this.lastError = error

    const replacement = this.standby.shift()
    if (replacement !== undefined) {
      this.formation.replace(agentId, replacement)
      this.release(agentId)
      this.enlist(replacement)
      this.substitutions.push({ escalated: agentId, replacement })
      console.warn(`Mission ${this.missionId}: ${replacement} replaces escalated ${agentId}`)
      this.regroup('agent-escalated')
      return
    }

    if (this.participants.length - 1 >= this.quorum() && this.participants.length > 1) {
      this.formation.remove(agentId)
      this.release(agentId)
      this.dropped.push(agentId)
      console.warn(`Mission ${this.missionId}: dropped escalated ${agentId}`)
      this.regroup('agent-escalated')
      return
    }

    this.abort('agent-escalated', agentId)
  }

  private checkDeparture(): void {
    const leader = this.navigator(this.formation.leader)
    if (leader.currentPath === null && !leader.hasArrived) return

    this.transition('en-route')
    this.formation.reset()
    this.formation.recordLeader(leader.currentPosition)
  }

  private keepFormation(tick: number): void {
    const leader = this.navigator(this.formation.leader)
    this.formation.recordLeader(leader.currentPosition)

    const positions = new Map<string, IPosition>()
    for (const followerId of this.formation.followerIds) {
      positions.set(followerId, this.navigator(followerId).currentPosition)
    }

    const sample = this.formation.update(tick, positions)
    leader.setPace(sample.pace)
    this.releaseHelpers()

    if (sample.broken) {
      console.warn(`Mission ${this.missionId}: ${sample.broken.message}`)
      this.lastError = sample.broken
      this.regroup('formation-broken')
      return
    }

    for (const followerId of this.formation.followerIds) {
      this.steerFollower(followerId)
    }

    if (leader.hasArrived && sample.worstDeviation <= this.formation.config.spacingTolerance) {
      this.transition('complete')
      for (const agentId of this.participants) {
        this.navigator(agentId).halt()
      }
      if (this.config.debug) {
        console.log(`[Mission] ${this.missionId} complete at tick ${tick}`)
      }
    }
  }

  /**
   * Re-plan a follower's sub-path when its slot has moved on, or when it is
   * resting away from the slot.
   */
  private steerFollower(followerId: string): void {
    if (this.helping.has(followerId)) return
    const navigator = this.navigator(followerId)
    const state = navigator.state
    if (state === 'stuck' || state === 'recovering' || state === 'escalated') return

    const slot = this.formation.slotFor(followerId)
    if (!slot) return

    const previous = this.followTargets.get(followerId)
    const moved = previous === undefined ||
      straightLineDistance(previous, slot) > this.formation.config.followReplanDistance
    // A slot that could not be reached is retried once it moves
    const resting = state === 'idle' &&
      !navigator.isPlanning &&
      navigator.lastNoPath === null &&
      straightLineDistance(navigator.currentPosition, slot) > this.config.arrivalRadius

    if (moved || resting) {
      navigator.follow(slot)
      this.followTargets.set(followerId, slot)
    }
  }

  /**
   * Broadcast a stuck agent's call for help and, while en route, send the
   * nearest free follower over.
   */
  private offerAssistance(agentId: string, position: IPosition): void {
    if (!this.participants.includes(agentId)) return

    const responderId = this.current === 'en-route' ? this.nearestHelper(agentId, position) : null
    const request: AssistanceRequest = { agentId, position, tick: this.currentTick, responderId }
    this.assistance.push(request)

    for (const other of this.participants) {
      this.navigator(other).receiveAssistance(request)
    }

    if (responderId !== null) {
      this.helping.set(responderId, agentId)
      this.followTargets.delete(responderId)
      this.navigator(responderId).navigateTo(position)
      if (this.config.debug) {
        console.log(`[Mission] ${this.missionId}: ${responderId} sent to assist ${agentId}`)
      }
    }

    this.hooks.onAssistance?.(request)
  }

  private nearestHelper(agentId: string, position: IPosition): string | null {
    let best: string | null = null
    let bestDistance = Infinity

    for (const followerId of this.formation.followerIds) {
      if (followerId === agentId || this.helping.has(followerId)) continue
      const navigator = this.navigator(followerId)
      const state = navigator.state
      if (state === 'stuck' || state === 'recovering' || state === 'escalated') continue

      const distance = straightLineDistance(navigator.currentPosition, position)
      if (distance < bestDistance) {
        best = followerId
        bestDistance = distance
      }
    }
    return best
  }

  /**
   * Helpers go back to their slots once the agent they went to is moving
   * again or has left the mission.
   */
  private releaseHelpers(): void {
    for (const [helperId, agentId] of this.helping) {
      const state = this.participants.includes(agentId) ? this.navigator(agentId).state : null
      if (state !== 'stuck' && state !== 'recovering') {
        this.helping.delete(helperId)
      }
    }
  }

  private checkRegroup(tick: number): void {
    const arrived = this.participants.filter(
      (agentId) =>
        straightLineDistance(this.navigator(agentId).currentPosition, this.regroupPoint) <= this.config.arrivalRadius
    ).length

    if (arrived >= this.quorum()) {
      this.resume()
      return
    }

    if (tick - this.regroupStartedAt > this.config.regroupTimeoutTicks) {
      this.abort('regroup-timeout')
    }
  }

  private regroup(cause: RegroupCause): void {
    if (this.current !== 'regrouping') {
      this.transition('regrouping')
      this.regroupStartedAt = this.currentTick
      this.regroups++
    }
    this.lastRegroupCause = cause
    this.followTargets.clear()
    this.helping.clear()
    this.formation.reset()

    for (const agentId of this.participants) {
      const navigator = this.navigator(agentId)
      if (navigator.state !== 'escalated') {
        navigator.navigateTo(this.regroupPoint)
      }
    }

    if (this.config.debug) {
      console.log(`[Mission] ${this.missionId} regrouping (${cause}) at tick ${this.currentTick}`)
    }
  }

  private resume(): void {
    this.transition('planning')
    this.formation.reset()
    for (const followerId of this.formation.followerIds) {
      this.navigator(followerId).halt()
    }
    this.navigator(this.formation.leader).navigateTo(this.destination)

    if (this.config.debug) {
      console.log(`[Mission] ${this.missionId} regrouped, resuming at tick ${this.currentTick}`)
    }
  }

  private quorum(): number {
    const quorum = this.config.regroupQuorum
    return quorum === 'all' ? this.originalCount : quorum
  }

  private enlist(agentId: string): void {
    this.navigator(agentId).attach(this.controller.signal, this.hooksFor(agentId))
  }

  private release(agentId: string): void {
    const navigator = this.navigator(agentId)
    navigator.halt()
    navigator.attach(undefined, {})
  }

  private hooksFor(agentId: string): AgentNavigatorHooks {
    return {
      onStuck: (error) => this.hooks.onStuck?.(error),
      onEscalated: (error) => {
        this.hooks.onEscalated?.(error)
        this.pending.push({ type: 'escalated', error })
      },
      onAssistance: (_id, position) => {
        this.pending.push({ type: 'assistance', agentId, position })
      },
      onNoPath: (_id, error) => {
        this.pending.push({ type: 'no-path', agentId, error })
      },
    }
  }

  private lastGoodPathId(): string | null {
    return this.navigator(this.formation.leader).lastGoodPath
  }

  private navigator(agentId: string): AgentNavigator {
    const navigator = this.navigators.get(agentId)
    if (!navigator) {
      throw new Error(`Mission ${this.missionId} has no navigator for ${agentId}`)
    }
    return navigator
  }

  private isTerminal(): boolean {
    return this.current === 'aborted' || this.current === 'complete'
  }

  private transition(next: MissionStatus): void {
    if (!TRANSITIONS[this.current].includes(next)) {
      throw new Error(`Illegal mission transition ${this.current} -> ${next} for ${this.missionId}`)
    }
    const previous = this.current
    this.current = next
    this.hooks.onStatusChange?.(this.missionId, previous, next)
  }
}
