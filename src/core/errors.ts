import type { StuckType } from '../recovery/interfaces/IRecovery.ts'

export type NavigationErrorCode =
  | 'NO_PATH_FOUND'
  | 'STUCK_TIMEOUT'
  | 'HAZARD_CRITICAL'
  | 'FORMATION_BROKEN'
  | 'AGENT_ESCALATED'
  | 'MISSION_ABORTED'

/**
 * Why a route could not be produced.
 */
export type NoPathReason =
  | 'invalid-endpoint'
  | 'out-of-range'
  | 'unreachable'
  | 'node-limit'
  | 'timeout'
  | 'cancelled'
  | 'hazard-rejected'

/**
 * Why a mission was aborted.
 */
export type AbortReason =
  | 'no-path'
  | 'agent-escalated'
  | 'regroup-timeout'
  | 'hazard-critical'
  | 'requested'

/**
 * Base class for every condition the navigation core surfaces.
 * Always carries the last path known to be good so callers can diagnose
 * without replaying the search.
 */
export class NavigationError extends Error {
  readonly code: NavigationErrorCode
  readonly lastGoodPathId: string | null

  constructor(code: NavigationErrorCode, message: string, lastGoodPathId: string | null = null) {
    super(message)
    this.name = new.target.name
    this.code = code
    this.lastGoodPathId = lastGoodPathId
  }
}

/**
 * No viable route under current hazard and capability constraints.
 * Surfaced to the mission; never retried automatically.
 */
export class NoPathFound extends NavigationError {
  readonly reason: NoPathReason

  constructor(reason: NoPathReason, message: string, lastGoodPathId: string | null = null) {
    super('NO_PATH_FOUND', message, lastGoodPathId)
    this.reason = reason
  }
}

/**
 * An agent made no progress. Triggers the local recovery ladder.
 */
export class StuckTimeout extends NavigationError {
  readonly agentId: string
  readonly stuckType: StuckType
  readonly tick: number

  constructor(agentId: string, stuckType: StuckType, tick: number, lastGoodPathId: string | null = null) {
    super('STUCK_TIMEOUT', `Agent ${agentId} stuck (${stuckType}) at tick ${tick}`, lastGoodPathId)
    this.agentId = agentId
    this.stuckType = stuckType
    this.tick = tick
  }
}

/**
 * A lethal hazard sits on an active or candidate path.
 */
export class HazardCritical extends NavigationError {
  readonly hazardId: string

  constructor(hazardId: string, message: string, lastGoodPathId: string | null = null) {
    super('HAZARD_CRITICAL', message, lastGoodPathId)
    this.hazardId = hazardId
  }
}

/**
 * A follower stayed out of formation longer than throttling can fix.
 */
export class FormationBroken extends NavigationError {
  readonly agentId: string
  readonly deviation: number

  constructor(agentId: string, deviation: number, lastGoodPathId: string | null = null) {
    super(
      'FORMATION_BROKEN',
      `Follower ${agentId} is ${deviation.toFixed(2)} cells from its trail point`,
      lastGoodPathId
    )
    this.agentId = agentId
    this.deviation = deviation
  }
}

/**
 * Recovery ladder exhausted. The mission decides whether to abort or substitute.
 */
export class AgentEscalated extends NavigationError {
  readonly agentId: string
  readonly attempts: number

  constructor(agentId: string, attempts: number, lastGoodPathId: string | null = null) {
    super('AGENT_ESCALATED', `Agent ${agentId} escalated after ${attempts} recovery attempts`, lastGoodPathId)
    this.agentId = agentId
    this.attempts = attempts
  }
}

/**
 * Broadcast to every participant when a mission is aborted.
 */
export class MissionAborted extends NavigationError {
  readonly missionId: string
  readonly reason: AbortReason
  readonly raisedBy: string | null

  constructor(missionId: string, reason: AbortReason, raisedBy: string | null, lastGoodPathId: string | null = null) {
    super('MISSION_ABORTED', `Mission ${missionId} aborted: ${reason}`, lastGoodPathId)
    this.missionId = missionId
    this.reason = reason
    this.raisedBy = raisedBy
  }
}

/**
 * Configuration input that parsed but did not validate.
 */
export class ConfigValidationError extends Error {
  readonly issues: string[]

  constructor(issues: string[]) {
    super(`Invalid navigation config: ${issues.join('; ')}`)
    this.name = 'ConfigValidationError'
    this.issues = issues
  }
}
