import type { IPosition } from '../../world/interfaces/ICoordinates.ts'
import type { AbortReason, FormationBroken, NavigationError } from '../../core/errors.ts'

export type FormationType = 'line' | 'column' | 'wedge' | 'circle'

/**
 * Mission roles. Exposed to collaborators; the core does not interpret them.
 */
export type Role = 'navigator' | 'support' | 'rear-guard'

export type MissionStatus = 'planning' | 'en-route' | 'regrouping' | 'complete' | 'aborted'

export type RegroupCause = 'hazard-critical' | 'agent-escalated' | 'formation-broken'

/**
 * Where a follower stands relative to the leader trail.
 */
export interface SlotOffset {
  /** Distance back along the trail from the leader */
  behind: number
  /** Offset along the trail direction at that point (negative is further back) */
  along: number
  /** Sideways offset, positive to the right of the direction of travel */
  lateral: number
}

export interface FormationConfig {
  type: FormationType
  /** Largest allowed follower distance from its trail point, in cells */
  spacingTolerance: number
  /** Distance between consecutive slots, in cells */
  slotSpacing: number
  /** Lowest pace the leader is throttled to */
  minPace: number
  /** How strongly excess deviation cuts the leader's pace */
  throttleGain: number
  /** Highest pace while any follower is out of tolerance */
  throttleCeiling: number
  /** Pace regained per tick once the formation is back in tolerance */
  paceRecoveryStep: number
  /** Ticks out of tolerance before the formation counts as broken */
  maxThrottleTicks: number
  /** Leader positions kept on the trail */
  trailLength: number
  /** How far a slot may move before the follower is re-pointed at it */
  followReplanDistance: number
}

/**
 * Result of one formation update.
 */
export interface FormationSample {
  tick: number
  deviations: Record<string, number>
  worstFollower: string | null
  worstDeviation: number
  pace: number
  ticksOverTolerance: number
  broken: FormationBroken | null
}

export interface MissionConfig {
  /** Distance from the goal or regroup point that counts as arrived */
  arrivalRadius: number
  /** Ticks allowed for a regroup before the mission aborts */
  regroupTimeoutTicks: number
  /** Agents that must reach the regroup point; 'all' means every original participant */
  regroupQuorum: number | 'all'
  debug: boolean
}

/**
 * What a caller asks for when starting a mission.
 */
export interface MissionRequest {
  id?: string
  leaderId: string
  followerIds: string[]
  /** Agents that may replace an escalated participant */
  standbyIds?: string[]
  destination: IPosition
  regroupPoint: IPosition
  formation?: Partial<FormationConfig>
  mission?: Partial<MissionConfig>
}

/**
 * A stuck agent's call for help, broadcast to everyone else on the mission.
 */
export interface AssistanceRequest {
  agentId: string
  position: IPosition
  tick: number
  /** Follower sent over to help, if one was free */
  responderId: string | null
}

/**
 * Snapshot of a mission for collaborators and diagnostics.
 */
export interface MissionReport {
  missionId: string
  status: MissionStatus
  tick: number
  leaderId: string
  followerIds: string[]
  standbyIds: string[]
  dropped: string[]
  substitutions: Array<{ escalated: string; replacement: string }>
  regroups: number
  lastRegroupCause: RegroupCause | null
  abortReason: AbortReason | null
  raisedBy: string | null
  lastGoodPathId: string | null
  assistance: AssistanceRequest[]
  lastError: NavigationError | null
}
