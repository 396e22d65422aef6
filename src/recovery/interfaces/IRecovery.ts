import type { IPosition } from '../../world/interfaces/ICoordinates.ts'

/**
 * - position: the agent hasn't moved for the stuck threshold
 * - path: the motion controller reported the next segment blocked
 */
export type StuckType = 'position' | 'path'

/**
 * Recovery ladder steps, attempted once each in this order.
 */
export type RecoveryStepKind = 'retreat' | 'vertical-bypass' | 'replan' | 'assistance'

export const RECOVERY_LADDER: readonly RecoveryStepKind[] = [
  'retreat',
  'vertical-bypass',
  'replan',
  'assistance',
]

export type AgentNavState = 'idle' | 'moving' | 'stuck' | 'recovering' | 'escalated' | 'aborted'

/**
 * One tick of progress as seen by the stuck detector.
 */
export interface TickObservation {
  tick: number
  position: IPosition
  /** Where the agent is currently heading (next waypoint) */
  target: IPosition | null
  /** Whether a movement command is in flight */
  commandOutstanding: boolean
  /** Set when the motion controller reported the path ahead blocked this tick */
  blocked?: boolean
  /** Commanded fraction of full speed; formation throttling lowers it (default: 1) */
  pace?: number
}

/**
 * A recovery step the agent should carry out now.
 */
export interface RecoveryAction {
  step: RecoveryStepKind
  /** 1-based attempt number within the current ladder */
  attempt: number
  tick: number
  /** Distance to target when the agent got stuck */
  stuckDistance: number
}

export type RecoveryEvent =
  | { type: 'stuck'; tick: number; stuckType: StuckType }
  | { type: 'recovery-step'; tick: number; action: RecoveryAction }
  | { type: 'recovered'; tick: number; step: RecoveryStepKind }
  | { type: 'escalated'; tick: number; attempts: number }

export interface StuckDetectorConfig {
  /** Consecutive stationary ticks before the agent counts as stuck */
  thresholdTicks: number
  /** Minimum displacement that counts as progress */
  epsilon: number
}

export interface RecoveryConfig {
  /** Cells to back off on a retreat step */
  retreatCells: number
  /** Approach angle shift for the retry after a retreat */
  approachAngleDegrees: number
  /** Height of the vertical bypass hop */
  bypassHeight: number
  /** Improvement in distance-to-target that counts as a successful step */
  progressEpsilon: number
  /** Ticks a single step may take before the next one is tried */
  attemptTimeoutTicks: number
  /** Hard cap on steps across all ladders for one agent */
  maxRecoveryAttempts: number
  debug: boolean
}

export interface RecoveryStats {
  stuckEvents: number
  attempts: number
  successes: number
  escalations: number
  byStep: Record<RecoveryStepKind, number>
  byStuckType: Record<StuckType, number>
}
