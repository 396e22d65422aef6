export type {
  StuckType,
  RecoveryStepKind,
  AgentNavState,
  TickObservation,
  RecoveryAction,
  RecoveryEvent,
  StuckDetectorConfig,
  RecoveryConfig,
  RecoveryStats,
} from './interfaces/IRecovery.ts'
export { RECOVERY_LADDER } from './interfaces/IRecovery.ts'
export { StuckDetector, DEFAULT_STUCK_CONFIG, type StuckDetection } from './StuckDetector.ts'
export { RecoveryStateMachine, DEFAULT_RECOVERY_CONFIG } from './RecoveryStateMachine.ts'
