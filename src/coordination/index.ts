export type {
  FormationType,
  Role,
  MissionStatus,
  RegroupCause,
  SlotOffset,
  FormationConfig,
  FormationSample,
  MissionConfig,
  MissionRequest,
  AssistanceRequest,
  MissionReport,
} from './interfaces/ICoordination.ts'
export { LeaderTrail, slotOffset, slotPosition, type TrailPoint } from './Formation.ts'
export { FormationController, DEFAULT_FORMATION_CONFIG } from './FormationController.ts'
export { MissionController, DEFAULT_MISSION_CONFIG, type MissionHooks } from './MissionController.ts'
