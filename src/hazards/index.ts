export type {
  HazardType,
  HazardSeverity,
  HazardRecord,
  ClearanceConstraint,
  RerouteReason,
  HazardVerdict,
  HazardAvoidanceConfig,
} from './interfaces/IHazard.ts'
export { HazardAvoidanceEngine, DEFAULT_HAZARD_CONFIG, mergeConstraints, type EdgeHazardScore } from './HazardAvoidance.ts'
export { HazardRegistry, mergeHazards } from './HazardRegistry.ts'
export {
  HazardVolume,
  SEGMENT_SAMPLE_STEP,
  clearanceTo,
  sampleSegment,
  segmentClearance,
  fractionInside,
} from './HazardVolume.ts'
