export type {
  MovementMode,
  Capability,
  CapabilitySet,
  MovementCost,
  ModeChoice,
  MovementModelConfig,
} from './interfaces/IMovement.ts'
export { MOVEMENT_MODES } from './interfaces/IMovement.ts'
export * from './constants.ts'
export {
  cost,
  bestMode,
  terrainFactor,
  maxModeSpeed,
  capabilitiesOf,
  satisfies,
} from './TerrainCost.ts'
