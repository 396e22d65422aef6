import type { MovementMode } from './interfaces/IMovement.ts'
import type { HazardTag, SurfaceType } from '../world/interfaces/ITerrain.ts'

/** Base speed per mode in cells per second */
export const BASE_SPEEDS: Readonly<Record<MovementMode, number>> = {
  walk: 4.317,
  sprint: 5.612,
  swim: 2.2,
  dive: 1.97,
  climb: 2.35,
  ride: 8.0,
  glide: 7.2,
}

/** Surfaces each mode can be used on */
export const MODE_SURFACES: Readonly<Record<MovementMode, readonly SurfaceType[]>> = {
  walk: ['solid', 'climbable'],
  sprint: ['solid'],
  swim: ['liquid'],
  dive: ['liquid'],
  climb: ['climbable'],
  ride: ['solid'],
  glide: ['void'],
}

/** Fixed risk contributed by each hazard tag on a cell */
export const HAZARD_TAG_RISK: Readonly<Record<HazardTag, number>> = {
  slippery: 0.2,
  'thin-ice': 0.4,
  unstable: 0.3,
  damaging: 1.0,
}

/** Risk at or above this value makes a cell impassable for the mode */
export const IMPASSABLE_RISK = 1

export const DEFAULT_SLIPPERY_RISK_SCALE = 0.5
