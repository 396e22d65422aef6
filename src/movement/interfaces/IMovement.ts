/**
 * Movement modes an agent may use.
 * `swim` is surface swimming, `dive` is fully submerged.
 */
export type MovementMode = 'walk' | 'sprint' | 'swim' | 'dive' | 'climb' | 'ride' | 'glide'

/**
 * Declaration order doubles as the last tie-breaker when two modes are equally good.
 */
export const MOVEMENT_MODES: readonly MovementMode[] = [
  'walk',
  'sprint',
  'swim',
  'dive',
  'climb',
  'ride',
  'glide',
]

/**
 * What an agent can do. `build` allows bridge and ascent edges (placing blocks).
 */
export type Capability = MovementMode | 'build'

export type CapabilitySet = ReadonlySet<Capability>

/**
 * Result of evaluating one movement mode on one terrain cell.
 */
export interface MovementCost {
  /** Cells per second; 0 when the mode cannot be used on this surface */
  speed: number
  /** 0 (safe) to 1 (impassable) */
  risk: number
}

/**
 * A movement mode chosen for a cell, with its cost and the terrain factor applied.
 */
export interface ModeChoice extends MovementCost {
  mode: MovementMode
  terrainFactor: number
}

/**
 * Tunables for the movement model.
 */
export interface MovementModelConfig {
  /** Risk added per unit of speed factor above 1 (frictionless surfaces) */
  slipperyRiskScale: number
}
