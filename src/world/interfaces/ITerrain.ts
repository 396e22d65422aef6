import type { MovementMode } from '../../movement/interfaces/IMovement.ts'

/**
 * Surface classification of a cell.
 * - solid: can be stood on, blocks movement through it
 * - liquid: swum through
 * - climbable: ladders and vines, occupiable and climbable
 * - void: open air
 */
export type SurfaceType = 'solid' | 'liquid' | 'climbable' | 'void'

/**
 * Local danger markers attached to terrain (not to be confused with HazardRecords,
 * which are located, typed threats supplied by perception).
 */
export type HazardTag = 'slippery' | 'thin-ice' | 'unstable' | 'damaging'

/**
 * Classification of the block occupying one cell.
 * Produced by the world query; never mutated by the navigation core.
 */
export interface TerrainSample {
  readonly surface: SurfaceType
  /** Per-mode speed multiplier; missing modes use 1 */
  readonly speedFactors: Readonly<Partial<Record<MovementMode, number>>>
  readonly hazardTags?: readonly HazardTag[]
}
