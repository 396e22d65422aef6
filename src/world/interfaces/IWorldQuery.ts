import type { IPosition } from './ICoordinates.ts'
import type { TerrainSample } from './ITerrain.ts'
import type { HazardRecord } from '../../hazards/interfaces/IHazard.ts'

/**
 * Read-only view of the world supplied by the perception layer.
 * Decouples navigation from however the world is actually stored.
 */
export interface IWorldQuery {
  /**
   * Classify the block occupying a cell.
   */
  sample(position: IPosition): TerrainSample

  /**
   * Hazards whose bounding volume lies within `radius` of `position`.
   */
  hazardsNear(position: IPosition, radius: number): HazardRecord[]
}
