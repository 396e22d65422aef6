import type { IPosition } from '../world/interfaces/ICoordinates.ts'
import type { IWorldQuery } from '../world/interfaces/IWorldQuery.ts'
import type { TerrainSample } from '../world/interfaces/ITerrain.ts'
import { offset, positionKey } from '../world/coordinates/CoordinateUtils.ts'

/**
 * How an agent occupies a cell.
 * - ground: feet and head clear, solid floor below
 * - climbable: feet in a ladder/vine cell
 */
export type StandKind = 'ground' | 'climbable'

/**
 * Memoized view of the world for a single search.
 * The world is treated as a snapshot: samples are read once per cell.
 */
export class NavigationGrid {
  private readonly samples = new Map<string, TerrainSample>()

  constructor(private readonly world: IWorldQuery) {}

  sample(position: IPosition): TerrainSample {
    const key = positionKey(position)
    let sample = this.samples.get(key)
    if (!sample) {
      sample = this.world.sample(position)
      this.samples.set(key, sample)
    }
    return sample
  }

  isSolid(position: IPosition): boolean {
    return this.sample(position).surface === 'solid'
  }

  standKind(position: IPosition): StandKind | null {
    const feet = this.sample(position).surface
    const head = this.sample(offset(position, 0, 1, 0)).surface

    if (feet === 'climbable' && head !== 'solid') {
      return 'climbable'
    }
    if (
      feet === 'void' &&
      (head === 'void' || head === 'climbable') &&
      this.sample(offset(position, 0, -1, 0)).surface === 'solid'
    ) {
      return 'ground'
    }
    return null
  }

  isStandable(position: IPosition): boolean {
    return this.standKind(position) !== null
  }

  /**
   * Cell whose terrain the agent moves on while standing at `position`.
   */
  floorSample(position: IPosition, kind: StandKind): TerrainSample {
    return kind === 'ground' ? this.sample(offset(position, 0, -1, 0)) : this.sample(position)
  }

  get cachedCells(): number {
    return this.samples.size
  }
}
