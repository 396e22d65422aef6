import type { IPosition } from './interfaces/ICoordinates.ts'
import type { IWorldQuery } from './interfaces/IWorldQuery.ts'
import type { TerrainSample } from './interfaces/ITerrain.ts'
import type { HazardRecord } from '../hazards/interfaces/IHazard.ts'
import { TerrainRegistry } from './terrain/TerrainRegistry.ts'
import { AIR_TERRAIN_ID, type TerrainId } from './terrain/TerrainIds.ts'
import { clearanceTo } from '../hazards/HazardVolume.ts'

/**
 * In-memory world backed by a flat array of terrain ids.
 *
 * Layout is Y-major: `y * width * depth + z * width + x`, relative to `offset`.
 * Anything outside the box reads as air.
 */
export class GridWorld implements IWorldQuery {
  readonly dimensions: readonly [number, number, number]
  readonly offset: IPosition

  private readonly cells: Uint16Array
  private readonly registry: TerrainRegistry
  private readonly hazards = new Map<string, HazardRecord>()

  constructor(
    dimensions: [number, number, number],
    offset: IPosition = { x: 0, y: 0, z: 0 },
    registry: TerrainRegistry = TerrainRegistry.getInstance()
  ) {
    const [width, height, depth] = dimensions
    if (width <= 0 || height <= 0 || depth <= 0) {
      throw new Error(`Invalid world dimensions ${width}x${height}x${depth}`)
    }
    this.dimensions = [width, height, depth]
    this.offset = offset
    this.registry = registry
    this.cells = new Uint16Array(width * height * depth)
  }

  sample(position: IPosition): TerrainSample {
    return this.registry.getSample(this.getTerrainId(position))
  }

  hazardsNear(position: IPosition, radius: number): HazardRecord[] {
    const result: HazardRecord[] = []
    for (const hazard of this.hazards.values()) {
      if (clearanceTo(position, hazard) <= radius) {
        result.push(hazard)
      }
    }
    return result
  }

  getTerrainId(position: IPosition): TerrainId {
    const index = this.indexOf(position)
    return index === -1 ? AIR_TERRAIN_ID : this.cells[index]
  }

  set(position: IPosition, id: TerrainId): this {
    const index = this.indexOf(position)
    if (index === -1) {
      console.warn(`GridWorld.set outside bounds at ${position.x},${position.y},${position.z}`)
      return this
    }
    this.cells[index] = id
    return this
  }

  /**
   * Fill an inclusive box with one terrain id.
   */
  fill(min: IPosition, max: IPosition, id: TerrainId): this {
    for (let y = Math.min(min.y, max.y); y <= Math.max(min.y, max.y); y++) {
      for (let z = Math.min(min.z, max.z); z <= Math.max(min.z, max.z); z++) {
        for (let x = Math.min(min.x, max.x); x <= Math.max(min.x, max.x); x++) {
          this.set({ x, y, z }, id)
        }
      }
    }
    return this
  }

  addHazard(hazard: HazardRecord): this {
    this.hazards.set(hazard.id, hazard)
    return this
  }

  removeHazard(id: string): boolean {
    return this.hazards.delete(id)
  }

  private indexOf(position: IPosition): number {
    const [width, height, depth] = this.dimensions
    const x = position.x - this.offset.x
    const y = position.y - this.offset.y
    const z = position.z - this.offset.z

    if (
      !Number.isInteger(x) || !Number.isInteger(y) || !Number.isInteger(z) ||
      x < 0 || x >= width || y < 0 || y >= height || z < 0 || z >= depth
    ) {
      return -1
    }

    return y * width * depth + z * width + x
  }
}
