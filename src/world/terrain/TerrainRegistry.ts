import type { TerrainSample } from '../interfaces/ITerrain.ts'
import { AIR_TERRAIN_ID, type TerrainId } from './TerrainIds.ts'
import { registerDefaultTerrain } from './registerDefaultTerrain.ts'

/**
 * A terrain type: id, name, and the sample every cell of that type reports.
 */
export interface ITerrainRegistration {
  id: TerrainId
  name: string
  sample: TerrainSample
}

const AIR_SAMPLE: TerrainSample = Object.freeze({ surface: 'void', speedFactors: Object.freeze({}) })

/**
 * Maps terrain ids to samples.
 * Samples are frozen and shared, so every cell of a type reports the same object.
 */
export class TerrainRegistry {
  private static instance: TerrainRegistry | null = null

  private readonly samples: Map<TerrainId, TerrainSample> = new Map()
  private readonly idsByName: Map<string, TerrainId> = new Map()

  constructor() {
    this.samples.set(AIR_TERRAIN_ID, AIR_SAMPLE)
    this.idsByName.set('air', AIR_TERRAIN_ID)
  }

  /**
   * Shared registry with the default terrain types registered.
   */
  static getInstance(): TerrainRegistry {
    if (!TerrainRegistry.instance) {
      const registry = new TerrainRegistry()
      registerDefaultTerrain(registry)
      TerrainRegistry.instance = registry
    }
    return TerrainRegistry.instance
  }

  /**
   * Reset the shared registry (useful for testing).
   */
  static reset(): void {
    TerrainRegistry.instance = null
  }

  register(registration: ITerrainRegistration): void {
    const { id, name, sample } = registration

    if (this.samples.has(id)) {
      console.warn(`Terrain ID ${id} already registered, overwriting`)
    }

    this.samples.set(id, Object.freeze({ ...sample, speedFactors: Object.freeze({ ...sample.speedFactors }) }))
    this.idsByName.set(name, id)
  }

  getSample(id: TerrainId): TerrainSample {
    return this.samples.get(id) ?? AIR_SAMPLE
  }

  getIdByName(name: string): TerrainId | undefined {
    return this.idsByName.get(name)
  }

  has(id: TerrainId): boolean {
    return this.samples.has(id)
  }
}
