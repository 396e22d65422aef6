import { TerrainIds } from './TerrainIds.ts'
import type { TerrainRegistry } from './TerrainRegistry.ts'

/**
 * Register the built-in terrain types.
 */
export function registerDefaultTerrain(registry: TerrainRegistry): void {
  registry.register({
    id: TerrainIds.STONE,
    name: 'stone',
    sample: { surface: 'solid', speedFactors: {} },
  })

  // Frictionless: faster, but the agent overshoots near edges
  registry.register({
    id: TerrainIds.ICE,
    name: 'ice',
    sample: {
      surface: 'solid',
      speedFactors: { walk: 1.3, sprint: 1.3, ride: 1.3 },
      hazardTags: ['slippery'],
    },
  })

  registry.register({
    id: TerrainIds.SOUL_SAND,
    name: 'soul_sand',
    sample: { surface: 'solid', speedFactors: { walk: 0.4, sprint: 0.4, ride: 0.4 } },
  })

  registry.register({
    id: TerrainIds.WATER,
    name: 'water',
    sample: { surface: 'liquid', speedFactors: {} },
  })

  registry.register({
    id: TerrainIds.LAVA,
    name: 'lava',
    sample: { surface: 'liquid', speedFactors: { swim: 0.3, dive: 0.3 }, hazardTags: ['damaging'] },
  })

  registry.register({
    id: TerrainIds.LADDER,
    name: 'ladder',
    sample: { surface: 'climbable', speedFactors: {} },
  })

  registry.register({
    id: TerrainIds.THIN_ICE,
    name: 'thin_ice',
    sample: { surface: 'solid', speedFactors: {}, hazardTags: ['thin-ice'] },
  })
}
