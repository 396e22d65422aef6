/**
 * Central registry of terrain ids stored in GridWorld cells.
 * 0 is reserved for AIR.
 */
export enum TerrainIds {
  AIR = 0,
  STONE = 1,
  ICE = 2,
  SOUL_SAND = 3,
  WATER = 4,
  LAVA = 5,
  LADDER = 6,
  THIN_ICE = 7,
}

export type TerrainId = number

export const AIR_TERRAIN_ID: TerrainId = TerrainIds.AIR
