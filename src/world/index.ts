// Interfaces
export type { IPosition, IFacing, IOrientedPosition, IRegionCoordinate, RegionKey, RegionPairKey } from './interfaces/ICoordinates.ts'
export type { TerrainSample, SurfaceType, HazardTag } from './interfaces/ITerrain.ts'
export type { IWorldQuery } from './interfaces/IWorldQuery.ts'
export { createRegionKey, parseRegionKey, createRegionPairKey } from './interfaces/ICoordinates.ts'

// Coordinate utilities
export {
  DEFAULT_REGION_SIZE,
  CARDINALS,
  positionKey,
  samePosition,
  offset,
  step,
  toCell,
  toVector3,
  fromVector3,
  straightLineDistance,
  facingBetween,
  toRegion,
  regionKeyOf,
  regionPairKeyOf,
} from './coordinates/CoordinateUtils.ts'

// Terrain
export { TerrainIds, AIR_TERRAIN_ID, type TerrainId } from './terrain/TerrainIds.ts'
export { TerrainRegistry, type ITerrainRegistration } from './terrain/TerrainRegistry.ts'
export { registerDefaultTerrain } from './terrain/registerDefaultTerrain.ts'

// In-memory world
export { GridWorld } from './GridWorld.ts'
