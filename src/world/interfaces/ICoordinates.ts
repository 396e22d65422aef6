/**
 * A cell position in world space.
 * Cells are integer coordinates; y is up.
 */
export interface IPosition {
  readonly x: number
  readonly y: number
  readonly z: number
}

/**
 * Horizontal facing vector (not necessarily normalized).
 */
export interface IFacing {
  readonly x: number
  readonly z: number
}

/**
 * A recorded position with the direction the agent was facing.
 */
export interface IOrientedPosition extends IPosition {
  readonly facing?: IFacing
}

/**
 * Coarse region coordinates. Regions are square columns, like chunks.
 */
export interface IRegionCoordinate {
  readonly x: number
  readonly z: number
}

/**
 * Region key for Map-based storage. Format: "x,z".
 */
export type RegionKey = string

/**
 * Key of an (origin region, destination region) pair. Format: "x,z>x,z".
 */
export type RegionPairKey = string

/**
 * Create a region key from coordinates.
 */
export function createRegionKey(x: number, z: number): RegionKey {
  return `${x},${z}`
}

/**
 * Parse a region key back to coordinates.
 */
export function parseRegionKey(key: RegionKey): IRegionCoordinate {
  const [x, z] = key.split(',').map((s) => Number(s))
  return { x, z }
}

/**
 * Create a region pair key.
 */
export function createRegionPairKey(origin: RegionKey, destination: RegionKey): RegionPairKey {
  return `${origin}>${destination}`
}
