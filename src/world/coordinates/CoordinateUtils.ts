import * as THREE from 'three'
import {
  createRegionKey,
  createRegionPairKey,
  type IFacing,
  type IPosition,
  type IRegionCoordinate,
  type RegionKey,
  type RegionPairKey,
} from '../interfaces/ICoordinates.ts'

/** Default region edge length in cells */
export const DEFAULT_REGION_SIZE = 32

/** Unit steps along the four horizontal directions, in expansion order */
export const CARDINALS: readonly IPosition[] = [
  { x: 1, y: 0, z: 0 },
  { x: -1, y: 0, z: 0 },
  { x: 0, y: 0, z: 1 },
  { x: 0, y: 0, z: -1 },
]

/**
 * Create a position key for Set/Map storage.
 */
export function positionKey(pos: IPosition): string {
  return `${pos.x},${pos.y},${pos.z}`
}

export function samePosition(a: IPosition, b: IPosition): boolean {
  return a.x === b.x && a.y === b.y && a.z === b.z
}

export function offset(pos: IPosition, dx: number, dy: number, dz: number): IPosition {
  return { x: pos.x + dx, y: pos.y + dy, z: pos.z + dz }
}

/**
 * `pos + dir * k`
 */
export function step(pos: IPosition, dir: IPosition, k: number = 1): IPosition {
  return { x: pos.x + dir.x * k, y: pos.y + dir.y * k, z: pos.z + dir.z * k }
}

/**
 * Nearest cell to a (possibly fractional) position.
 */
export function toCell(pos: IPosition): IPosition {
  return { x: Math.round(pos.x), y: Math.round(pos.y), z: Math.round(pos.z) }
}

export function toVector3(pos: IPosition): THREE.Vector3 {
  return new THREE.Vector3(pos.x, pos.y, pos.z)
}

export function fromVector3(vec: THREE.Vector3): IPosition {
  return { x: vec.x, y: vec.y, z: vec.z }
}

/**
 * Euclidean distance between two positions.
 */
export function straightLineDistance(a: IPosition, b: IPosition): number {
  return toVector3(a).distanceTo(toVector3(b))
}

/**
 * Horizontal facing from one position toward another (null if directly above/below).
 */
export function facingBetween(from: IPosition, to: IPosition): IFacing | null {
  const dx = to.x - from.x
  const dz = to.z - from.z
  const length = Math.hypot(dx, dz)
  if (length === 0) return null
  return { x: dx / length, z: dz / length }
}

/**
 * Convert a position to region coordinates.
 * Uses floor division so negative coordinates land in the right region.
 */
export function toRegion(pos: IPosition, regionSize: number = DEFAULT_REGION_SIZE): IRegionCoordinate {
  return {
    x: Math.floor(pos.x / regionSize),
    z: Math.floor(pos.z / regionSize),
  }
}

export function regionKeyOf(pos: IPosition, regionSize: number = DEFAULT_REGION_SIZE): RegionKey {
  const region = toRegion(pos, regionSize)
  return createRegionKey(region.x, region.z)
}

export function regionPairKeyOf(
  origin: IPosition,
  destination: IPosition,
  regionSize: number = DEFAULT_REGION_SIZE
): RegionPairKey {
  return createRegionPairKey(regionKeyOf(origin, regionSize), regionKeyOf(destination, regionSize))
}
