import * as THREE from 'three'
import type { IPosition } from '../world/interfaces/ICoordinates.ts'
import type { HazardRecord } from './interfaces/IHazard.ts'
import { toVector3 } from '../world/coordinates/CoordinateUtils.ts'

/** Spacing of the points sampled along a segment when measuring exposure */
export const SEGMENT_SAMPLE_STEP = 0.25

/**
 * Axis-aligned bounding volume of a hazard.
 */
export class HazardVolume {
  constructor(
    public min: THREE.Vector3,
    public max: THREE.Vector3
  ) {}

  /**
   * Volume centred on the hazard location with half-extent `radius`.
   */
  static fromHazard(hazard: HazardRecord): HazardVolume {
    const center = toVector3(hazard.location)
    const half = new THREE.Vector3(hazard.radius, hazard.radius, hazard.radius)
    return new HazardVolume(center.clone().sub(half), center.clone().add(half))
  }

  /**
   * Euclidean distance from a point to this volume (0 inside).
   */
  distanceToPoint(point: THREE.Vector3): number {
    const dx = Math.max(this.min.x - point.x, 0, point.x - this.max.x)
    const dy = Math.max(this.min.y - point.y, 0, point.y - this.max.y)
    const dz = Math.max(this.min.z - point.z, 0, point.z - this.max.z)
    return Math.sqrt(dx * dx + dy * dy + dz * dz)
  }

  containsPoint(point: THREE.Vector3): boolean {
    return this.distanceToPoint(point) === 0
  }
}

const volumeCache = new WeakMap<HazardRecord, HazardVolume>()

function volumeOf(hazard: HazardRecord): HazardVolume {
  let volume = volumeCache.get(hazard)
  if (!volume) {
    volume = HazardVolume.fromHazard(hazard)
    volumeCache.set(hazard, volume)
  }
  return volume
}

/**
 * Distance from a point to a hazard's bounding volume.
 */
export function clearanceTo(point: IPosition, hazard: HazardRecord): number {
  return volumeOf(hazard).distanceToPoint(toVector3(point))
}

/**
 * Points sampled every SEGMENT_SAMPLE_STEP along a segment, both ends included.
 */
export function sampleSegment(a: IPosition, b: IPosition): THREE.Vector3[] {
  const start = toVector3(a)
  const end = toVector3(b)
  const steps = Math.max(1, Math.ceil(start.distanceTo(end) / SEGMENT_SAMPLE_STEP))
  const points: THREE.Vector3[] = []
  for (let i = 0; i <= steps; i++) {
    points.push(start.clone().lerp(end, i / steps))
  }
  return points
}

/**
 * Smallest clearance between a segment's centreline and a hazard.
 * Planner and filter both measure through here so they always agree.
 */
export function segmentClearance(a: IPosition, b: IPosition, hazard: HazardRecord): number {
  const volume = volumeOf(hazard)
  const start = toVector3(a)
  const delta = toVector3(b).sub(start)
  const axes = ['x', 'y', 'z'] as const

  // Squared distance is quadratic between the parameters where the segment crosses a face plane
  const breaks = [0, 1]
  for (const axis of axes) {
    if (delta[axis] === 0) continue
    for (const bound of [volume.min[axis], volume.max[axis]]) {
      const t = (bound - start[axis]) / delta[axis]
      if (t > 0 && t < 1) breaks.push(t)
    }
  }
  breaks.sort((p, q) => p - q)

  const pointAt = (t: number): THREE.Vector3 => start.clone().addScaledVector(delta, t)
  let min = Infinity

  for (let i = 0; i < breaks.length; i++) {
    min = Math.min(min, volume.distanceToPoint(pointAt(breaks[i])))
    if (min === 0) break
    if (i === breaks.length - 1) continue

    const t0 = breaks[i]
    const t1 = breaks[i + 1]
    const mid = pointAt((t0 + t1) / 2)
    let quadratic = 0
    let linear = 0
    for (const axis of axes) {
      const bound = mid[axis] < volume.min[axis] ? volume.min[axis] : mid[axis] > volume.max[axis] ? volume.max[axis] : null
      if (bound === null) continue
      quadratic += delta[axis] * delta[axis]
      linear += delta[axis] * (start[axis] - bound)
    }
    if (quadratic === 0) {
      // Flat stretch: the distance is the same anywhere in the interval
      min = Math.min(min, volume.distanceToPoint(mid))
      continue
    }

    const t = -linear / quadratic
    if (t > t0 && t < t1) {
      min = Math.min(min, volume.distanceToPoint(pointAt(t)))
    }
  }

  return min
}

/**
 * Fraction of a segment's sample points that lie inside the hazard volume.
 */
export function fractionInside(a: IPosition, b: IPosition, hazard: HazardRecord): number {
  const volume = volumeOf(hazard)
  const points = sampleSegment(a, b)
  let inside = 0
  for (const point of points) {
    if (volume.containsPoint(point)) inside++
  }
  return inside / points.length
}
