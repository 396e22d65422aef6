import * as THREE from 'three'
import type { IPosition } from '../world/interfaces/ICoordinates.ts'
import type { FormationType, SlotOffset } from './interfaces/ICoordination.ts'
import { fromVector3, toVector3 } from '../world/coordinates/CoordinateUtils.ts'

const DEFAULT_HEADING = new THREE.Vector3(1, 0, 0)
const UP = new THREE.Vector3(0, 1, 0)

export interface TrailPoint {
  position: IPosition
  /** Horizontal unit direction of travel at this point */
  heading: THREE.Vector3
}

/**
 * Fixed-size ring buffer of positions the leader has passed through.
 */
export class LeaderTrail {
  private readonly points: IPosition[]
  private head = 0
  private count = 0

  constructor(readonly capacity: number) {
    if (capacity < 2) {
      throw new Error(`Trail capacity must be at least 2, got ${capacity}`)
    }
    this.points = new Array<IPosition>(capacity)
  }

  get length(): number {
    return this.count
  }

  /**
   * Append the leader's position. Repeats of the latest point are ignored.
   */
  record(position: IPosition): void {
    const latest = this.at(0)
    if (latest && latest.x === position.x && latest.y === position.y && latest.z === position.z) {
      return
    }
    this.points[this.head] = { x: position.x, y: position.y, z: position.z }
    this.head = (this.head + 1) % this.capacity
    this.count = Math.min(this.count + 1, this.capacity)
  }

  /**
   * Point `i` steps back from the newest (0 is the leader's latest position).
   */
  at(i: number): IPosition | undefined {
    if (i < 0 || i >= this.count) return undefined
    return this.points[(this.head - 1 - i + this.capacity) % this.capacity]
  }

  latest(): IPosition | undefined {
    return this.at(0)
  }

  clear(): void {
    this.head = 0
    this.count = 0
  }

  /**
   * The point `distance` back along the trail from the leader, and the heading
   * of travel there. Short trails clamp to the oldest point.
   */
  pointBehind(distance: number): TrailPoint | null {
    const newest = this.at(0)
    if (!newest) return null

    let remaining = Math.max(0, distance)
    let heading = this.headingAt(0)

    for (let i = 0; i + 1 < this.count; i++) {
      const a = toVector3(this.pointAt(i))
      const b = toVector3(this.pointAt(i + 1))
      const segment = a.distanceTo(b)
      heading = horizontal(a.clone().sub(b)) ?? heading

      if (remaining <= segment) {
        const t = segment === 0 ? 0 : remaining / segment
        return { position: fromVector3(a.lerp(b, t)), heading }
      }
      remaining -= segment
    }

    return { position: this.pointAt(this.count - 1), heading }
  }

  private headingAt(i: number): THREE.Vector3 {
    const a = this.at(i)
    const b = this.at(i + 1)
    if (!a || !b) return DEFAULT_HEADING.clone()
    return horizontal(toVector3(a).sub(toVector3(b))) ?? DEFAULT_HEADING.clone()
  }

  private pointAt(i: number): IPosition {
    const point = this.at(i)
    if (!point) {
      throw new RangeError(`Trail index ${i} out of range (${this.count} points)`)
    }
    return point
  }
}

function horizontal(vector: THREE.Vector3): THREE.Vector3 | null {
  vector.y = 0
  if (vector.lengthSq() === 0) return null
  return vector.normalize()
}

/**
 * Slot of the follower at `rank` (1-based) among `followers` for a formation type.
 */
export function slotOffset(type: FormationType, rank: number, followers: number, spacing: number): SlotOffset {
  const row = Math.ceil(rank / 2)
  const side = rank % 2 === 1 ? 1 : -1

  switch (type) {
    case 'column':
      return { behind: rank * spacing, along: 0, lateral: 0 }
    case 'line':
      return { behind: 0, along: 0, lateral: side * row * spacing }
    case 'wedge':
      return { behind: row * spacing, along: 0, lateral: side * row * spacing }
    case 'circle': {
      const angle = (2 * Math.PI * rank) / (followers + 1)
      return { behind: 0, along: Math.cos(angle) * spacing, lateral: Math.sin(angle) * spacing }
    }
  }
}

/**
 * World position of a slot given the trail point it hangs off.
 */
export function slotPosition(anchor: TrailPoint, offset: SlotOffset): IPosition {
  const right = anchor.heading.clone().cross(UP).normalize()
  const position = toVector3(anchor.position)
    .addScaledVector(anchor.heading, offset.along)
    .addScaledVector(right, offset.lateral)
  return fromVector3(position)
}
