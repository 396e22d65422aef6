import type { IPosition } from '../world/interfaces/ICoordinates.ts'
import type { Waypoint } from './interfaces/IPathfinding.ts'

/**
 * Merge runs of collinear walk waypoints that share mode, terrain factor and
 * hazard refs. A straight route over uniform ground collapses to its endpoints.
 *
 * Only level walk edges are merged; every other edge kind marks a point where
 * the motion controller has to do something different.
 */
export function smoothWaypoints(waypoints: readonly Waypoint[]): Waypoint[] {
  if (waypoints.length <= 2) return [...waypoints]

  const result: Waypoint[] = [waypoints[0]]

  for (let i = 1; i < waypoints.length - 1; i++) {
    const previous = result[result.length - 1]
    const current = waypoints[i]
    const next = waypoints[i + 1]

    if (canMerge(previous, current, next)) continue
    result.push(current)
  }

  result.push(waypoints[waypoints.length - 1])
  return result
}

function canMerge(previous: Waypoint, current: Waypoint, next: Waypoint): boolean {
  return (
    current.edge === 'walk' &&
    next.edge === 'walk' &&
    current.mode === next.mode &&
    current.terrainFactor === next.terrainFactor &&
    sameRefs(current.hazardRefs, next.hazardRefs) &&
    sameDirection(previous.position, current.position, next.position)
  )
}

function sameRefs(a: readonly string[], b: readonly string[]): boolean {
  return a.length === b.length && a.every((id, i) => id === b[i])
}

/**
 * True when a→b and b→c point the same way on a level plane.
 */
function sameDirection(a: IPosition, b: IPosition, c: IPosition): boolean {
  const ab = { x: b.x - a.x, y: b.y - a.y, z: b.z - a.z }
  const bc = { x: c.x - b.x, y: c.y - b.y, z: c.z - b.z }
  if (ab.y !== 0 || bc.y !== 0) return false

  const cross = ab.x * bc.z - ab.z * bc.x
  const dot = ab.x * bc.x + ab.z * bc.z
  return cross === 0 && dot > 0
}
