import type { IPosition } from '../../src/world/interfaces/ICoordinates.ts'
import type { MovementMode } from '../../src/movement/interfaces/IMovement.ts'
import type { Path, Waypoint } from '../../src/pathfinding/interfaces/IPathfinding.ts'
import { GridWorld } from '../../src/world/GridWorld.ts'
import { TerrainIds } from '../../src/world/terrain/TerrainIds.ts'
import { DEFAULT_REGION_SIZE, regionKeyOf, straightLineDistance } from '../../src/world/coordinates/CoordinateUtils.ts'

/**
 * One-cell-wide stone strip at y=0, x from 0 to length-1.
 */
export function flatStrip(length: number): GridWorld {
  const world = new GridWorld([length, 4, 1])
  world.fill({ x: 0, y: 0, z: 0 }, { x: length - 1, y: 0, z: 0 }, TerrainIds.STONE)
  return world
}

/**
 * Strip with `left` stone cells, `gap` empty cells, then `right` stone cells.
 */
export function gappedStrip(left: number, gap: number, right: number): GridWorld {
  const width = left + gap + right
  const world = new GridWorld([width, 4, 1])
  world.fill({ x: 0, y: 0, z: 0 }, { x: left - 1, y: 0, z: 0 }, TerrainIds.STONE)
  world.fill({ x: left + gap, y: 0, z: 0 }, { x: width - 1, y: 0, z: 0 }, TerrainIds.STONE)
  return world
}

/**
 * Open stone floor at y=0.
 */
export function stoneField(width: number, depth: number): GridWorld {
  const world = new GridWorld([width, 4, depth])
  world.fill({ x: 0, y: 0, z: 0 }, { x: width - 1, y: 0, z: depth - 1 }, TerrainIds.STONE)
  return world
}

/**
 * Hand-built walking path through `points`, one second per cell.
 */
export function pathThrough(id: string, points: IPosition[], overrides: Partial<Path> = {}): Path {
  const mode: MovementMode = 'walk'
  let time = 0
  const waypoints: Waypoint[] = points.map((position, i) => {
    if (i > 0) time += straightLineDistance(points[i - 1], position)
    return {
      position,
      terrainFactor: 1,
      hazardRefs: [],
      edge: i === 0 ? 'start' : 'walk',
      mode,
      arrivalTime: time,
    }
  })

  return {
    id,
    originRegion: regionKeyOf(points[0], DEFAULT_REGION_SIZE),
    destinationRegion: regionKeyOf(points[points.length - 1], DEFAULT_REGION_SIZE),
    waypoints,
    modeSequence: [mode],
    timeEstimate: time,
    confidenceRating: 0.5,
    createdAt: 0,
    lastValidatedAt: 0,
    status: 'fresh',
    requiredCapabilities: ['walk'],
    verifiedThrough: -1,
    version: 1,
    ...overrides,
  }
}
