import { describe, it, expect } from 'vitest'
import type { Path, PlanResult } from '../../src/pathfinding/interfaces/IPathfinding.ts'
import type { HazardRecord } from '../../src/hazards/interfaces/IHazard.ts'
import { RoutePlanner } from '../../src/pathfinding/RoutePlanner.ts'
import { RegionRouteSearch } from '../../src/pathfinding/RegionRouteSearch.ts'
import { GridWorld } from '../../src/world/GridWorld.ts'
import { capabilitiesOf } from '../../src/movement/TerrainCost.ts'
import { segmentClearance } from '../../src/hazards/HazardVolume.ts'
import { straightLineDistance } from '../../src/world/coordinates/CoordinateUtils.ts'
import { TerrainIds } from '../../src/world/terrain/TerrainIds.ts'
import { flatStrip, gappedStrip, stoneField } from '../support/worlds.ts'

const SPRINT = 5.612

function expectPath(result: PlanResult): Path {
  if (!result.success) {
    throw new Error(`expected a path, got ${result.error.reason}: ${result.error.message}`)
  }
  return result.path
}

function expectFailure(result: PlanResult): string {
  if (result.success) {
    throw new Error(`expected no path, got ${result.path.id}`)
  }
  return result.error.reason
}

describe('RoutePlanner', () => {
  const walkers = capabilitiesOf('walk', 'sprint')
  const builders = capabilitiesOf('walk', 'sprint', 'build')

  describe('flat terrain', () => {
    it('sprints a straight strip in two waypoints', () => {
      const planner = new RoutePlanner(flatStrip(101))
      const path = expectPath(planner.plan({ x: 0, y: 1, z: 0 }, { x: 100, y: 1, z: 0 }, walkers))

      expect(path.waypoints).toHaveLength(2)
      expect(path.waypoints[0].position).toEqual({ x: 0, y: 1, z: 0 })
      expect(path.waypoints[1].position).toEqual({ x: 100, y: 1, z: 0 })
      expect(path.modeSequence).toEqual(['sprint'])
      expect(path.timeEstimate).toBeCloseTo(100 / SPRINT, 6)
    })

    it('starts fresh with the configured confidence', () => {
      const planner = new RoutePlanner(flatStrip(10), { initialConfidence: 0.7 })
      const path = expectPath(planner.plan({ x: 0, y: 1, z: 0 }, { x: 9, y: 1, z: 0 }, walkers, { now: 1234 }))

      expect(path.status).toBe('fresh')
      expect(path.confidenceRating).toBe(0.7)
      expect(path.verifiedThrough).toBe(-1)
      expect(path.version).toBe(1)
      expect(path.createdAt).toBe(1234)
      expect(path.lastValidatedAt).toBe(1234)
      expect(path.requiredCapabilities).toEqual(['sprint'])
    })

    it('never beats straight-line distance at the speed ceiling', () => {
      const planner = new RoutePlanner(stoneField(12, 12))
      const origin = { x: 1, y: 1, z: 1 }
      const destination = { x: 10, y: 1, z: 8 }
      const path = expectPath(planner.plan(origin, destination, walkers))

      expect(path.timeEstimate).toBeGreaterThanOrEqual(straightLineDistance(origin, destination) / SPRINT)
    })

    it('gives the same route for the same request', () => {
      const planner = new RoutePlanner(stoneField(12, 12))
      const origin = { x: 1, y: 1, z: 1 }
      const destination = { x: 10, y: 1, z: 8 }

      const first = expectPath(planner.plan(origin, destination, walkers))
      const second = expectPath(planner.plan(origin, destination, walkers))

      expect(second.waypoints.map((w) => w.position)).toEqual(first.waypoints.map((w) => w.position))
      expect(second.timeEstimate).toBe(first.timeEstimate)
      expect(second.id).not.toBe(first.id)
    })

    it('detours around risky terrain when the detour is cheaper', () => {
      const world = stoneField(5, 3)
      world.fill({ x: 1, y: 0, z: 1 }, { x: 3, y: 0, z: 1 }, TerrainIds.THIN_ICE)
      const planner = new RoutePlanner(world)

      const path = expectPath(planner.plan({ x: 0, y: 1, z: 1 }, { x: 4, y: 1, z: 1 }, walkers))

      // Six plain cells beat four cells, three of them on thin ice
      expect(path.timeEstimate).toBeCloseTo(6 / SPRINT, 6)
      for (const waypoint of path.waypoints.slice(1, -1)) {
        expect(waypoint.position.z).not.toBe(1)
      }
    })
  })

  describe('gaps', () => {
    it('walks across a one-cell gap', () => {
      const planner = new RoutePlanner(gappedStrip(5, 1, 5))
      const path = expectPath(planner.plan({ x: 0, y: 1, z: 0 }, { x: 10, y: 1, z: 0 }, walkers))

      expect(path.waypoints.map((w) => w.edge)).toEqual(['start', 'walk'])
      expect(path.timeEstimate).toBeCloseTo(10 / SPRINT, 6)
    })

    it('jumps a two-cell gap', () => {
      const planner = new RoutePlanner(gappedStrip(5, 2, 5))
      const path = expectPath(planner.plan({ x: 0, y: 1, z: 0 }, { x: 11, y: 1, z: 0 }, walkers))

      expect(path.waypoints.map((w) => w.edge)).toEqual(['start', 'walk', 'jump', 'walk'])
      expect(path.waypoints[2].position).toEqual({ x: 7, y: 1, z: 0 })
      expect(path.timeEstimate).toBeCloseTo(8 / SPRINT + 3 / SPRINT / 0.85, 6)
    })

    it('bridges a three-cell gap instead of jumping it', () => {
      const planner = new RoutePlanner(gappedStrip(5, 3, 5))
      const path = expectPath(planner.plan({ x: 0, y: 1, z: 0 }, { x: 12, y: 1, z: 0 }, builders))

      expect(path.waypoints.map((w) => w.edge)).toEqual(['start', 'walk', 'bridge', 'walk'])
      expect(path.waypoints.map((w) => w.position.x)).toEqual([0, 4, 8, 12])
      expect(path.requiredCapabilities).toEqual(['sprint', 'build'])
      expect(path.timeEstimate).toBeCloseTo(3 * 1.5 + 12 / SPRINT, 6)
    })

    it('finds nothing across a three-cell gap without build', () => {
      const planner = new RoutePlanner(gappedStrip(5, 3, 5))
      const result = planner.plan({ x: 0, y: 1, z: 0 }, { x: 12, y: 1, z: 0 }, walkers)

      expect(expectFailure(result)).toBe('unreachable')
    })

    it.each([3, 4, 5, 6])('bridges and never jumps a %i-cell gap', (gap) => {
      const planner = new RoutePlanner(gappedStrip(5, gap, 5))
      const destination = { x: gap + 9, y: 1, z: 0 }

      const path = expectPath(planner.plan({ x: 0, y: 1, z: 0 }, destination, builders))
      expect(path.waypoints.map((w) => w.edge)).toEqual(['start', 'walk', 'bridge', 'walk'])
      expect(path.waypoints[2].position).toEqual({ x: 5 + gap, y: 1, z: 0 })
      expect(path.timeEstimate).toBeCloseTo(gap * 1.5 + (gap + 9) / SPRINT, 6)

      expect(expectFailure(planner.plan({ x: 0, y: 1, z: 0 }, destination, walkers))).toBe('unreachable')
    })

    it('gives up on a gap wider than the bridge span', () => {
      const planner = new RoutePlanner(gappedStrip(5, 7, 5))
      const result = planner.plan({ x: 0, y: 1, z: 0 }, { x: 16, y: 1, z: 0 }, builders)

      expect(expectFailure(result)).toBe('unreachable')
    })
  })

  describe('rises and drops', () => {
    /** Stone floor, then a solid block of `rise` cells from x=5 on */
    function ledge(rise: number): GridWorld {
      const world = new GridWorld([10, rise + 4, 1])
      world.fill({ x: 0, y: 0, z: 0 }, { x: 9, y: 0, z: 0 }, TerrainIds.STONE)
      world.fill({ x: 5, y: 1, z: 0 }, { x: 9, y: rise, z: 0 }, TerrainIds.STONE)
      return world
    }

    it('steps up a one-cell rise', () => {
      const planner = new RoutePlanner(ledge(1))
      const path = expectPath(planner.plan({ x: 0, y: 1, z: 0 }, { x: 9, y: 2, z: 0 }, walkers))

      expect(path.waypoints.map((w) => w.edge)).toEqual(['start', 'walk', 'step', 'walk'])
      expect(path.waypoints[2].position).toEqual({ x: 5, y: 2, z: 0 })
      expect(path.timeEstimate).toBeCloseTo(9 / SPRINT + 0.25, 6)
      expect(path.requiredCapabilities).toEqual(['sprint'])
    })

    it('needs build to ascend a three-cell rise', () => {
      const planner = new RoutePlanner(ledge(3))
      const path = expectPath(planner.plan({ x: 0, y: 1, z: 0 }, { x: 9, y: 4, z: 0 }, builders))

      expect(path.waypoints.map((w) => w.edge)).toEqual(['start', 'walk', 'ascent', 'walk'])
      expect(path.waypoints[2].position).toEqual({ x: 5, y: 4, z: 0 })
      // setup plus 1.2s per cell climbed
      expect(path.timeEstimate).toBeCloseTo(9 / SPRINT + 2 + 3 * 1.2, 6)
      expect(path.requiredCapabilities).toEqual(['sprint', 'build'])

      const result = planner.plan({ x: 0, y: 1, z: 0 }, { x: 9, y: 4, z: 0 }, walkers)
      expect(expectFailure(result)).toBe('unreachable')
    })

    /** Stone column of `height` cells for x 0-4, floor at y=0 beyond */
    function cliff(height: number): GridWorld {
      const world = new GridWorld([10, height + 4, 1])
      world.fill({ x: 0, y: 0, z: 0 }, { x: 4, y: height - 1, z: 0 }, TerrainIds.STONE)
      world.fill({ x: 5, y: 0, z: 0 }, { x: 9, y: 0, z: 0 }, TerrainIds.STONE)
      return world
    }

    it('drops down a two-cell ledge', () => {
      const planner = new RoutePlanner(cliff(3))
      const path = expectPath(planner.plan({ x: 0, y: 3, z: 0 }, { x: 9, y: 1, z: 0 }, walkers))

      expect(path.waypoints.map((w) => w.edge)).toEqual(['start', 'walk', 'drop', 'walk'])
      expect(path.waypoints[2].position).toEqual({ x: 5, y: 1, z: 0 })
      // a short fall is bounded by the straight-line floor
      expect(path.timeEstimate).toBeCloseTo((8 + Math.sqrt(5)) / SPRINT, 6)
    })

    it('will not drop further than the safe fall distance', () => {
      const planner = new RoutePlanner(cliff(5))
      const result = planner.plan({ x: 0, y: 5, z: 0 }, { x: 9, y: 1, z: 0 }, walkers)

      expect(expectFailure(result)).toBe('unreachable')
    })

    it('climbs a ladder with the climb capability', () => {
      const world = new GridWorld([6, 8, 1])
      world.fill({ x: 0, y: 0, z: 0 }, { x: 5, y: 0, z: 0 }, TerrainIds.STONE)
      world.fill({ x: 3, y: 1, z: 0 }, { x: 5, y: 4, z: 0 }, TerrainIds.STONE)
      world.fill({ x: 2, y: 1, z: 0 }, { x: 2, y: 5, z: 0 }, TerrainIds.LADDER)
      const planner = new RoutePlanner(world)
      const origin = { x: 0, y: 1, z: 0 }
      const destination = { x: 5, y: 5, z: 0 }

      const path = expectPath(planner.plan(origin, destination, capabilitiesOf('walk', 'sprint', 'climb')))
      // two rungs up, then a two-cell step off the ladder beats climbing to the top
      expect(path.waypoints.map((w) => w.edge)).toEqual(['start', 'walk', 'walk', 'climb', 'climb', 'step', 'walk'])
      expect(path.waypoints[5].position).toEqual({ x: 3, y: 5, z: 0 })
      expect(path.modeSequence).toEqual(['sprint', 'walk', 'climb', 'sprint'])
      expect(path.requiredCapabilities).toEqual(['walk', 'sprint', 'climb'])
      expect(path.timeEstimate).toBeCloseTo(4 / SPRINT + 1 / 4.317 + 2 / 2.35 + 2 * 0.25, 6)

      expect(expectFailure(planner.plan(origin, destination, walkers))).toBe('unreachable')
    })
  })

  describe('liquids', () => {
    /** Stone for x 0-4, `width` cells of water at floor level, then 5 cells of stone */
    function channel(width: number): GridWorld {
      const length = width + 10
      const world = new GridWorld([length, 4, 1])
      world.fill({ x: 0, y: 0, z: 0 }, { x: 4, y: 0, z: 0 }, TerrainIds.STONE)
      world.fill({ x: 5, y: 0, z: 0 }, { x: width + 4, y: 0, z: 0 }, TerrainIds.WATER)
      world.fill({ x: width + 5, y: 0, z: 0 }, { x: length - 1, y: 0, z: 0 }, TerrainIds.STONE)
      return world
    }

    const swimmers = capabilitiesOf('walk', 'sprint', 'swim')

    it('swims a crossing within the swim threshold', () => {
      const planner = new RoutePlanner(channel(3))
      const path = expectPath(planner.plan({ x: 0, y: 1, z: 0 }, { x: 12, y: 1, z: 0 }, swimmers))

      expect(path.waypoints.map((w) => w.edge)).toEqual(['start', 'walk', 'swim', 'walk'])
      expect(path.waypoints.map((w) => w.position.x)).toEqual([0, 4, 8, 12])
      expect(path.modeSequence).toEqual(['sprint', 'swim', 'sprint'])
      expect(path.requiredCapabilities).toEqual(['sprint', 'swim'])
      expect(path.timeEstimate).toBeCloseTo(9 / SPRINT + 3 / 2.2, 6)
    })

    it('does not swim a crossing wider than the threshold', () => {
      const planner = new RoutePlanner(channel(6))
      const result = planner.plan({ x: 0, y: 1, z: 0 }, { x: 15, y: 1, z: 0 }, swimmers)

      expect(expectFailure(result)).toBe('unreachable')
    })

    it('bridges a wide crossing', () => {
      const planner = new RoutePlanner(channel(6))
      const path = expectPath(planner.plan({ x: 0, y: 1, z: 0 }, { x: 15, y: 1, z: 0 }, builders))

      expect(path.waypoints.map((w) => w.edge)).toEqual(['start', 'walk', 'bridge', 'walk'])
      expect(path.waypoints[2].position).toEqual({ x: 11, y: 1, z: 0 })
      expect(path.timeEstimate).toBeCloseTo(6 * 1.5 + 15 / SPRINT, 6)
    })

    it('boards a vessel across a wide crossing', () => {
      const riders = capabilitiesOf('walk', 'ride')
      const planner = new RoutePlanner(channel(6))
      const path = expectPath(planner.plan({ x: 0, y: 1, z: 0 }, { x: 15, y: 1, z: 0 }, riders))

      expect(path.waypoints.map((w) => w.edge)).toEqual(['start', 'walk', 'vessel', 'walk'])
      expect(path.modeSequence).toEqual(['ride'])
      expect(path.requiredCapabilities).toEqual(['ride'])
      // 8 cells/s overland, 3s to board
      expect(path.timeEstimate).toBeCloseTo(15 / 8 + 3, 6)
    })
  })

  describe('long trips', () => {
    it('plans a trip beyond one search range region by region', () => {
      const planner = new RoutePlanner(flatStrip(101), { maxDistance: 60 })
      const origin = { x: 0, y: 1, z: 0 }
      const destination = { x: 100, y: 1, z: 0 }

      const search = planner.createSearch(origin, destination, walkers)
      expect(search).toBeInstanceOf(RegionRouteSearch)

      const result = planner.plan(origin, destination, walkers)
      const path = expectPath(result)
      // legs 0 -> 48 (region anchor) and 48 -> 100, the joint smoothed away
      expect(path.waypoints.map((w) => w.position)).toEqual([origin, destination])
      expect(path.timeEstimate).toBeCloseTo(100 / SPRINT, 6)
      expect(path.waypoints[1].arrivalTime).toBeCloseTo(100 / SPRINT, 6)
      expect(path.originRegion).toBe('0,0')
      expect(path.destinationRegion).toBe('3,0')
      expect(result.nodesExplored).toBe(49 + 53)
    })

    it('fails when no region between the endpoints can be stood in', () => {
      const world = new GridWorld([101, 4, 1])
      world.fill({ x: 0, y: 0, z: 0 }, { x: 31, y: 0, z: 0 }, TerrainIds.STONE)
      world.fill({ x: 64, y: 0, z: 0 }, { x: 100, y: 0, z: 0 }, TerrainIds.STONE)
      const planner = new RoutePlanner(world, { maxDistance: 60 })

      const result = planner.plan({ x: 0, y: 1, z: 0 }, { x: 100, y: 1, z: 0 }, builders)
      expect(expectFailure(result)).toBe('unreachable')
      expect(result.nodesExplored).toBe(0)
    })
  })

  describe('hazards', () => {
    it('keeps lethal clearance from a hazard beside the direct line', () => {
      const planner = new RoutePlanner(stoneField(21, 15))
      const hazard: HazardRecord = {
        id: 'pit',
        type: 'fall',
        location: { x: 10, y: 1, z: 9 },
        radius: 0,
        severity: 'lethal',
      }

      const path = expectPath(planner.plan({ x: 0, y: 1, z: 7 }, { x: 20, y: 1, z: 7 }, walkers, { hazards: [hazard] }))

      expect(path.waypoints.length).toBeGreaterThan(2)
      for (let i = 1; i < path.waypoints.length; i++) {
        const clearance = segmentClearance(path.waypoints[i - 1].position, path.waypoints[i].position, hazard)
        expect(clearance).toBeGreaterThanOrEqual(3)
      }
      expect(path.timeEstimate).toBeGreaterThan(20 / SPRINT)
    })
  })

  describe('failures', () => {
    it('rejects an endpoint that cannot be stood on', () => {
      const planner = new RoutePlanner(flatStrip(101))
      const result = planner.plan({ x: 0, y: 1, z: 0 }, { x: 50, y: 3, z: 0 }, walkers)

      expect(expectFailure(result)).toBe('invalid-endpoint')
      expect(result.nodesExplored).toBe(0)
    })

    it('rejects an agent without movement modes', () => {
      const planner = new RoutePlanner(flatStrip(10))
      const result = planner.plan({ x: 0, y: 1, z: 0 }, { x: 9, y: 1, z: 0 }, capabilitiesOf('build'))

      expect(expectFailure(result)).toBe('invalid-endpoint')
    })

    it('rejects endpoints further apart than the planning range', () => {
      const planner = new RoutePlanner(flatStrip(101), { maxDistance: 10, maxRegionTrip: 50 })
      const result = planner.plan({ x: 0, y: 1, z: 0 }, { x: 100, y: 1, z: 0 }, walkers)

      expect(expectFailure(result)).toBe('out-of-range')
      expect(result.nodesExplored).toBe(0)
    })

    it('stops at the node limit', () => {
      const planner = new RoutePlanner(flatStrip(101), { maxNodes: 5 })
      const result = planner.plan({ x: 0, y: 1, z: 0 }, { x: 100, y: 1, z: 0 }, walkers)

      expect(expectFailure(result)).toBe('node-limit')
      expect(result.nodesExplored).toBe(5)
    })

    it('reports cancellation', () => {
      const planner = new RoutePlanner(flatStrip(101))
      const controller = new AbortController()
      controller.abort()

      const result = planner.plan({ x: 0, y: 1, z: 0 }, { x: 100, y: 1, z: 0 }, walkers, {
        signal: controller.signal,
      })

      expect(expectFailure(result)).toBe('cancelled')
    })
  })

  describe('createSearch', () => {
    it('can be stepped to completion', () => {
      const planner = new RoutePlanner(flatStrip(30))
      const search = planner.createSearch({ x: 0, y: 1, z: 0 }, { x: 29, y: 1, z: 0 }, walkers)

      let status = search.step(Infinity)
      while (!status.done) {
        status = search.step(Infinity)
      }

      expect(status.result.success).toBe(true)
      expect(search.step().done).toBe(true)
      expect(search.explored).toBe(30)
    })
  })
})
