/**
 * Example usage of the navigation core.
 * Builds a small stone world, plans a route, then walks a three-agent squad
 * across it with the kinematic motion controller.
 */

import type { MissionReport } from '../coordination/interfaces/ICoordination.ts'
import { NavigationCore } from '../NavigationCore.ts'
import { GridWorld } from '../world/GridWorld.ts'
import { TerrainIds } from '../world/terrain/TerrainIds.ts'
import { capabilitiesOf } from '../movement/TerrainCost.ts'
import { KinematicMotionController } from './KinematicMotionController.ts'

/**
 * 40x8x12 world: stone floor at y=0 with a wall at x=20 that has a two-cell door.
 */
export function createExampleWorld(): GridWorld {
  const world = new GridWorld([40, 8, 12])
  world.fill({ x: 0, y: 0, z: 0 }, { x: 39, y: 0, z: 11 }, TerrainIds.STONE)
  world.fill({ x: 20, y: 1, z: 0 }, { x: 20, y: 3, z: 11 }, TerrainIds.STONE)
  world.fill({ x: 20, y: 1, z: 5 }, { x: 20, y: 2, z: 6 }, TerrainIds.AIR)
  return world
}

/**
 * Example: a single path request.
 */
export async function examplePathRequest(): Promise<void> {
  const motion = new KinematicMotionController()
  const core = new NavigationCore({ world: createExampleWorld(), motion, config: { debug: true } })

  const result = await core.requestPath(
    { x: 2, y: 1, z: 2 },
    { x: 36, y: 1, z: 9 },
    capabilitiesOf('walk', 'sprint')
  )

  if (result.success) {
    console.log('Path found!')
    console.log('Waypoints:', result.path.waypoints.length)
    console.log('Time estimate:', result.path.timeEstimate.toFixed(2), 's')
    console.log('Nodes explored:', result.nodesExplored)
  } else {
    console.log(`No path found (${result.error.reason}): ${result.error.message}`)
  }

  console.log('Service stats:', core.service.getStats())
  core.dispose()
}

/**
 * Example: leader and two followers through the door, in column.
 */
export async function exampleSquadMission(maxTicks: number = 400): Promise<MissionReport | null> {
  const motion = new KinematicMotionController({ cellsPerTick: 0.5 })
  const core = new NavigationCore({ world: createExampleWorld(), motion })
  const capabilities = capabilitiesOf('walk', 'sprint')

  const squad = [
    { id: 'scout', position: { x: 6, y: 1, z: 5 } },
    { id: 'medic', position: { x: 4, y: 1, z: 5 } },
    { id: 'porter', position: { x: 2, y: 1, z: 5 } },
  ]
  for (const member of squad) {
    motion.place(member.id, member.position)
    core.registerAgent({ ...member, capabilities })
  }

  core.onTick((tick) => motion.tick(tick))
  core.onStuck((error) => console.log(`[Squad] ${error.message}`))
  core.onEscalated((error) => console.log(`[Squad] ${error.message}`))

  const mission = core.startMission({
    leaderId: 'scout',
    followerIds: ['medic', 'porter'],
    destination: { x: 34, y: 1, z: 5 },
    regroupPoint: { x: 8, y: 1, z: 5 },
    formation: { type: 'column' },
  })

  for (let i = 0; i < maxTicks && mission.status !== 'complete' && mission.status !== 'aborted'; i++) {
    await core.advance(1)
  }

  const report = core.missionReport()
  console.log(`Mission ${mission.missionId}: ${mission.status} after ${core.clock.currentTick} ticks`)
  core.dispose()
  return report
}
