import { describe, it, expect, vi, afterEach } from 'vitest'
import type { IPosition } from '../../src/world/interfaces/ICoordinates.ts'
import { HazardCritical, type AgentEscalated, type MissionAborted, type StuckTimeout } from '../../src/core/errors.ts'
import type { MissionController } from '../../src/coordination/MissionController.ts'
import { NavigationCore } from '../../src/NavigationCore.ts'
import type { NavigationOverrides } from '../../src/config/NavigationConfig.ts'
import { KinematicMotionController } from '../../src/simulation/KinematicMotionController.ts'
import { capabilitiesOf } from '../../src/movement/TerrainCost.ts'
import { stoneField } from '../support/worlds.ts'
import { until } from '../support/async.ts'
import { straightLineDistance } from '../../src/world/coordinates/CoordinateUtils.ts'

const squad: Array<{ id: string; position: IPosition }> = [
  { id: 'scout', position: { x: 6, y: 1, z: 4 } },
  { id: 'medic', position: { x: 4, y: 1, z: 4 } },
  { id: 'porter', position: { x: 2, y: 1, z: 4 } },
]

const regroupPoint: IPosition = { x: 6, y: 1, z: 4 }

function setup(config: NavigationOverrides = {}) {
  const motion = new KinematicMotionController({ cellsPerTick: 1 })
  const world = stoneField(30, 9)
  const core = new NavigationCore({ world, motion, config })
  for (const member of squad) {
    motion.place(member.id, member.position)
    core.registerAgent({ ...member, capabilities: capabilitiesOf('walk', 'sprint') })
  }
  core.onTick((tick) => motion.tick(tick))
  return { core, motion, world }
}

function leaderHasPath(core: NavigationCore, agentId: string = 'scout'): boolean {
  return (core.navigator(agentId)?.currentPath ?? null) !== null
}

async function runUntil(core: NavigationCore, done: () => boolean, maxTicks: number): Promise<void> {
  for (let i = 0; i < maxTicks && !done(); i++) {
    await core.advance(1)
  }
}

function finished(mission: MissionController): boolean {
  return mission.status === 'complete' || mission.status === 'aborted'
}

describe('MissionController', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('takes a lone leader to the destination', async () => {
    const { core, motion } = setup()
    const mission = core.startMission({
      id: 'solo',
      leaderId: 'scout',
      followerIds: [],
      destination: { x: 12, y: 1, z: 4 },
      regroupPoint,
    })
    expect(mission.status).toBe('planning')

    await runUntil(core, () => finished(mission), 40)

    expect(mission.status).toBe('complete')
    expect(motion.positionOf('scout')).toEqual({ x: 12, y: 1, z: 4 })
    const report = core.missionReport()
    expect(report?.regroups).toBe(0)
    expect(report?.lastGoodPathId).not.toBeNull()
    core.dispose()
  })

  it('brings a column of three to the destination', async () => {
    const { core, motion } = setup()
    const mission = core.startMission({
      id: 'column',
      leaderId: 'scout',
      followerIds: ['medic', 'porter'],
      destination: { x: 20, y: 1, z: 4 },
      regroupPoint,
      formation: { type: 'column' },
    })

    await runUntil(core, () => finished(mission), 150)

    expect(mission.status).toBe('complete')
    expect(motion.positionOf('scout')).toEqual({ x: 20, y: 1, z: 4 })
    expect(core.missionReport()?.regroups).toBe(0)
    core.dispose()
  })

  it('assigns roles by position in the formation', () => {
    const { core } = setup()
    expect(core.roleOf('scout')).toBeNull()

    core.startMission({
      leaderId: 'scout',
      followerIds: ['medic', 'porter'],
      destination: { x: 20, y: 1, z: 4 },
      regroupPoint,
    })

    expect(core.roleOf('scout')).toBe('navigator')
    expect(core.roleOf('medic')).toBe('support')
    expect(core.roleOf('porter')).toBe('rear-guard')
    expect(core.roleOf('stranger')).toBeNull()
    core.dispose()
  })

  it('aborts every participant and tells listeners once', () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {})
    const { core } = setup()
    const aborted: MissionAborted[] = []
    core.onMissionAborted((error) => aborted.push(error))

    const mission = core.startMission({
      id: 'm-abort',
      leaderId: 'scout',
      followerIds: ['medic', 'porter'],
      destination: { x: 20, y: 1, z: 4 },
      regroupPoint,
    })

    const error = core.abortMission('requested', 'medic')
    expect(error?.message).toBe('Mission m-abort aborted: requested')
    expect(error?.raisedBy).toBe('medic')
    expect(mission.status).toBe('aborted')
    expect(mission.signal.aborted).toBe(true)
    for (const member of squad) {
      expect(core.navigator(member.id)?.state).toBe('aborted')
    }

    expect(core.abortMission()).toBeNull()
    expect(aborted).toHaveLength(1)
    expect(core.missionReport()?.abortReason).toBe('requested')
  })

  it('regroups on the tick after a lethal hazard lands on the route', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {})
    const { core } = setup()
    const mission = core.startMission({
      leaderId: 'scout',
      followerIds: [],
      destination: { x: 20, y: 1, z: 4 },
      regroupPoint: { x: 2, y: 1, z: 1 },
    })
    await until(() => leaderHasPath(core))

    const critical = core.injectHazard({
      id: 'fire',
      type: 'liquid-damage',
      location: { x: 14, y: 1, z: 4 },
      radius: 1,
      severity: 'lethal',
    })

    expect(critical?.hazardId).toBe('fire')
    expect(mission.status).toBe('planning')

    await core.advance(1)
    expect(mission.status).toBe('regrouping')
    const report = core.missionReport()
    expect(report?.lastRegroupCause).toBe('hazard-critical')
    expect(report?.regroups).toBe(1)
    expect(report?.lastError).toBe(critical)
    core.dispose()
  })

  it('regroups when a world hazard appears on the leader path mid-route', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {})
    const { core, world } = setup()
    const mission = core.startMission({
      leaderId: 'scout',
      followerIds: [],
      destination: { x: 20, y: 1, z: 4 },
      regroupPoint: { x: 2, y: 1, z: 1 },
    })
    await until(() => leaderHasPath(core))
    await core.advance(2)
    expect(mission.status).toBe('en-route')

    world.addHazard({ id: 'sinkhole', type: 'fall', location: { x: 14, y: 1, z: 4 }, radius: 1, severity: 'lethal' })
    await core.advance(1)

    const report = core.missionReport()
    expect(mission.status).toBe('regrouping')
    expect(report?.lastRegroupCause).toBe('hazard-critical')
    expect(report?.lastError).toBeInstanceOf(HazardCritical)
    expect(report?.lastError?.code).toBe('HAZARD_CRITICAL')

    await core.advance(3)
    expect(core.missionReport()?.regroups).toBe(1)
    core.dispose()
  })

  it('resumes planning once a numeric quorum has gathered', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {})
    const { core, motion } = setup()
    const regroupAt = { x: 2, y: 1, z: 1 }
    const mission = core.startMission({
      leaderId: 'scout',
      followerIds: ['medic', 'porter'],
      destination: { x: 20, y: 1, z: 4 },
      regroupPoint: regroupAt,
      mission: { regroupQuorum: 1 },
    })
    await until(() => leaderHasPath(core))
    core.injectHazard({ id: 'fire', type: 'liquid-damage', location: { x: 14, y: 1, z: 4 }, radius: 1, severity: 'lethal' })

    await core.advance(1)
    expect(mission.status).toBe('regrouping')

    await runUntil(core, () => mission.status !== 'regrouping', 30)

    expect(mission.status).toBe('planning')
    expect(core.missionReport()?.regroups).toBe(1)
    // The leader is still on its way; one follower was enough
    expect(straightLineDistance(motion.positionOf('scout'), regroupAt)).toBeGreaterThan(1.5)
    expect(core.navigator('scout')?.currentDestination).toEqual({ x: 20, y: 1, z: 4 })
    core.dispose()
  })

  it('aborts when the squad cannot regroup in time', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {})
    const { core } = setup()
    const mission = core.startMission({
      leaderId: 'scout',
      followerIds: [],
      destination: { x: 20, y: 1, z: 4 },
      regroupPoint: { x: 2, y: 1, z: 1 },
      mission: { regroupTimeoutTicks: 3 },
    })
    await until(() => leaderHasPath(core))
    core.injectHazard({ id: 'fire', type: 'liquid-damage', location: { x: 14, y: 1, z: 4 }, radius: 1, severity: 'lethal' })

    await runUntil(core, () => finished(mission), 20)

    const report = core.missionReport()
    expect(mission.status).toBe('aborted')
    expect(report?.abortReason).toBe('regroup-timeout')
    expect(report?.raisedBy).toBeNull()
    expect(report?.tick).toBe(5)
  })

  it('keeps a throttled leader moving while a follower is held up', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {})
    const { core, motion } = setup()
    const stuck: StuckTimeout[] = []
    core.onStuck((error) => stuck.push(error))

    const mission = core.startMission({
      leaderId: 'scout',
      followerIds: ['medic'],
      destination: { x: 25, y: 1, z: 4 },
      regroupPoint,
    })
    await until(() => leaderHasPath(core))
    motion.block('medic')

    await core.advance(35)

    expect(stuck.map((error) => error.agentId)).toEqual(['medic'])
    expect(mission.status).toBe('en-route')
    expect(mission.formation.pace).toBe(0.1)
    expect(core.navigator('scout')?.state).toBe('moving')
    core.dispose()
  })

  it('holds the column inside spacing tolerance all the way in', async () => {
    const { core } = setup()
    const mission = core.startMission({
      leaderId: 'scout',
      followerIds: ['medic', 'porter'],
      destination: { x: 20, y: 1, z: 4 },
      regroupPoint,
    })
    const update = vi.spyOn(mission.formation, 'update')

    await runUntil(core, () => finished(mission), 150)

    const samples = update.mock.results.flatMap((result) => (result.type === 'return' ? [result.value] : []))
    const last = samples[samples.length - 1]
    expect(mission.status).toBe('complete')
    expect(samples.every((sample) => sample.broken === null)).toBe(true)
    expect(Object.keys(last.deviations)).toEqual(['medic', 'porter'])
    expect(last.worstDeviation).toBeLessThanOrEqual(5)
    expect(last.ticksOverTolerance).toBe(0)
    core.dispose()
  })

  it('ignores a hazard well away from every route', async () => {
    const { core } = setup()
    core.startMission({
      leaderId: 'scout',
      followerIds: [],
      destination: { x: 12, y: 1, z: 4 },
      regroupPoint,
    })
    await until(() => leaderHasPath(core))

    const critical = core.injectHazard({
      id: 'far-fire',
      type: 'liquid-damage',
      location: { x: 26, y: 1, z: 4 },
      radius: 1,
      severity: 'lethal',
    })

    expect(critical).toBeNull()
    core.dispose()
  })

  it('aborts when the leader has no route', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {})
    const { core } = setup()
    const mission = core.startMission({
      id: 'm-nowhere',
      leaderId: 'scout',
      followerIds: [],
      destination: { x: 60, y: 1, z: 4 },
      regroupPoint,
    })
    await until(() => core.navigator('scout')?.isPlanning === false)

    await core.advance(1)

    const report = core.missionReport()
    expect(mission.status).toBe('aborted')
    expect(report?.abortReason).toBe('no-path')
    expect(report?.raisedBy).toBe('scout')
    expect(report?.lastError?.code).toBe('MISSION_ABORTED')
  })

  describe('escalation', () => {
    const fastLadder: NavigationOverrides = {
      stuck: { thresholdTicks: 1 },
      recovery: { attemptTimeoutTicks: 1 },
    }

    it('swaps in a standby agent for an escalated leader', async () => {
      vi.spyOn(console, 'warn').mockImplementation(() => {})
      const { core, motion } = setup(fastLadder)
      const escalated: AgentEscalated[] = []
      core.onEscalated((error) => escalated.push(error))

      const mission = core.startMission({
        id: 'm-swap',
        leaderId: 'scout',
        followerIds: [],
        standbyIds: ['porter'],
        destination: { x: 20, y: 1, z: 4 },
        regroupPoint,
      })
      await until(() => leaderHasPath(core))
      motion.block('scout')

      await runUntil(core, () => (core.missionReport()?.substitutions.length ?? 0) > 0, 30)

      const report = core.missionReport()
      expect(report?.substitutions).toEqual([{ escalated: 'scout', replacement: 'porter' }])
      expect(report?.leaderId).toBe('porter')
      expect(report?.standbyIds).toEqual([])
      expect(report?.lastRegroupCause).toBe('agent-escalated')
      expect(report?.assistance.map((request) => request.agentId)).toEqual(['scout'])
      expect(mission.status).toBe('regrouping')
      expect(core.roleOf('porter')).toBe('navigator')
      expect(core.roleOf('scout')).toBeNull()
      expect(escalated.map((error) => [error.agentId, error.attempts])).toEqual([['scout', 4]])
      core.dispose()
    })

    it('sends the nearest follower to a stuck agent and tells the squad', async () => {
      vi.spyOn(console, 'warn').mockImplementation(() => {})
      const { core, motion } = setup(fastLadder)
      core.startMission({
        leaderId: 'scout',
        followerIds: ['medic', 'porter'],
        destination: { x: 20, y: 1, z: 4 },
        regroupPoint,
      })
      await until(() => leaderHasPath(core))
      motion.block('porter')

      await runUntil(core, () => (core.missionReport()?.assistance.length ?? 0) > 0, 40)

      const [request] = core.missionReport()?.assistance ?? []
      expect(request.agentId).toBe('porter')
      expect(request.responderId).toBe('medic')
      expect(request.position).toEqual({ x: 2, y: 1, z: 4 })
      expect(core.navigator('medic')?.currentDestination).toEqual({ x: 2, y: 1, z: 4 })
      expect(core.navigator('scout')?.assistanceRequests.map((received) => received.agentId)).toEqual(['porter'])
      expect(core.navigator('porter')?.assistanceRequests).toEqual([])
      core.dispose()
    })

    it('drops an escalated follower the quorum can spare', async () => {
      vi.spyOn(console, 'warn').mockImplementation(() => {})
      const { core, motion } = setup(fastLadder)
      const mission = core.startMission({
        leaderId: 'scout',
        followerIds: ['medic', 'porter'],
        destination: { x: 20, y: 1, z: 4 },
        regroupPoint,
        mission: { regroupQuorum: 2 },
      })
      await until(() => leaderHasPath(core))
      motion.block('porter')

      await runUntil(core, () => (core.missionReport()?.dropped.length ?? 0) > 0, 40)

      const report = core.missionReport()
      expect(report?.dropped).toEqual(['porter'])
      expect(report?.followerIds).toEqual(['medic'])
      expect(report?.lastRegroupCause).toBe('agent-escalated')
      expect(mission.status).toBe('regrouping')
      expect(mission.participants).toEqual(['scout', 'medic'])
      expect(core.roleOf('porter')).toBeNull()
      core.dispose()
    })

    it('aborts when nobody can take over', async () => {
      vi.spyOn(console, 'warn').mockImplementation(() => {})
      const { core, motion } = setup(fastLadder)

      const mission = core.startMission({
        leaderId: 'scout',
        followerIds: [],
        destination: { x: 20, y: 1, z: 4 },
        regroupPoint,
      })
      await until(() => leaderHasPath(core))
      motion.block('scout')

      await runUntil(core, () => finished(mission), 30)

      const report = core.missionReport()
      expect(mission.status).toBe('aborted')
      expect(report?.abortReason).toBe('agent-escalated')
      expect(report?.raisedBy).toBe('scout')
    })
  })

  describe('validation', () => {
    it('rejects agents that were never registered', () => {
      const { core } = setup()
      expect(() =>
        core.startMission({ leaderId: 'scout', followerIds: ['ghost'], destination: regroupPoint, regroupPoint })
      ).toThrow('Mission references unregistered agent ghost')
    })

    it('rejects an agent listed twice', () => {
      const { core } = setup()
      expect(() =>
        core.startMission({
          id: 'm-dup',
          leaderId: 'scout',
          followerIds: ['scout'],
          destination: regroupPoint,
          regroupPoint,
        })
      ).toThrow('Mission m-dup lists an agent more than once')
    })

    it('rejects a quorum larger than the squad', () => {
      const { core } = setup()
      expect(() =>
        core.startMission({
          leaderId: 'scout',
          followerIds: ['medic', 'porter'],
          destination: regroupPoint,
          regroupPoint,
          mission: { regroupQuorum: 4 },
        })
      ).toThrow('Regroup quorum 4 outside 1..3')
    })

    it('refuses a second mission while one is running', () => {
      const { core } = setup()
      core.startMission({
        id: 'm1',
        leaderId: 'scout',
        followerIds: [],
        destination: { x: 20, y: 1, z: 4 },
        regroupPoint,
      })
      expect(() =>
        core.startMission({ leaderId: 'medic', followerIds: [], destination: regroupPoint, regroupPoint })
      ).toThrow('Mission m1 is still planning')
      core.dispose()
    })
  })
})
