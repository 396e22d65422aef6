import type { IPosition } from '../world/interfaces/ICoordinates.ts'
import type { FormationConfig, FormationSample } from './interfaces/ICoordination.ts'
import { FormationBroken } from '../core/errors.ts'
import { straightLineDistance } from '../world/coordinates/CoordinateUtils.ts'
import { LeaderTrail, slotOffset, slotPosition } from './Formation.ts'

export const DEFAULT_FORMATION_CONFIG: FormationConfig = {
  type: 'column',
  spacingTolerance: 5,
  slotSpacing: 2,
  minPace: 0.1,
  throttleGain: 2.5,
  throttleCeiling: 0.5,
  paceRecoveryStep: 0.25,
  maxThrottleTicks: 40,
  trailLength: 256,
  followReplanDistance: 2,
}

/**
 * Leader/follower spacing loop.
 *
 * Each follower's target is a slot hung off the leader's trail. When the worst
 * follower drifts past `spacingTolerance`, the leader's pace drops in
 * proportion to the excess (never above `throttleCeiling`, never below
 * `minPace`) and climbs back by `paceRecoveryStep` per tick once everyone is in
 * tolerance. Staying out of tolerance longer than `maxThrottleTicks` breaks the
 * formation.
 */
export class FormationController {
  readonly config: FormationConfig
  readonly trail: LeaderTrail

  private followers: string[]
  private currentPace = 1
  private overTolerance = 0

  constructor(
    private leaderId: string,
    followerIds: readonly string[],
    config: Partial<FormationConfig> = {}
  ) {
    this.config = { ...DEFAULT_FORMATION_CONFIG, ...config }
    this.followers = [...followerIds]
    this.trail = new LeaderTrail(this.config.trailLength)
  }

  get leader(): string {
    return this.leaderId
  }

  get followerIds(): readonly string[] {
    return this.followers
  }

  get pace(): number {
    return this.currentPace
  }

  recordLeader(position: IPosition): void {
    this.trail.record(position)
  }

  /**
   * Where `followerId` should be right now, or null before the leader has moved.
   */
  slotFor(followerId: string): IPosition | null {
    const rank = this.followers.indexOf(followerId) + 1
    if (rank === 0) return null

    const offset = slotOffset(this.config.type, rank, this.followers.length, this.config.slotSpacing)
    const anchor = this.trail.pointBehind(offset.behind)
    return anchor ? slotPosition(anchor, offset) : null
  }

  /**
   * Measure deviations and adjust the leader's pace for this tick.
   */
  update(tick: number, positions: ReadonlyMap<string, IPosition>): FormationSample {
    const deviations: Record<string, number> = {}
    let worstFollower: string | null = null
    let worstDeviation = 0

    for (const followerId of this.followers) {
      const slot = this.slotFor(followerId)
      const position = positions.get(followerId)
      if (!slot || !position) continue

      const deviation = straightLineDistance(position, slot)
      deviations[followerId] = deviation
      if (deviation > worstDeviation) {
        worstDeviation = deviation
        worstFollower = followerId
      }
    }

    const tolerance = this.config.spacingTolerance
    let broken: FormationBroken | null = null

    if (worstDeviation > tolerance) {
      const excess = (worstDeviation - tolerance) / tolerance
      this.currentPace = Math.max(
        this.config.minPace,
        Math.min(this.config.throttleCeiling, 1 - this.config.throttleGain * excess)
      )
      this.overTolerance++

      if (this.overTolerance > this.config.maxThrottleTicks && worstFollower !== null) {
        broken = new FormationBroken(worstFollower, worstDeviation)
        this.overTolerance = 0
      }
    } else {
      this.currentPace = Math.min(1, this.currentPace + this.config.paceRecoveryStep)
      this.overTolerance = 0
    }

    return {
      tick,
      deviations,
      worstFollower,
      worstDeviation,
      pace: this.currentPace,
      ticksOverTolerance: this.overTolerance,
      broken,
    }
  }

  /**
   * Swap one participant for another, keeping its slot (or the lead).
   */
  replace(agentId: string, replacementId: string): void {
    if (agentId === this.leaderId) {
      this.leaderId = replacementId
      return
    }
    this.followers = this.followers.map((id) => (id === agentId ? replacementId : id))
  }

  /**
   * Remove a participant. A removed leader is succeeded by the first follower.
   */
  remove(agentId: string): void {
    if (agentId === this.leaderId) {
      const successor = this.followers.shift()
      if (!successor) {
        throw new Error(`Cannot remove leader ${agentId}: formation has no followers`)
      }
      this.leaderId = successor
      return
    }
    this.followers = this.followers.filter((id) => id !== agentId)
  }

  /**
   * Forget the trail and restore full pace, as after a regroup.
   */
  reset(): void {
    this.trail.clear()
    this.currentPace = 1
    this.overTolerance = 0
  }
}
