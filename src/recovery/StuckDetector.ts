import type { IPosition } from '../world/interfaces/ICoordinates.ts'
import type { StuckDetectorConfig, StuckType, TickObservation } from './interfaces/IRecovery.ts'
import { straightLineDistance } from '../world/coordinates/CoordinateUtils.ts'

export const DEFAULT_STUCK_CONFIG: StuckDetectorConfig = {
  thresholdTicks: 5,
  epsilon: 0.1,
}

/**
 * A recorded stuck detection.
 */
export interface StuckDetection {
  tick: number
  type: StuckType
  position: IPosition
}

/**
 * Watches per-tick positions and reports when an agent stops making progress.
 *
 * Progress is measured against an anchor: the last position where the agent was
 * seen to move at least `epsilon`. Ticks only count while a movement command is
 * outstanding, so an idle agent is never stuck.
 *
 * The displacement that counts as progress shrinks with the commanded pace. A
 * throttled agent creeping forward is making progress, and one held at pace 0
 * is waiting on its formation.
 */
export class StuckDetector {
  readonly config: StuckDetectorConfig

  private anchor: IPosition | null = null
  private stationaryTicks = 0
  private readonly history: StuckDetection[] = []

  constructor(config: Partial<StuckDetectorConfig> = {}) {
    this.config = { ...DEFAULT_STUCK_CONFIG, ...config }
  }

  /**
   * Feed one tick. Returns the stuck type on the tick the agent becomes stuck.
   */
  observe(observation: TickObservation): StuckType | null {
    const { position, tick } = observation

    if (observation.blocked && observation.commandOutstanding) {
      return this.detect(tick, 'path', position)
    }

    const pace = Math.min(1, Math.max(0, observation.pace ?? 1))
    if (this.anchor === null || straightLineDistance(position, this.anchor) >= this.config.epsilon * pace) {
      this.reset(position)
      return null
    }

    if (!observation.commandOutstanding) {
      this.stationaryTicks = 0
      return null
    }

    this.stationaryTicks++
    if (this.stationaryTicks >= this.config.thresholdTicks) {
      return this.detect(tick, 'position', position)
    }
    return null
  }

  /**
   * Restart measurement from a new anchor (after a successful recovery, a new path...).
   */
  reset(anchor: IPosition | null = null): void {
    this.anchor = anchor
    this.stationaryTicks = 0
  }

  get ticksWithoutProgress(): number {
    return this.stationaryTicks
  }

  getHistory(): readonly StuckDetection[] {
    return this.history
  }

  countByType(type: StuckType): number {
    return this.history.filter((detection) => detection.type === type).length
  }

  private detect(tick: number, type: StuckType, position: IPosition): StuckType {
    this.history.push({ tick, type, position })
    this.stationaryTicks = 0
    return type
  }
}
