import type { IPosition } from '../world/interfaces/ICoordinates.ts'
import {
  RECOVERY_LADDER,
  type AgentNavState,
  type RecoveryAction,
  type RecoveryConfig,
  type RecoveryEvent,
  type RecoveryStats,
  type RecoveryStepKind,
  type StuckType,
  type TickObservation,
} from './interfaces/IRecovery.ts'
import { straightLineDistance } from '../world/coordinates/CoordinateUtils.ts'
import { StuckDetector } from './StuckDetector.ts'

export const DEFAULT_RECOVERY_CONFIG: RecoveryConfig = {
  retreatCells: 2,
  approachAngleDegrees: 30,
  bypassHeight: 2,
  progressEpsilon: 0.5,
  attemptTimeoutTicks: 20,
  maxRecoveryAttempts: 8,
  debug: false,
}

const TRANSITIONS: Readonly<Record<AgentNavState, readonly AgentNavState[]>> = {
  idle: ['moving', 'aborted'],
  moving: ['idle', 'stuck', 'aborted'],
  stuck: ['idle', 'recovering', 'escalated', 'aborted'],
  recovering: ['idle', 'moving', 'recovering', 'escalated', 'aborted'],
  escalated: ['aborted', 'idle'],
  aborted: [],
}

/**
 * Per-agent progress monitor and recovery ladder.
 *
 * moving → stuck → recovering → moving, or → escalated once the ladder (or the
 * attempt budget) runs out. A step is issued on the tick after the agent became
 * stuck, and is judged successful when the distance to the target improves on
 * the stuck distance by `progressEpsilon` within `attemptTimeoutTicks`.
 */
export class RecoveryStateMachine {
  readonly config: RecoveryConfig
  readonly detector: StuckDetector

  private current: AgentNavState = 'idle'
  private ladderIndex = 0
  private totalAttempts = 0
  private stuckTick = 0
  private stuckType: StuckType | null = null
  private stuckDistance = 0
  private action: RecoveryAction | null = null

  private readonly stats: RecoveryStats = {
    stuckEvents: 0,
    attempts: 0,
    successes: 0,
    escalations: 0,
    byStep: { retreat: 0, 'vertical-bypass': 0, replan: 0, assistance: 0 },
    byStuckType: { position: 0, path: 0 },
  }

  constructor(
    readonly agentId: string,
    config: Partial<RecoveryConfig> = {},
    detector: StuckDetector = new StuckDetector()
  ) {
    this.config = { ...DEFAULT_RECOVERY_CONFIG, ...config }
    this.detector = detector
  }

  get state(): AgentNavState {
    return this.current
  }

  get currentAction(): RecoveryAction | null {
    return this.action
  }

  get lastStuckType(): StuckType | null {
    return this.stuckType
  }

  get attemptsUsed(): number {
    return this.totalAttempts
  }

  /**
   * A movement command went out. The first observation after this sets the anchor.
   */
  begin(): void {
    if (this.current === 'moving') return
    if (this.current !== 'idle') this.transition('idle')
    this.transition('moving')
    this.detector.reset()
    this.ladderIndex = 0
    this.action = null
  }

  /**
   * The agent has nothing left to do (arrived, or mission handed it a rest).
   */
  settle(): void {
    if (this.current === 'idle' || this.current === 'aborted') return
    this.transition('idle')
    this.action = null
  }

  abort(): void {
    if (this.current === 'aborted') return
    this.transition('aborted')
    this.action = null
  }

  /**
   * Feed one tick of progress. Returns what happened this tick.
   */
  observe(observation: TickObservation): RecoveryEvent[] {
    const events: RecoveryEvent[] = []
    const { tick } = observation

    switch (this.current) {
      case 'moving': {
        const stuckType = this.detector.observe(observation)
        if (stuckType) {
          this.transition('stuck')
          this.stuckTick = tick
          this.stuckType = stuckType
          this.stuckDistance = this.distanceToTarget(observation)
          this.stats.stuckEvents++
          this.stats.byStuckType[stuckType]++
          events.push({ type: 'stuck', tick, stuckType })
          if (this.config.debug) {
            console.log(`[Recovery] ${this.agentId} stuck (${stuckType}) at tick ${tick}`)
          }
        }
        break
      }

      case 'stuck':
        if (tick > this.stuckTick) {
          this.issueNext(tick, events)
        }
        break

      case 'recovering': {
        const action = this.action
        if (!action) break

        const improvement = action.stuckDistance - this.distanceToTarget(observation)
        if (observation.target !== null && improvement >= this.config.progressEpsilon) {
          this.transition('moving')
          this.stats.successes++
          this.ladderIndex = 0
          this.action = null
          this.detector.reset()
          events.push({ type: 'recovered', tick, step: action.step })
          if (this.config.debug) {
            console.log(`[Recovery] ${this.agentId} recovered by ${action.step} at tick ${tick}`)
          }
        } else if (tick - action.tick >= this.config.attemptTimeoutTicks) {
          this.issueNext(tick, events)
        }
        break
      }

      default:
        break
    }

    return events
  }

  getStats(): RecoveryStats {
    return {
      ...this.stats,
      byStep: { ...this.stats.byStep },
      byStuckType: { ...this.stats.byStuckType },
    }
  }

  private issueNext(tick: number, events: RecoveryEvent[]): void {
    if (this.ladderIndex >= RECOVERY_LADDER.length || this.totalAttempts >= this.config.maxRecoveryAttempts) {
      this.transition('escalated')
      this.action = null
      this.stats.escalations++
      events.push({ type: 'escalated', tick, attempts: this.totalAttempts })
      console.warn(`Agent ${this.agentId} escalated after ${this.totalAttempts} recovery attempts`)
      return
    }

    const step: RecoveryStepKind = RECOVERY_LADDER[this.ladderIndex]
    this.ladderIndex++
    this.totalAttempts++
    this.stats.attempts++
    this.stats.byStep[step]++

    this.action = { step, attempt: this.ladderIndex, tick, stuckDistance: this.stuckDistance }
    this.transition('recovering')
    events.push({ type: 'recovery-step', tick, action: this.action })

    if (this.config.debug) {
      console.log(`[Recovery] ${this.agentId} step ${this.ladderIndex} (${step}) at tick ${tick}`)
    }
  }

  private distanceToTarget(observation: TickObservation): number {
    const target: IPosition | null = observation.target
    return target ? straightLineDistance(observation.position, target) : 0
  }

  private transition(next: AgentNavState): void {
    if (!TRANSITIONS[this.current].includes(next)) {
      throw new Error(`Illegal navigation transition ${this.current} -> ${next} for ${this.agentId}`)
    }
    this.current = next
  }
}
