import * as THREE from 'three'
import type { IPosition } from '../world/interfaces/ICoordinates.ts'
import type {
  IMotionController,
  MotionOptions,
  MotionSegment,
  ProgressEvent,
  ProgressListener,
} from '../agent/interfaces/IMotionController.ts'
import { fromVector3, toVector3 } from '../world/coordinates/CoordinateUtils.ts'

export interface KinematicMotionConfig {
  /** Cells per tick at pace 1 (default: 0.5) */
  cellsPerTick: number
  /** Deliver every event twice, as an at-least-once transport may (default: false) */
  duplicateDelivery: boolean
}

export const DEFAULT_KINEMATIC_CONFIG: KinematicMotionConfig = {
  cellsPerTick: 0.5,
  duplicateDelivery: false,
}

interface Command {
  segment: MotionSegment
  index: number
  pace: number
  detach: () => void
}

interface Body {
  position: THREE.Vector3
  cellsPerTick: number
  command: Command | null
  blocked: 'silent' | 'reported' | null
  seq: number
}

type EventPayload =
  | { type: 'progress' }
  | { type: 'waypoint-reached'; waypointIndex: number }
  | { type: 'blocked'; waypointIndex: number }
  | { type: 'segment-complete' }

/**
 * In-process motion controller that moves agents in straight lines between
 * waypoints, ignoring terrain. Drives the example squad and the tests.
 */
export class KinematicMotionController implements IMotionController {
  readonly config: KinematicMotionConfig

  private readonly bodies = new Map<string, Body>()
  private readonly listeners = new Map<string, Set<ProgressListener>>()

  constructor(config: Partial<KinematicMotionConfig> = {}) {
    this.config = { ...DEFAULT_KINEMATIC_CONFIG, ...config }
  }

  /**
   * Put an agent in the world, optionally with its own speed.
   */
  place(agentId: string, position: IPosition, cellsPerTick: number = this.config.cellsPerTick): void {
    const existing = this.bodies.get(agentId)
    if (existing) {
      existing.position = toVector3(position)
      existing.cellsPerTick = cellsPerTick
      return
    }
    this.bodies.set(agentId, {
      position: toVector3(position),
      cellsPerTick,
      command: null,
      blocked: null,
      seq: 0,
    })
  }

  positionOf(agentId: string): IPosition | undefined {
    const body = this.bodies.get(agentId)
    return body ? fromVector3(body.position) : undefined
  }

  isMoving(agentId: string): boolean {
    return Boolean(this.bodies.get(agentId)?.command)
  }

  /**
   * Stop an agent where it stands. With `reportBlocked` it also emits a
   * blocked event every tick it has a command.
   */
  block(agentId: string, reportBlocked: boolean = false): void {
    const body = this.requireBody(agentId)
    body.blocked = reportBlocked ? 'reported' : 'silent'
  }

  unblock(agentId: string): void {
    this.requireBody(agentId).blocked = null
  }

  execute(agentId: string, segment: MotionSegment, options: MotionOptions): void {
    const body = this.requireBody(agentId)
    body.command?.detach()

    const signal = options.signal
    const onAbort = (): void => this.cancel(agentId)
    signal?.addEventListener('abort', onAbort, { once: true })

    body.command = {
      segment,
      index: 0,
      pace: clampPace(options.pace),
      detach: () => signal?.removeEventListener('abort', onAbort),
    }
  }

  setPace(agentId: string, pace: number): void {
    const command = this.bodies.get(agentId)?.command
    if (command) {
      command.pace = clampPace(pace)
    }
  }

  cancel(agentId: string): void {
    const body = this.bodies.get(agentId)
    if (!body?.command) return
    body.command.detach()
    body.command = null
  }

  subscribe(agentId: string, listener: ProgressListener): () => void {
    const set = this.listeners.get(agentId) ?? new Set<ProgressListener>()
    this.listeners.set(agentId, set)
    set.add(listener)
    return () => {
      set.delete(listener)
    }
  }

  /**
   * Advance every agent by one tick and emit its progress events.
   */
  tick(tick: number): void {
    for (const [agentId, body] of this.bodies) {
      const command = body.command
      if (!command) continue

      const { segment } = command

      if (body.blocked) {
        if (body.blocked === 'reported') {
          this.emit(agentId, body, segment, tick, {
            type: 'blocked',
            waypointIndex: segment.startIndex + command.index,
          })
        }
        continue
      }

      let travel = body.cellsPerTick * command.pace
      while (travel > 0 && command.index < segment.waypoints.length) {
        const target = toVector3(segment.waypoints[command.index])
        const distance = body.position.distanceTo(target)

        if (distance > travel) {
          body.position.add(target.sub(body.position).setLength(travel))
          travel = 0
          break
        }

        body.position.copy(target)
        travel -= distance
        this.emit(agentId, body, segment, tick, {
          type: 'waypoint-reached',
          waypointIndex: segment.startIndex + command.index,
        })
        command.index++
      }

      if (command.index >= segment.waypoints.length) {
        command.detach()
        body.command = null
        this.emit(agentId, body, segment, tick, { type: 'segment-complete' })
      } else {
        this.emit(agentId, body, segment, tick, { type: 'progress' })
      }
    }
  }

  private emit(agentId: string, body: Body, segment: MotionSegment, tick: number, payload: EventPayload): void {
    const event: ProgressEvent = {
      ...payload,
      seq: ++body.seq,
      agentId,
      segmentId: segment.id,
      tick,
      position: fromVector3(body.position),
    }

    const listeners = this.listeners.get(agentId)
    if (!listeners) return
    const deliveries = this.config.duplicateDelivery ? 2 : 1
    for (let i = 0; i < deliveries; i++) {
      for (const listener of listeners) {
        listener(event)
      }
    }
  }

  private requireBody(agentId: string): Body {
    const body = this.bodies.get(agentId)
    if (!body) {
      throw new Error(`Unknown agent ${agentId}; call place() first`)
    }
    return body
  }
}

function clampPace(pace: number): number {
  return Math.min(1, Math.max(0, pace))
}
