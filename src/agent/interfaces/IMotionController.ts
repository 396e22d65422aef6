import type { IPosition } from '../../world/interfaces/ICoordinates.ts'

/**
 * A run of positions handed to the motion controller in one command.
 */
export interface MotionSegment {
  readonly id: string
  /** Path the segment belongs to (null for recovery and follow moves) */
  readonly pathId: string | null
  readonly waypoints: readonly IPosition[]
  /** Path index of `waypoints[0]`, so reported indices match the path */
  readonly startIndex: number
}

export interface MotionOptions {
  /** Fraction of full speed, 0-1 */
  pace: number
  /** Aborting cancels the command */
  signal?: AbortSignal
}

interface ProgressEventBase {
  /** Monotonic per agent; redelivered events repeat their seq */
  readonly seq: number
  readonly agentId: string
  readonly segmentId: string
  readonly tick: number
  readonly position: IPosition
}

/**
 * Progress reported by the motion controller. Delivery is at-least-once.
 */
export type ProgressEvent =
  | (ProgressEventBase & { readonly type: 'progress' })
  | (ProgressEventBase & { readonly type: 'waypoint-reached'; readonly waypointIndex: number })
  | (ProgressEventBase & { readonly type: 'blocked'; readonly waypointIndex: number })
  | (ProgressEventBase & { readonly type: 'segment-complete' })

export type ProgressListener = (event: ProgressEvent) => void

/**
 * Converts planned segments into physical movement. Provided by the host.
 */
export interface IMotionController {
  execute(agentId: string, segment: MotionSegment, options: MotionOptions): void
  setPace(agentId: string, pace: number): void
  cancel(agentId: string): void
  /** Returns an unsubscribe function */
  subscribe(agentId: string, listener: ProgressListener): () => void
}
