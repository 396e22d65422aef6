import type { IPosition } from '../../world/interfaces/ICoordinates.ts'
import type { HazardCritical } from '../../core/errors.ts'

export type HazardType = 'fall' | 'liquid-damage' | 'hostile-presence' | 'blocked-gap'

export type HazardSeverity = 'advisory' | 'dangerous' | 'lethal'

/**
 * A located, typed, severity-rated danger.
 * Supplied by perception or injected by combat/task logic; consumed read-only.
 */
export interface HazardRecord {
  readonly id: string
  readonly type: HazardType
  /** Centre of the bounding volume */
  readonly location: IPosition
  /** Half-extent of the axis-aligned bounding volume */
  readonly radius: number
  readonly severity: HazardSeverity
  /** Tick after which a transient hazard no longer applies */
  readonly expiresAtTick?: number
}

/**
 * Extra clearance the planner must keep from one hazard on its next search.
 */
export interface ClearanceConstraint {
  readonly hazardId: string
  readonly minClearance: number
}

export type RerouteReason = 'lethal-clearance' | 'dangerous-exposure'

export type HazardVerdict =
  | {
      verdict: 'accept'
      /** Seconds spent inside dangerous hazard volumes */
      exposureSeconds: number
      /** Advisory hazards the path passes through (logged, not blocking) */
      advisories: HazardRecord[]
    }
  | {
      verdict: 'reroute'
      reason: RerouteReason
      constraints: ClearanceConstraint[]
    }
  | {
      verdict: 'reject'
      error: HazardCritical
    }

/**
 * Tunables for the hazard avoidance engine.
 */
export interface HazardAvoidanceConfig {
  /** Categorical minimum clearance around lethal hazards, in cells */
  lethalClearance: number
  /** Weight applied to seconds of dangerous exposure when scoring edges */
  dangerPenaltyWeight: number
  /** Longest acceptable stay inside dangerous volumes before a reroute is demanded */
  maxDangerousExposureSeconds: number
  /** Enable debug logging */
  debug: boolean
}
