/**
 * Evaluates routes against known hazards.
 *
 * Lethal hazards get a categorical clearance: a segment entering it is never
 * merely penalized, the path goes back to the planner with a clearance
 * constraint. Dangerous hazards cost time-proportional penalties. Advisory
 * hazards are logged and otherwise ignored.
 */

import type { IPosition } from '../world/interfaces/ICoordinates.ts'
import type { Path } from '../pathfinding/interfaces/IPathfinding.ts'
import type {
  ClearanceConstraint,
  HazardAvoidanceConfig,
  HazardRecord,
  HazardVerdict,
} from './interfaces/IHazard.ts'
import { HazardCritical } from '../core/errors.ts'
import { clearanceTo, fractionInside, segmentClearance } from './HazardVolume.ts'

export const DEFAULT_HAZARD_CONFIG: HazardAvoidanceConfig = {
  lethalClearance: 3,
  dangerPenaltyWeight: 4,
  maxDangerousExposureSeconds: 30,
  debug: false,
}

/**
 * Penalty picture of a single edge.
 */
export interface EdgeHazardScore {
  /** Hazard that forbids the edge, if any */
  blockedBy: HazardRecord | null
  /** Seconds of the edge spent inside dangerous volumes */
  exposureSeconds: number
}

export class HazardAvoidanceEngine {
  readonly config: HazardAvoidanceConfig

  constructor(config: Partial<HazardAvoidanceConfig> = {}) {
    this.config = { ...DEFAULT_HAZARD_CONFIG, ...config }
  }

  /**
   * Clearance the planner must keep from a hazard (0 = no hard limit).
   */
  clearanceFor(hazard: HazardRecord, constraints: readonly ClearanceConstraint[] = []): number {
    const constraint = constraints.find((c) => c.hazardId === hazard.id)
    const demanded = constraint?.minClearance ?? 0
    if (hazard.severity === 'lethal') {
      return Math.max(this.config.lethalClearance, demanded)
    }
    return demanded
  }

  /**
   * Score one planned edge: whether it's forbidden, and how long it sits in danger.
   */
  scoreEdge(
    from: IPosition,
    to: IPosition,
    seconds: number,
    hazards: readonly HazardRecord[],
    constraints: readonly ClearanceConstraint[] = []
  ): EdgeHazardScore {
    let exposureSeconds = 0

    for (const hazard of hazards) {
      const clearance = this.clearanceFor(hazard, constraints)
      if (clearance > 0 && segmentClearance(from, to, hazard) < clearance) {
        return { blockedBy: hazard, exposureSeconds: 0 }
      }
      if (hazard.severity === 'dangerous') {
        exposureSeconds += seconds * fractionInside(from, to, hazard)
      }
    }

    return { blockedBy: null, exposureSeconds }
  }

  /**
   * Penalty in seconds for a stretch of dangerous exposure.
   */
  exposurePenalty(exposureSeconds: number): number {
    return exposureSeconds * this.config.dangerPenaltyWeight
  }

  /**
   * An endpoint inside a lethal clearance can't be fixed by rerouting.
   */
  endpointViolation(
    origin: IPosition,
    destination: IPosition,
    hazards: readonly HazardRecord[],
    constraints: readonly ClearanceConstraint[] = [],
    lastGoodPathId: string | null = null
  ): HazardCritical | null {
    for (const hazard of hazards) {
      if (hazard.severity !== 'lethal') continue
      const clearance = this.clearanceFor(hazard, constraints)
      if (clearanceTo(origin, hazard) < clearance || clearanceTo(destination, hazard) < clearance) {
        return new HazardCritical(
          hazard.id,
          `Endpoint lies within ${clearance} cells of lethal hazard ${hazard.id}`,
          lastGoodPathId
        )
      }
    }
    return null
  }

  /**
   * First lethal hazard whose clearance the rest of an active path (from
   * `fromIndex`) enters, or null when the remainder is clear.
   */
  lethalOnPath(path: Path, hazards: readonly HazardRecord[], fromIndex: number = 0): HazardCritical | null {
    const waypoints = path.waypoints
    const start = Math.max(1, fromIndex)
    for (const hazard of hazards) {
      if (hazard.severity !== 'lethal') continue
      const clearance = this.clearanceFor(hazard)
      for (let i = start; i < waypoints.length; i++) {
        if (segmentClearance(waypoints[i - 1].position, waypoints[i].position, hazard) < clearance) {
          return new HazardCritical(
            hazard.id,
            `Lethal hazard ${hazard.id} lies on active path ${path.id} near waypoint ${i}`,
            path.id
          )
        }
      }
    }
    return null
  }

  /**
   * Decide whether a candidate path may be returned.
   */
  filter(
    path: Path,
    hazards: readonly HazardRecord[],
    constraints: readonly ClearanceConstraint[] = []
  ): HazardVerdict {
    const waypoints = path.waypoints
    if (waypoints.length === 0) {
      return { verdict: 'accept', exposureSeconds: 0, advisories: [] }
    }

    const violation = this.endpointViolation(
      waypoints[0].position,
      waypoints[waypoints.length - 1].position,
      hazards,
      constraints,
      path.id
    )
    if (violation) {
      return { verdict: 'reject', error: violation }
    }

    const lethal = new Map<string, ClearanceConstraint>()
    const exposureByHazard = new Map<string, number>()
    const advisories = new Map<string, HazardRecord>()
    let exposureSeconds = 0

    for (let i = 1; i < waypoints.length; i++) {
      const from = waypoints[i - 1].position
      const to = waypoints[i].position
      const seconds = waypoints[i].arrivalTime - waypoints[i - 1].arrivalTime

      for (const hazard of hazards) {
        const clearance = this.clearanceFor(hazard, constraints)
        if (clearance > 0 && segmentClearance(from, to, hazard) < clearance) {
          lethal.set(hazard.id, { hazardId: hazard.id, minClearance: clearance })
          continue
        }

        const inside = fractionInside(from, to, hazard)
        if (inside === 0) continue

        if (hazard.severity === 'dangerous') {
          const exposure = seconds * inside
          exposureSeconds += exposure
          exposureByHazard.set(hazard.id, (exposureByHazard.get(hazard.id) ?? 0) + exposure)
        } else if (hazard.severity === 'advisory') {
          advisories.set(hazard.id, hazard)
        }
      }
    }

    if (lethal.size > 0) {
      if (this.config.debug) {
        console.log(`[HazardAvoidance] Path ${path.id} enters ${lethal.size} lethal clearance(s), rerouting`)
      }
      return { verdict: 'reroute', reason: 'lethal-clearance', constraints: sortConstraints(lethal) }
    }

    const overexposed = new Map<string, ClearanceConstraint>()
    for (const [hazardId, exposure] of exposureByHazard) {
      if (exposure > this.config.maxDangerousExposureSeconds) {
        // Keep at least a cell outside the volume on the next search
        overexposed.set(hazardId, { hazardId, minClearance: 1 })
      }
    }
    if (overexposed.size > 0) {
      if (this.config.debug) {
        console.log(`[HazardAvoidance] Path ${path.id} overexposed to ${overexposed.size} hazard(s), rerouting`)
      }
      return { verdict: 'reroute', reason: 'dangerous-exposure', constraints: sortConstraints(overexposed) }
    }

    for (const hazard of advisories.values()) {
      console.warn(`Path ${path.id} passes through advisory hazard ${hazard.id} (${hazard.type})`)
    }

    return { verdict: 'accept', exposureSeconds, advisories: Array.from(advisories.values()) }
  }
}

/**
 * Merge two constraint lists, keeping the larger clearance per hazard.
 */
export function mergeConstraints(
  current: readonly ClearanceConstraint[],
  added: readonly ClearanceConstraint[]
): ClearanceConstraint[] {
  const merged = new Map<string, ClearanceConstraint>()
  for (const constraint of [...current, ...added]) {
    const existing = merged.get(constraint.hazardId)
    if (!existing || constraint.minClearance > existing.minClearance) {
      merged.set(constraint.hazardId, constraint)
    }
  }
  return sortConstraints(merged)
}

function sortConstraints(constraints: Map<string, ClearanceConstraint>): ClearanceConstraint[] {
  return Array.from(constraints.values()).sort((a, b) => a.hazardId.localeCompare(b.hazardId))
}
