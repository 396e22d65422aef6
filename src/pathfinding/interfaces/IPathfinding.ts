/**
 * Interfaces for the route planning system.
 */

import type { IPosition, RegionKey } from '../../world/interfaces/ICoordinates.ts'
import type { Capability, MovementMode } from '../../movement/interfaces/IMovement.ts'
import type { ClearanceConstraint, HazardRecord } from '../../hazards/interfaces/IHazard.ts'
import type { NoPathFound } from '../../core/errors.ts'

/**
 * How a waypoint is reached from the previous one.
 * - walk: level move, also used across 1-cell gaps
 * - jump: running jump over exactly a 2-cell gap
 * - bridge: place blocks across a gap of 3+ cells or a wide liquid
 * - vessel: cross a wide liquid by boat or mount
 * - swim: cross a liquid no wider than the swim threshold
 * - step: 1-2 cell rise, climbed or stacked in place
 * - ascent: 3+ cell rise via stairs, scaffold or pillar
 * - drop: controlled descent within the safe fall distance
 * - climb: vertical move along ladders/vines
 */
export type EdgeKind =
  | 'start'
  | 'walk'
  | 'jump'
  | 'bridge'
  | 'vessel'
  | 'swim'
  | 'step'
  | 'ascent'
  | 'drop'
  | 'climb'

export type PathStatus = 'fresh' | 'stale' | 'deprecated'

/**
 * A single planned stop with terrain and hazard annotations.
 */
export interface Waypoint {
  readonly position: IPosition
  /** Speed multiplier the terrain applied to the mode used to get here */
  readonly terrainFactor: number
  /** Ids of hazards whose volume contains this waypoint */
  readonly hazardRefs: readonly string[]
  readonly edge: EdgeKind
  readonly mode: MovementMode
  /** Seconds from the origin to this waypoint */
  readonly arrivalTime: number
}

/**
 * A planned route. Snapshots are immutable; updates produce a new version.
 */
export interface Path {
  readonly id: string
  readonly originRegion: RegionKey
  readonly destinationRegion: RegionKey
  readonly waypoints: readonly Waypoint[]
  /** Modes in the order used, consecutive duplicates collapsed */
  readonly modeSequence: readonly MovementMode[]
  /** Seconds; never below straight-line distance over the speed ceiling */
  readonly timeEstimate: number
  /** 0 to 1 */
  readonly confidenceRating: number
  readonly createdAt: number
  readonly lastValidatedAt: number
  readonly status: PathStatus
  /** Capabilities an agent needs to traverse this path */
  readonly requiredCapabilities: readonly Capability[]
  /** Highest waypoint index an agent has traversed successfully (-1 if none) */
  readonly verifiedThrough: number
  /** Bumped on every snapshot swap */
  readonly version: number
}

/**
 * Result of a planning request.
 */
export type PlanResult =
  | {
      success: true
      path: Path
      /** Number of nodes explored during search (0 for memory hits) */
      nodesExplored: number
      /** Whether the path came from path memory */
      fromMemory: boolean
    }
  | {
      success: false
      error: NoPathFound
      nodesExplored: number
    }

/**
 * Per-call planning options.
 */
export interface PlanOptions {
  /** Aborts the search; the result is NoPathFound('cancelled') */
  signal?: AbortSignal
  /** Wall-clock budget for the whole search in milliseconds */
  deadlineMs?: number
  /** Hazards the search must respect */
  hazards?: readonly HazardRecord[]
  /** Extra clearances fed back from the hazard filter */
  constraints?: readonly ClearanceConstraint[]
  /** Timestamp recorded on the produced path */
  now?: number
}

/**
 * Configuration for planning behavior.
 */
export interface PlannerConfig {
  /** Maximum nodes to expand before giving up */
  maxNodes: number
  /** Longest straight-line trip one cell search covers; longer trips go region by region */
  maxDistance: number
  /** Longest straight-line trip planned at all */
  maxRegionTrip: number
  /** Maximum safe fall distance for a drop edge */
  maxFallDistance: number
  /** Highest rise an ascent edge can cover */
  maxAscent: number
  /** Widest gap a bridge edge can span */
  maxBridgeSpan: number
  /** Widest liquid crossing that is swum rather than bridged or boated */
  swimThreshold: number
  /** Widest liquid crossing considered at all */
  maxLiquidCrossing: number
  /** Success weight of a running jump across a 2-cell gap (0-1) */
  jumpSuccessProbability: number
  bridgeSecondsPerCell: number
  ascentSetupSeconds: number
  ascentSecondsPerCell: number
  stepSecondsPerCell: number
  fallSecondsPerCell: number
  vesselBoardingSeconds: number
  /** Weight of terrain risk (0-1) applied to edge time */
  riskPenaltyWeight: number
  /** Risk added per unit of speed factor above 1 */
  slipperyRiskScale: number
  /** Region edge length used to key produced paths and by the region-level pass */
  regionSize: number
  /** Confidence rating a freshly planned path starts with */
  initialConfidence: number
  /** Enable debug logging */
  debug: boolean
}
