import { readFileSync } from 'node:fs'
import { z } from 'zod'
import type { MovementModelConfig } from '../movement/interfaces/IMovement.ts'
import type { PlannerConfig } from '../pathfinding/interfaces/IPathfinding.ts'
import type { HazardAvoidanceConfig } from '../hazards/interfaces/IHazard.ts'
import type { PathMemoryConfig } from '../memory/interfaces/IPathMemory.ts'
import type { RecoveryConfig, StuckDetectorConfig } from '../recovery/interfaces/IRecovery.ts'
import type { FormationConfig, MissionConfig } from '../coordination/interfaces/ICoordination.ts'
import type { PathfindingServiceConfig } from '../pathfinding/PathfindingService.ts'
import type { TaskSchedulerConfig } from '../core/TaskScheduler.ts'
import { ConfigValidationError } from '../core/errors.ts'
import { DEFAULT_SLIPPERY_RISK_SCALE } from '../movement/constants.ts'
import { DEFAULT_PLANNER_CONFIG } from '../pathfinding/RoutePlanner.ts'
import { DEFAULT_HAZARD_CONFIG } from '../hazards/HazardAvoidance.ts'
import { DEFAULT_MEMORY_CONFIG } from '../memory/PathMemoryStore.ts'
import { DEFAULT_STUCK_CONFIG } from '../recovery/StuckDetector.ts'
import { DEFAULT_RECOVERY_CONFIG } from '../recovery/RecoveryStateMachine.ts'
import { DEFAULT_FORMATION_CONFIG } from '../coordination/FormationController.ts'
import { DEFAULT_MISSION_CONFIG } from '../coordination/MissionController.ts'
import { DEFAULT_SERVICE_CONFIG } from '../pathfinding/PathfindingService.ts'

export const CONFIG_ENV_VAR = 'NAVCORE_CONFIG'

export interface NavigationSettings {
  movement: MovementModelConfig
  planner: PlannerConfig
  hazards: HazardAvoidanceConfig
  memory: PathMemoryConfig
  stuck: StuckDetectorConfig
  recovery: RecoveryConfig
  formation: FormationConfig
  mission: MissionConfig
  service: PathfindingServiceConfig
  scheduler: Required<TaskSchedulerConfig>
  /** Turns on debug logging in every component */
  debug: boolean
}

export type NavigationOverrides = {
  [K in keyof NavigationSettings]?: NavigationSettings[K] extends boolean
    ? boolean
    : Partial<NavigationSettings[K]>
}

export const DEFAULT_CONFIG: NavigationSettings = {
  movement: { slipperyRiskScale: DEFAULT_SLIPPERY_RISK_SCALE },
  planner: DEFAULT_PLANNER_CONFIG,
  hazards: DEFAULT_HAZARD_CONFIG,
  memory: DEFAULT_MEMORY_CONFIG,
  stuck: DEFAULT_STUCK_CONFIG,
  recovery: DEFAULT_RECOVERY_CONFIG,
  formation: DEFAULT_FORMATION_CONFIG,
  mission: DEFAULT_MISSION_CONFIG,
  service: DEFAULT_SERVICE_CONFIG,
  scheduler: { tickBudgetMs: 8, collectMetrics: false },
  debug: false,
}

const positive = z.number().positive()
const nonNegative = z.number().nonnegative()
const count = z.number().int().positive()
const fraction = z.number().min(0).max(1)

const movementSchema = z.object({ slipperyRiskScale: nonNegative }).strict()

const plannerSchema = z
  .object({
    maxNodes: count,
    maxDistance: positive,
    maxRegionTrip: positive,
    maxFallDistance: z.number().int().nonnegative(),
    maxAscent: z.number().int().nonnegative(),
    maxBridgeSpan: z.number().int().nonnegative(),
    swimThreshold: z.number().int().nonnegative(),
    maxLiquidCrossing: z.number().int().nonnegative(),
    jumpSuccessProbability: z.number().gt(0).max(1),
    bridgeSecondsPerCell: nonNegative,
    ascentSetupSeconds: nonNegative,
    ascentSecondsPerCell: nonNegative,
    stepSecondsPerCell: nonNegative,
    fallSecondsPerCell: nonNegative,
    vesselBoardingSeconds: nonNegative,
    riskPenaltyWeight: nonNegative,
    slipperyRiskScale: nonNegative,
    regionSize: count,
    initialConfidence: fraction,
    debug: z.boolean(),
  })
  .strict()

const hazardSchema = z
  .object({
    lethalClearance: nonNegative,
    dangerPenaltyWeight: nonNegative,
    maxDangerousExposureSeconds: nonNegative,
    debug: z.boolean(),
  })
  .strict()

const memorySchema = z
  .object({
    capacityPerKey: count,
    successAlpha: fraction,
    failureBeta: fraction,
    deprecationFloor: fraction,
    staleAfterMs: nonNegative,
    regionSize: count,
    debug: z.boolean(),
  })
  .strict()

const stuckSchema = z.object({ thresholdTicks: count, epsilon: nonNegative }).strict()

const recoverySchema = z
  .object({
    retreatCells: positive,
    approachAngleDegrees: z.number().min(-180).max(180),
    bypassHeight: positive,
    progressEpsilon: positive,
    attemptTimeoutTicks: count,
    maxRecoveryAttempts: count,
    debug: z.boolean(),
  })
  .strict()

const formationSchema = z
  .object({
    type: z.enum(['line', 'column', 'wedge', 'circle']),
    spacingTolerance: positive,
    slotSpacing: positive,
    minPace: fraction,
    throttleGain: nonNegative,
    throttleCeiling: fraction,
    paceRecoveryStep: z.number().gt(0).max(1),
    maxThrottleTicks: count,
    trailLength: z.number().int().min(2),
    followReplanDistance: nonNegative,
  })
  .strict()

const missionSchema = z
  .object({
    arrivalRadius: nonNegative,
    regroupTimeoutTicks: count,
    regroupQuorum: z.union([count, z.literal('all')]),
    debug: z.boolean(),
  })
  .strict()

const serviceSchema = z
  .object({
    maxConcurrentSearches: count,
    sliceBudgetMs: positive,
    planningDeadlineMs: positive,
    maxRerouteIterations: z.number().int().nonnegative(),
    searchMargin: nonNegative,
    debug: z.boolean(),
  })
  .strict()

const schedulerSchema = z.object({ tickBudgetMs: positive, collectMetrics: z.boolean() }).strict()

export const navigationConfigSchema = z
  .object({
    movement: movementSchema.partial(),
    planner: plannerSchema.partial(),
    hazards: hazardSchema.partial(),
    memory: memorySchema.partial(),
    stuck: stuckSchema.partial(),
    recovery: recoverySchema.partial(),
    formation: formationSchema.partial(),
    mission: missionSchema.partial(),
    service: serviceSchema.partial(),
    scheduler: schedulerSchema.partial(),
    debug: z.boolean(),
  })
  .strict()
  .partial()

/**
 * Validate raw overrides (from code, a file or the environment).
 *
 * @throws ConfigValidationError listing every offending key
 */
export function parseOverrides(raw: unknown): NavigationOverrides {
  const result = navigationConfigSchema.safeParse(raw)
  if (!result.success) {
    throw new ConfigValidationError(
      result.error.issues.map((issue) => {
        const key = issue.path.join('.')
        return key ? `${key}: ${issue.message}` : issue.message
      })
    )
  }
  return result.data
}

/**
 * Complete, validated settings for every component of the core.
 */
export class NavigationConfig {
  readonly settings: NavigationSettings

  constructor(overrides: NavigationOverrides = {}) {
    const parsed = parseOverrides(overrides)
    const debug = parsed.debug ?? DEFAULT_CONFIG.debug

    this.settings = {
      movement: { ...DEFAULT_CONFIG.movement, ...parsed.movement },
      planner: withDebug({ ...DEFAULT_CONFIG.planner, ...parsed.planner }, debug),
      hazards: withDebug({ ...DEFAULT_CONFIG.hazards, ...parsed.hazards }, debug),
      memory: withDebug({ ...DEFAULT_CONFIG.memory, ...parsed.memory }, debug),
      stuck: { ...DEFAULT_CONFIG.stuck, ...parsed.stuck },
      recovery: withDebug({ ...DEFAULT_CONFIG.recovery, ...parsed.recovery }, debug),
      formation: { ...DEFAULT_CONFIG.formation, ...parsed.formation },
      mission: withDebug({ ...DEFAULT_CONFIG.mission, ...parsed.mission }, debug),
      service: withDebug({ ...DEFAULT_CONFIG.service, ...parsed.service }, debug),
      scheduler: { ...DEFAULT_CONFIG.scheduler, ...parsed.scheduler },
      debug,
    }

    // The planner scores slippery terrain with the movement model's scale
    if (parsed.movement?.slipperyRiskScale !== undefined && parsed.planner?.slipperyRiskScale === undefined) {
      this.settings.planner.slipperyRiskScale = parsed.movement.slipperyRiskScale
    }

    const { minPace, throttleCeiling } = this.settings.formation
    if (minPace > throttleCeiling) {
      throw new ConfigValidationError([
        `formation.minPace: ${minPace} exceeds formation.throttleCeiling ${throttleCeiling}`,
      ])
    }
  }

  /**
   * Load overrides from a JSON file. An unreadable or malformed file falls back
   * to defaults with a warning; a well-formed file with bad values throws.
   */
  static fromFile(path: string): NavigationConfig {
    let raw: unknown
    try {
      raw = JSON.parse(readFileSync(path, 'utf8'))
    } catch (e) {
      console.warn(`Failed to load navigation config from ${path}, using defaults:`, e)
      return new NavigationConfig()
    }
    return new NavigationConfig(parseOverrides(raw))
  }

  /**
   * Load from the file named by NAVCORE_CONFIG, or defaults when it is unset.
   */
  static fromEnvironment(env: NodeJS.ProcessEnv = process.env): NavigationConfig {
    const path = env[CONFIG_ENV_VAR]
    return path ? NavigationConfig.fromFile(path) : new NavigationConfig()
  }
}

function withDebug<T extends { debug: boolean }>(section: T, debug: boolean): T {
  return debug ? { ...section, debug: true } : section
}
