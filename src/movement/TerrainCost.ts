import type { TerrainSample } from '../world/interfaces/ITerrain.ts'
import {
  MOVEMENT_MODES,
  type Capability,
  type CapabilitySet,
  type ModeChoice,
  type MovementCost,
  type MovementMode,
  type MovementModelConfig,
} from './interfaces/IMovement.ts'
import {
  BASE_SPEEDS,
  DEFAULT_SLIPPERY_RISK_SCALE,
  HAZARD_TAG_RISK,
  IMPASSABLE_RISK,
  MODE_SURFACES,
} from './constants.ts'

const DEFAULT_MODEL: MovementModelConfig = {
  slipperyRiskScale: DEFAULT_SLIPPERY_RISK_SCALE,
}

/**
 * Speed multiplier a cell applies to a mode (1 when the cell doesn't say).
 */
export function terrainFactor(sample: TerrainSample, mode: MovementMode): number {
  return sample.speedFactors[mode] ?? 1
}

/**
 * Speed and risk of using `mode` on `sample`.
 *
 * Pure: identical inputs always give identical outputs. A mode that doesn't apply
 * to the cell's surface has speed 0. Factors above 1 (ice and the like) speed the
 * agent up but cost control precision, which shows up as risk.
 */
export function cost(
  sample: TerrainSample,
  mode: MovementMode,
  model: MovementModelConfig = DEFAULT_MODEL
): MovementCost {
  if (!MODE_SURFACES[mode].includes(sample.surface)) {
    return { speed: 0, risk: 0 }
  }

  const factor = terrainFactor(sample, mode)
  let risk = factor > 1 ? (factor - 1) * model.slipperyRiskScale : 0
  for (const tag of sample.hazardTags ?? []) {
    risk += HAZARD_TAG_RISK[tag]
  }

  return {
    speed: BASE_SPEEDS[mode] * factor,
    risk: Math.min(IMPASSABLE_RISK, risk),
  }
}

/**
 * Fastest usable mode for a cell among the agent's capabilities.
 * Ties go to lower risk, then to declaration order. Returns null when nothing fits.
 */
export function bestMode(
  sample: TerrainSample,
  capabilities: CapabilitySet,
  model: MovementModelConfig = DEFAULT_MODEL,
  only?: readonly MovementMode[]
): ModeChoice | null {
  let best: ModeChoice | null = null

  for (const mode of only ?? MOVEMENT_MODES) {
    if (!capabilities.has(mode)) continue

    const { speed, risk } = cost(sample, mode, model)
    if (speed <= 0 || risk >= IMPASSABLE_RISK) continue

    if (
      best === null ||
      speed > best.speed ||
      (speed === best.speed && risk < best.risk)
    ) {
      best = { mode, speed, risk, terrainFactor: terrainFactor(sample, mode) }
    }
  }

  return best
}

/**
 * Physical speed ceiling for an agent: the fastest base speed it can reach.
 * No planned path may be faster than straight-line distance over this.
 */
export function maxModeSpeed(capabilities: CapabilitySet): number {
  let max = 0
  for (const mode of MOVEMENT_MODES) {
    if (capabilities.has(mode)) {
      max = Math.max(max, BASE_SPEEDS[mode])
    }
  }
  return max
}

/**
 * Build a capability set from a list.
 */
export function capabilitiesOf(...capabilities: Capability[]): CapabilitySet {
  return new Set(capabilities)
}

/**
 * True when every capability in `required` is in `available`.
 */
export function satisfies(available: CapabilitySet, required: readonly Capability[]): boolean {
  return required.every((capability) => available.has(capability))
}
