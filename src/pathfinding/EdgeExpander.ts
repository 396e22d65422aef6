import type { IPosition } from '../world/interfaces/ICoordinates.ts'
import type { TerrainSample } from '../world/interfaces/ITerrain.ts'
import {
  MOVEMENT_MODES,
  type Capability,
  type CapabilitySet,
  type ModeChoice,
  type MovementMode,
  type MovementModelConfig,
} from '../movement/interfaces/IMovement.ts'
import type { EdgeKind, PlannerConfig } from './interfaces/IPathfinding.ts'
import { BASE_SPEEDS } from '../movement/constants.ts'
import { bestMode, maxModeSpeed } from '../movement/TerrainCost.ts'
import { CARDINALS, offset, step, straightLineDistance } from '../world/coordinates/CoordinateUtils.ts'
import type { NavigationGrid, StandKind } from './NavigationGrid.ts'

/** Modes usable while moving over ground */
const GROUND_MODES: readonly MovementMode[] = ['walk', 'sprint', 'ride']

/** Modes usable while standing in a ladder/vine cell */
const CLIMBABLE_MODES: readonly MovementMode[] = ['walk', 'climb']

/**
 * A traversable transition between two standable cells.
 */
export interface Edge {
  to: IPosition
  kind: Exclude<EdgeKind, 'start'>
  mode: MovementMode
  /** Seconds, already clamped to the speed ceiling */
  time: number
  risk: number
  terrainFactor: number
}

/**
 * Generates the outgoing edges of a cell for one agent's capabilities.
 */
export class EdgeExpander {
  private readonly ceiling: number
  private readonly model: MovementModelConfig

  constructor(
    private readonly grid: NavigationGrid,
    private readonly capabilities: CapabilitySet,
    private readonly config: PlannerConfig
  ) {
    this.ceiling = maxModeSpeed(capabilities)
    this.model = { slipperyRiskScale: config.slipperyRiskScale }
  }

  /**
   * Fastest speed any edge can reach for this agent.
   */
  get speedCeiling(): number {
    return this.ceiling
  }

  expand(position: IPosition): Edge[] {
    const kind = this.grid.standKind(position)
    if (kind === null) return []

    const edges: Edge[] = []
    for (const dir of CARDINALS) {
      this.expandDirection(position, dir, edges)
    }
    this.expandVertical(position, edges)
    return edges
  }

  private expandDirection(from: IPosition, dir: IPosition, edges: Edge[]): void {
    const next = step(from, dir)
    const nextKind = this.grid.standKind(next)

    if (nextKind !== null) {
      this.push(edges, from, next, 'walk', this.moveOnto(next, nextKind), (speed) => 1 / speed)
      return
    }

    if (this.grid.isSolid(next)) {
      this.expandRise(from, next, edges)
      return
    }

    const floor = this.grid.sample(offset(next, 0, -1, 0))
    if (floor.surface === 'liquid') {
      this.expandLiquid(from, dir, edges)
      return
    }

    if (floor.surface === 'void') {
      this.expandDrop(from, next, edges)
      this.expandGap(from, dir, edges)
    }
  }

  /**
   * Walls: 1-2 cell rises are stepped, taller ones need a dedicated ascent.
   */
  private expandRise(from: IPosition, wall: IPosition, edges: Edge[]): void {
    for (let h = 1; h <= this.config.maxAscent; h++) {
      // Rising in place needs the column above the agent clear
      if (this.grid.isSolid(offset(from, 0, h + 1, 0))) return

      const target = offset(wall, 0, h, 0)
      if (this.grid.standKind(target) !== 'ground') continue

      const choice = this.moveOnto(target, 'ground')
      if (h <= 2) {
        this.push(edges, from, target, 'step', choice, (speed) => 1 / speed + h * this.config.stepSecondsPerCell)
      } else if (this.capabilities.has('build')) {
        this.push(
          edges,
          from,
          target,
          'ascent',
          choice,
          (speed) => this.config.ascentSetupSeconds + h * this.config.ascentSecondsPerCell + 1 / speed
        )
      }
      return
    }
  }

  /**
   * Liquid at floor level: swim narrow crossings, bridge or boat wide ones.
   */
  private expandLiquid(from: IPosition, dir: IPosition, edges: Edge[]): void {
    let width = 0
    let liquid: TerrainSample | null = null

    for (let k = 1; k <= this.config.maxLiquidCrossing + 1; k++) {
      const cell = step(from, dir, k)
      if (this.grid.standKind(cell) === 'ground') {
        width = k - 1
        break
      }
      const floor = this.grid.sample(offset(cell, 0, -1, 0))
      if (this.grid.isSolid(cell) || floor.surface !== 'liquid') return
      liquid = liquid ?? floor
    }
    if (width === 0 || liquid === null) return

    const landing = step(from, dir, width + 1)
    const exit = this.moveOnto(landing, 'ground')

    if (width <= this.config.swimThreshold) {
      const swim = bestMode(liquid, this.capabilities, this.model, ['swim'])
      if (swim && exit) {
        this.push(edges, from, landing, 'swim', swim, (speed) => width / speed + 1 / exit.speed, Math.max(swim.risk, exit.risk))
      }
      return
    }

    if (this.capabilities.has('build')) {
      this.push(
        edges,
        from,
        landing,
        'bridge',
        exit,
        (speed) => width * this.config.bridgeSecondsPerCell + (width + 1) / speed
      )
    }

    if (this.capabilities.has('ride') && exit) {
      const vessel: ModeChoice = { mode: 'ride', speed: BASE_SPEEDS.ride, risk: exit.risk, terrainFactor: 1 }
      this.push(
        edges,
        from,
        landing,
        'vessel',
        vessel,
        (speed) => width / speed + this.config.vesselBoardingSeconds + 1 / exit.speed
      )
    }
  }

  private expandDrop(from: IPosition, over: IPosition, edges: Edge[]): void {
    for (let fall = 1; fall <= this.config.maxFallDistance; fall++) {
      const target = offset(over, 0, -fall, 0)
      const kind = this.grid.standKind(target)
      if (kind === 'ground') {
        this.push(
          edges,
          from,
          target,
          'drop',
          this.moveOnto(target, kind),
          (speed) => 1 / speed + fall * this.config.fallSecondsPerCell
        )
        return
      }
      if (this.grid.sample(target).surface !== 'void') return
    }
  }

  /**
   * Level gaps. Width 1 is walked, width 2 is jumped, width 3+ is bridged.
   * Gaps of 3 or more are never jumps.
   */
  private expandGap(from: IPosition, dir: IPosition, edges: Edge[]): void {
    for (let k = 2; k <= this.config.maxBridgeSpan + 1; k++) {
      const cell = step(from, dir, k)
      if (this.grid.standKind(cell) === 'ground') {
        const width = k - 1
        const choice = this.moveOnto(cell, 'ground')

        if (width === 1) {
          this.push(edges, from, cell, 'walk', choice, (speed) => 2 / speed)
        } else if (width === 2) {
          const probability = this.config.jumpSuccessProbability
          this.push(edges, from, cell, 'jump', choice, (speed) => 3 / speed / probability)
        } else if (this.capabilities.has('build')) {
          this.push(
            edges,
            from,
            cell,
            'bridge',
            choice,
            (speed) => width * this.config.bridgeSecondsPerCell + (width + 1) / speed
          )
        }
        return
      }

      const floor = this.grid.sample(offset(cell, 0, -1, 0)).surface
      if (this.grid.isSolid(cell) || this.grid.isSolid(offset(cell, 0, 1, 0)) || floor !== 'void') {
        return
      }
    }
  }

  private expandVertical(from: IPosition, edges: Edge[]): void {
    if (!this.capabilities.has('climb')) return

    const here = this.grid.sample(from)
    const up = offset(from, 0, 1, 0)
    const down = offset(from, 0, -1, 0)

    if (here.surface === 'climbable' && this.grid.standKind(up) !== null) {
      this.push(edges, from, up, 'climb', bestMode(here, this.capabilities, this.model, ['climb']), (speed) => 1 / speed)
    }

    const below = this.grid.sample(down)
    if (below.surface === 'climbable' && this.grid.standKind(down) === 'climbable') {
      this.push(edges, from, down, 'climb', bestMode(below, this.capabilities, this.model, ['climb']), (speed) => 1 / speed)
    }
  }

  private moveOnto(position: IPosition, kind: StandKind): ModeChoice | null {
    const floor = this.grid.floorSample(position, kind)
    return bestMode(floor, this.capabilities, this.model, kind === 'ground' ? GROUND_MODES : CLIMBABLE_MODES)
  }

  private push(
    edges: Edge[],
    from: IPosition,
    to: IPosition,
    kind: Edge['kind'],
    choice: ModeChoice | null,
    seconds: (speed: number) => number,
    risk: number = choice?.risk ?? 0
  ): void {
    if (choice === null || choice.speed <= 0) return

    // Nothing beats the agent's physical speed ceiling
    const floorTime = straightLineDistance(from, to) / this.ceiling
    edges.push({
      to,
      kind,
      mode: choice.mode,
      time: Math.max(seconds(choice.speed), floorTime),
      risk,
      terrainFactor: choice.terrainFactor,
    })
  }
}

/**
 * Capabilities implied by a set of edges.
 */
export function requiredCapabilities(edges: readonly Pick<Edge, 'kind' | 'mode'>[]): Capability[] {
  const modes = new Set<Capability>()
  let build = false
  for (const edge of edges) {
    modes.add(edge.mode)
    if (edge.kind === 'bridge' || edge.kind === 'ascent') build = true
  }
  const result: Capability[] = MOVEMENT_MODES.filter((mode) => modes.has(mode))
  if (build) result.push('build')
  return result
}
