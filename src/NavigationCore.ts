import type { IPosition } from './world/interfaces/ICoordinates.ts'
import type { IWorldQuery } from './world/interfaces/IWorldQuery.ts'
import type { CapabilitySet } from './movement/interfaces/IMovement.ts'
import type { HazardRecord } from './hazards/interfaces/IHazard.ts'
import type { Path, PlanResult } from './pathfinding/interfaces/IPathfinding.ts'
import type { IMotionController } from './agent/interfaces/IMotionController.ts'
import type { MissionReport, MissionRequest, MissionStatus, Role } from './coordination/interfaces/ICoordination.ts'
import type { AgentEscalated, AbortReason, HazardCritical, MissionAborted, StuckTimeout } from './core/errors.ts'
import { TaskPriority } from './core/interfaces/ITask.ts'
import { TaskScheduler } from './core/TaskScheduler.ts'
import { TickClock, type TickListener } from './core/TickClock.ts'
import { NavigationConfig, type NavigationOverrides, type NavigationSettings } from './config/NavigationConfig.ts'
import { HazardAvoidanceEngine } from './hazards/HazardAvoidance.ts'
import { HazardRegistry } from './hazards/HazardRegistry.ts'
import { RoutePlanner } from './pathfinding/RoutePlanner.ts'
import { PathfindingService, type PathRequestOptions } from './pathfinding/PathfindingService.ts'
import { PathMemoryStore } from './memory/PathMemoryStore.ts'
import { AgentNavigator, type AgentNavigatorHooks } from './agent/AgentNavigator.ts'
import { MissionController } from './coordination/MissionController.ts'

export interface AgentRegistration {
  id: string
  capabilities: CapabilitySet
  position: IPosition
}

export interface NavigationCoreOptions {
  world: IWorldQuery
  motion: IMotionController
  config?: NavigationConfig | NavigationOverrides
  /** Milliseconds between ticks when driven by start() (default: 50) */
  tickIntervalMs?: number
  /** Ticks between path memory staleness sweeps (default: 200) */
  sweepEveryTicks?: number
}

type Listener<T> = (value: T) => void

/**
 * Entry point for collaborators: path requests, missions, hazard injection and
 * stuck/escalation telemetry. Owns the scheduler that ticks every agent.
 */
export class NavigationCore {
  readonly config: NavigationSettings
  readonly planner: RoutePlanner
  readonly memory: PathMemoryStore
  readonly hazards: HazardRegistry
  readonly service: PathfindingService
  readonly scheduler: TaskScheduler
  readonly clock: TickClock

  private readonly motion: IMotionController
  private readonly agents = new Map<string, AgentRegistration>()
  private readonly navigators = new Map<string, AgentNavigator>()
  private mission: MissionController | null = null
  /** `hazardId@pathId` pairs already raised, so one sighting regroups once */
  private readonly raised = new Set<string>()

  private readonly stuckListeners = new Set<Listener<StuckTimeout>>()
  private readonly escalatedListeners = new Set<Listener<AgentEscalated>>()
  private readonly abortListeners = new Set<Listener<MissionAborted>>()

  constructor(options: NavigationCoreOptions) {
    const config = options.config instanceof NavigationConfig
      ? options.config
      : new NavigationConfig(options.config)
    this.config = config.settings

    const engine = new HazardAvoidanceEngine(this.config.hazards)
    this.planner = new RoutePlanner(options.world, this.config.planner, engine)
    this.memory = new PathMemoryStore(this.config.memory)
    this.hazards = new HazardRegistry()
    this.service = new PathfindingService(this.planner, this.memory, this.hazards, this.config.service)
    this.scheduler = new TaskScheduler(this.config.scheduler)
    this.clock = new TickClock(this.scheduler, options.tickIntervalMs)
    this.motion = options.motion

    this.clock.onTick((tick) => this.service.setTick(tick))
    this.clock.onTick(() => {
      this.watchActivePaths()
    })

    this.scheduler.createTask({
      id: 'path-memory-sweep',
      priority: TaskPriority.LOW,
      everyTicks: options.sweepEveryTicks ?? 200,
      update: () => {
        this.memory.sweep().catch((err: unknown) => {
          console.error('Path memory sweep failed:', err)
        })
      },
    })
  }

  /**
   * Make an agent known to the core. Its navigator ticks from the next tick on.
   */
  registerAgent(registration: AgentRegistration): AgentNavigator {
    if (this.agents.has(registration.id)) {
      throw new Error(`Agent ${registration.id} is already registered`)
    }
    this.agents.set(registration.id, { ...registration })
    return this.spawnNavigator(registration.id)
  }

  navigator(agentId: string): AgentNavigator | undefined {
    return this.navigators.get(agentId)
  }

  requestPath(
    origin: IPosition,
    destination: IPosition,
    capabilities: CapabilitySet,
    options?: PathRequestOptions
  ): Promise<PlanResult> {
    return this.service.requestPath(origin, destination, capabilities, options)
  }

  /**
   * Start a new mission. Every participant gets a fresh navigator; a mission
   * that is still running must be aborted first.
   */
  startMission(request: MissionRequest): MissionController {
    const active = this.mission
    if (active && active.status !== 'complete' && active.status !== 'aborted') {
      throw new Error(`Mission ${active.missionId} is still ${active.status}`)
    }
    if (active) {
      this.scheduler.unregisterTask(active.id)
    }

    const ids = [request.leaderId, ...request.followerIds, ...(request.standbyIds ?? [])]
    for (const agentId of ids) {
      if (!this.agents.has(agentId)) {
        throw new Error(`Mission references unregistered agent ${agentId}`)
      }
      this.spawnNavigator(agentId)
    }

    const mission = new MissionController(
      {
        ...request,
        mission: { ...this.config.mission, ...request.mission },
        formation: { ...this.config.formation, ...request.formation },
      },
      this.navigators,
      {
        onStuck: (error) => this.emit(this.stuckListeners, error),
        onEscalated: (error) => this.emit(this.escalatedListeners, error),
        onAborted: (error) => this.emit(this.abortListeners, error),
      }
    )
    this.mission = mission
    this.scheduler.registerTask(mission)
    mission.start()
    return mission
  }

  missionStatus(): MissionStatus | null {
    return this.mission?.status ?? null
  }

  missionReport(): MissionReport | null {
    return this.mission?.report() ?? null
  }

  abortMission(reason: AbortReason = 'requested', raisedBy: string | null = null): MissionAborted | null {
    return this.mission?.abort(reason, raisedBy) ?? null
  }

  roleOf(agentId: string): Role | null {
    return this.mission?.roleOf(agentId) ?? null
  }

  /**
   * Add a transient hazard. A lethal one on a participant's remaining path is
   * returned as HazardCritical and forces the mission to regroup.
   */
  injectHazard(hazard: HazardRecord, expiresAtTick?: number): HazardCritical | null {
    const record = this.hazards.inject(hazard, expiresAtTick)
    return this.checkActivePaths(() => [record])
  }

  removeHazard(hazardId: string): boolean {
    return this.hazards.remove(hazardId)
  }

  onStuck(listener: Listener<StuckTimeout>): () => void {
    return this.subscribe(this.stuckListeners, listener)
  }

  onEscalated(listener: Listener<AgentEscalated>): () => void {
    return this.subscribe(this.escalatedListeners, listener)
  }

  onMissionAborted(listener: Listener<MissionAborted>): () => void {
    return this.subscribe(this.abortListeners, listener)
  }

  /**
   * Called at the start of every tick, before any agent runs. Hosts advance
   * their motion controller here.
   */
  onTick(listener: TickListener): () => void {
    return this.clock.onTick(listener)
  }

  tick(): number {
    return this.clock.step()
  }

  advance(ticks: number): Promise<number> {
    return this.clock.advance(ticks)
  }

  dispose(): void {
    this.clock.stop()
    this.mission?.abort('requested')
    for (const navigator of this.navigators.values()) {
      navigator.dispose()
    }
    this.service.dispose()
  }

  /**
   * Hazards the world reports can appear mid-traversal too. Every tick the
   * remaining path of each participant is checked against what lies along it.
   */
  private watchActivePaths(): void {
    this.checkActivePaths((path) => this.service.hazardsAlong(path))
  }

  private checkActivePaths(hazardsFor: (path: Path) => HazardRecord[]): HazardCritical | null {
    const mission = this.mission
    if (!mission || mission.status === 'complete' || mission.status === 'aborted') {
      return null
    }

    for (const agentId of mission.participants) {
      const navigator = this.navigators.get(agentId)
      const path = navigator?.currentPath
      if (!navigator || !path) continue

      const critical = this.planner.hazardEngine.lethalOnPath(path, hazardsFor(path), navigator.nextWaypointIndex)
      if (!critical) continue

      const key = `${critical.hazardId}@${path.id}`
      if (this.raised.has(key)) continue
      this.raised.add(key)

      console.warn(critical.message)
      mission.raiseHazard(critical)
      return critical
    }
    return null
  }

  private spawnNavigator(agentId: string): AgentNavigator {
    const registration = this.agents.get(agentId)
    if (!registration) {
      throw new Error(`Agent ${agentId} is not registered`)
    }

    const previous = this.navigators.get(agentId)
    if (previous) {
      registration.position = previous.currentPosition
      previous.dispose()
      this.scheduler.unregisterTask(previous.id)
    }

    const navigator = new AgentNavigator({
      agentId,
      capabilities: registration.capabilities,
      position: registration.position,
      motion: this.motion,
      service: this.service,
      memory: this.memory,
      recovery: this.config.recovery,
      stuck: this.config.stuck,
      hooks: this.telemetryHooks(),
      debug: this.config.debug,
    })
    this.navigators.set(agentId, navigator)
    this.scheduler.registerTask(navigator)
    return navigator
  }

  private telemetryHooks(): AgentNavigatorHooks {
    return {
      onStuck: (error) => this.emit(this.stuckListeners, error),
      onEscalated: (error) => this.emit(this.escalatedListeners, error),
    }
  }

  private subscribe<T>(listeners: Set<Listener<T>>, listener: Listener<T>): () => void {
    listeners.add(listener)
    return () => {
      listeners.delete(listener)
    }
  }

  private emit<T>(listeners: Set<Listener<T>>, value: T): void {
    for (const listener of listeners) {
      try {
        listener(value)
      } catch (err) {
        console.error('Navigation listener failed:', err)
      }
    }
  }
}
