export * from './world/index.ts'
export * from './movement/index.ts'
export * from './hazards/index.ts'
export * from './pathfinding/index.ts'
export * from './memory/index.ts'
export * from './recovery/index.ts'
export * from './coordination/index.ts'

// Core
export * from './core/errors.ts'
export { TaskPriority, type ITask, type ITaskResult, type ITaskConfig } from './core/interfaces/ITask.ts'
export type { ISchedulerMetrics, ITaskMetrics } from './core/interfaces/ISchedulerMetrics.ts'
export { TaskScheduler, type TaskSchedulerConfig } from './core/TaskScheduler.ts'
export { TickClock, type TickListener } from './core/TickClock.ts'
export { SliceBudget } from './core/SliceBudget.ts'

// Agents
export type {
  IMotionController,
  MotionSegment,
  MotionOptions,
  ProgressEvent,
  ProgressListener,
} from './agent/interfaces/IMotionController.ts'
export {
  AgentNavigator,
  type AgentNavigatorHooks,
  type AgentNavigatorOptions,
} from './agent/AgentNavigator.ts'

// Configuration
export {
  NavigationConfig,
  DEFAULT_CONFIG,
  CONFIG_ENV_VAR,
  navigationConfigSchema,
  parseOverrides,
  type NavigationSettings,
  type NavigationOverrides,
} from './config/NavigationConfig.ts'

// Simulation stand-ins
export { KinematicMotionController, DEFAULT_KINEMATIC_CONFIG, type KinematicMotionConfig } from './simulation/KinematicMotionController.ts'
export { createExampleWorld, examplePathRequest, exampleSquadMission } from './simulation/SquadExample.ts'

export { NavigationCore, type AgentRegistration, type NavigationCoreOptions } from './NavigationCore.ts'
