import type { TaskPriority } from './ITask.ts'

/**
 * Running totals for one task.
 */
export interface ITaskMetrics {
  id: string
  priority: TaskPriority
  /** Time taken on the last tick the task ran (ms) */
  lastRunMs: number
  runs: number
  /** Ticks the task was passed over because the budget ran out */
  skips: number
  /** Exponential moving average of run time (ms) */
  averageRunMs: number
  workUnits: number
}

/**
 * What the scheduler did on one tick.
 */
export interface ISchedulerMetrics {
  tick: number
  elapsedMs: number
  /** Time spent per priority level (ms) */
  timeByPriority: Record<TaskPriority, number>
  tasksRun: number
  tasksSkipped: number
  remainingBudgetMs: number
  tasks: ReadonlyMap<string, Readonly<ITaskMetrics>>
}
