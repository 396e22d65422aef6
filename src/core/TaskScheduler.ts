import { TaskPriority, type ITask, type ITaskResult, type ITaskConfig } from './interfaces/ITask.ts'
import type { ISchedulerMetrics, ITaskMetrics } from './interfaces/ISchedulerMetrics.ts'

/**
 * Configuration for the task scheduler.
 */
export interface TaskSchedulerConfig {
  /** Budget per tick for non-critical tasks in milliseconds (default: 8ms) */
  tickBudgetMs?: number
  /** Whether to collect detailed metrics (default: false) */
  collectMetrics?: boolean
}

const AVERAGE_WEIGHT = 0.1

const PRIORITIES: readonly TaskPriority[] = [
  TaskPriority.CRITICAL,
  TaskPriority.HIGH,
  TaskPriority.NORMAL,
  TaskPriority.LOW,
]

/**
 * Simple task wrapper for functions that don't need fine-grained control.
 */
class SimpleTask implements ITask {
  readonly id: string
  readonly priority: TaskPriority
  readonly maxDeferredTicks?: number
  enabled = true

  private readonly everyTicks: number
  private readonly updateFn: (tick: number) => void

  constructor(config: ITaskConfig) {
    this.id = config.id
    this.priority = config.priority
    this.maxDeferredTicks = config.maxDeferredTicks
    this.everyTicks = Math.max(1, Math.floor(config.everyTicks ?? 1))
    this.updateFn = config.update
  }

  execute(tick: number, _remainingBudgetMs: number): ITaskResult {
    if (tick % this.everyTicks !== 0) {
      return { completed: true, elapsedMs: 0 }
    }
    const start = performance.now()
    this.updateFn(tick)
    return {
      completed: true,
      elapsedMs: performance.now() - start,
    }
  }
}

/**
 * Runs registered tasks once per simulation tick.
 *
 * Tasks are organized by priority:
 * - CRITICAL: Always runs (mission control)
 * - HIGH: Runs if budget allows after critical tasks (agents)
 * - NORMAL: Background work, skipped if budget exhausted
 * - LOW: Lowest priority background work
 *
 * A task that throws is logged and the tick carries on with the next task. A
 * task with `maxDeferredTicks` runs over budget once it has waited that long.
 */
export class TaskScheduler {
  private readonly tasks: Map<string, ITask> = new Map()
  private readonly tasksByPriority: Record<TaskPriority, ITask[]> = {
    [TaskPriority.CRITICAL]: [],
    [TaskPriority.HIGH]: [],
    [TaskPriority.NORMAL]: [],
    [TaskPriority.LOW]: [],
  }

  private readonly tickBudgetMs: number
  private readonly collectMetrics: boolean
  private tickStartTime: number = 0

  private readonly deferrals: Map<string, number> = new Map()
  private readonly taskMetrics: Map<string, ITaskMetrics> = new Map()
  private tickMetrics: ISchedulerMetrics | null = null

  constructor(config: TaskSchedulerConfig = {}) {
    this.tickBudgetMs = config.tickBudgetMs ?? 8
    this.collectMetrics = config.collectMetrics ?? false
  }

  registerTask(task: ITask): void {
    if (this.tasks.has(task.id)) {
      console.warn(`Task '${task.id}' already registered, replacing`)
      this.unregisterTask(task.id)
    }

    this.tasks.set(task.id, task)
    this.tasksByPriority[task.priority].push(task)

    if (this.collectMetrics) {
      this.taskMetrics.set(task.id, {
        id: task.id,
        priority: task.priority,
        lastRunMs: 0,
        runs: 0,
        skips: 0,
        averageRunMs: 0,
        workUnits: 0,
      })
    }
  }

  /**
   * Create and register a simple task from a config.
   */
  createTask(config: ITaskConfig): ITask {
    const task = new SimpleTask(config)
    this.registerTask(task)
    return task
  }

  unregisterTask(id: string): boolean {
    const task = this.tasks.get(id)
    if (!task) return false

    this.tasks.delete(id)
    const bucket = this.tasksByPriority[task.priority]
    const index = bucket.indexOf(task)
    if (index !== -1) {
      bucket.splice(index, 1)
    }
    this.taskMetrics.delete(id)
    this.deferrals.delete(id)
    return true
  }

  getTask(id: string): ITask | undefined {
    return this.tasks.get(id)
  }

  setTaskEnabled(id: string, enabled: boolean): void {
    const task = this.tasks.get(id)
    if (task) {
      task.enabled = enabled
    }
  }

  private hasTimeRemaining(): boolean {
    return this.getElapsedMs() < this.tickBudgetMs
  }

  private getElapsedMs(): number {
    return performance.now() - this.tickStartTime
  }

  /**
   * Execute all scheduled tasks for one tick.
   */
  runTick(tick: number): void {
    this.tickStartTime = performance.now()

    const timeByPriority: Record<TaskPriority, number> = {
      [TaskPriority.CRITICAL]: 0,
      [TaskPriority.HIGH]: 0,
      [TaskPriority.NORMAL]: 0,
      [TaskPriority.LOW]: 0,
    }
    let tasksRun = 0
    let tasksSkipped = 0

    for (const priority of PRIORITIES) {
      const isCritical = priority === TaskPriority.CRITICAL
      // Copy: tasks may register or unregister others while running
      const tasks = [...this.tasksByPriority[priority]]

      for (const task of tasks) {
        if (!task.enabled) continue

        if (!isCritical && !this.hasTimeRemaining()) {
          const deferredFor = (this.deferrals.get(task.id) ?? 0) + 1
          if (task.maxDeferredTicks === undefined || deferredFor <= task.maxDeferredTicks) {
            this.deferrals.set(task.id, deferredFor)
            task.onSkipped?.(tick, deferredFor)
            tasksSkipped++

            const metrics = this.taskMetrics.get(task.id)
            if (metrics) metrics.skips++
            continue
          }
        }
        this.deferrals.delete(task.id)

        const remainingMs = Math.max(0, this.tickBudgetMs - this.getElapsedMs())
        let result: ITaskResult
        try {
          result = task.execute(tick, remainingMs)
        } catch (err) {
          console.error(`Task '${task.id}' failed on tick ${tick}:`, err)
          continue
        }
        tasksRun++
        timeByPriority[priority] += result.elapsedMs

        const metrics = this.taskMetrics.get(task.id)
        if (metrics) {
          metrics.lastRunMs = result.elapsedMs
          metrics.runs++
          metrics.workUnits += result.workUnits ?? 0
          metrics.averageRunMs += (result.elapsedMs - metrics.averageRunMs) * AVERAGE_WEIGHT
        }
      }
    }

    if (this.collectMetrics) {
      const elapsedMs = this.getElapsedMs()
      this.tickMetrics = {
        tick,
        elapsedMs,
        timeByPriority,
        tasksRun,
        tasksSkipped,
        remainingBudgetMs: Math.max(0, this.tickBudgetMs - elapsedMs),
        tasks: new Map(Array.from(this.taskMetrics, ([id, metrics]) => [id, { ...metrics }])),
      }
    }
  }

  getBudget(): number {
    return this.tickBudgetMs
  }

  /**
   * Metrics for the last tick (null unless collectMetrics is on).
   */
  getMetrics(): ISchedulerMetrics | null {
    return this.tickMetrics
  }

  getTaskMetrics(id: string): ITaskMetrics | undefined {
    return this.taskMetrics.get(id)
  }

  getDebugSummary(): {
    totalTasks: number
    enabledTasks: number
    tasksByPriority: Record<string, number>
    tickBudgetMs: number
  } {
    const tasksByPriority: Record<string, number> = {}
    for (const priority of PRIORITIES) {
      tasksByPriority[TaskPriority[priority]] = this.tasksByPriority[priority].filter((t) => t.enabled).length
    }

    return {
      totalTasks: this.tasks.size,
      enabledTasks: Array.from(this.tasks.values()).filter((t) => t.enabled).length,
      tasksByPriority,
      tickBudgetMs: this.tickBudgetMs,
    }
  }
}
