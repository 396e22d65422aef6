/**
 * Scheduling tiers within one simulation tick. Lower values run first.
 */
export enum TaskPriority {
  /** Mission control and abort propagation; never deferred */
  CRITICAL = 0,
  /** Agent navigators */
  HIGH = 1,
  /** Background upkeep */
  NORMAL = 2,
  /** Path memory sweeps */
  LOW = 3,
}

export interface ITaskResult {
  completed: boolean
  elapsedMs: number
  /** Inbox events or records handled this tick */
  workUnits?: number
}

/**
 * Something the scheduler runs once per tick, in priority order.
 */
export interface ITask {
  readonly id: string
  readonly priority: TaskPriority
  enabled: boolean
  /**
   * Ticks in a row the task may be deferred for lack of budget. On the next
   * one it runs regardless. Unset: deferred for as long as the budget is spent.
   */
  readonly maxDeferredTicks?: number

  execute(tick: number, remainingBudgetMs: number): ITaskResult

  /** Deferred on `tick`; `deferredFor` counts consecutive deferrals including this one */
  onSkipped?(tick: number, deferredFor: number): void
}

/**
 * A task built from a plain callback.
 */
export interface ITaskConfig {
  id: string
  priority: TaskPriority
  /** Run only on ticks divisible by this (default 1) */
  everyTicks?: number
  maxDeferredTicks?: number
  update: (tick: number) => void
}
