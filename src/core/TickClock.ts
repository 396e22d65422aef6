import { setImmediate as nextMacrotask } from 'node:timers/promises'
import type { TaskScheduler } from './TaskScheduler.ts'

export type TickListener = (tick: number) => void

/**
 * Drives the scheduler one tick at a time, either on an interval or by hand.
 */
export class TickClock {
  private tick = 0
  private timer: ReturnType<typeof setInterval> | null = null
  private readonly listeners: TickListener[] = []

  constructor(
    private readonly scheduler: TaskScheduler,
    private readonly intervalMs: number = 50
  ) {}

  get currentTick(): number {
    return this.tick
  }

  get running(): boolean {
    return this.timer !== null
  }

  /**
   * Called before the scheduler runs each tick.
   */
  onTick(listener: TickListener): () => void {
    this.listeners.push(listener)
    return () => {
      const index = this.listeners.indexOf(listener)
      if (index !== -1) this.listeners.splice(index, 1)
    }
  }

  start(): void {
    if (this.timer) return
    this.timer = setInterval(() => this.step(), this.intervalMs)
  }

  stop(): void {
    if (!this.timer) return
    clearInterval(this.timer)
    this.timer = null
  }

  /**
   * Run exactly one tick.
   */
  step(): number {
    const tick = ++this.tick
    for (const listener of [...this.listeners]) {
      listener(tick)
    }
    this.scheduler.runTick(tick)
    return tick
  }

  /**
   * Run `ticks` ticks, yielding to the event loop between them so sliced
   * searches and other pending work get to run.
   */
  async advance(ticks: number = 1): Promise<number> {
    for (let i = 0; i < ticks; i++) {
      this.step()
      await nextMacrotask()
    }
    return this.tick
  }
}
