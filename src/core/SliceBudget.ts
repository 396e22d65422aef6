import { setImmediate as nextMacrotask } from 'node:timers/promises'

/**
 * Wall-clock allowance for one slice of a long-running search.
 *
 * The search checks it between batches of node expansions and stops when it
 * runs dry; whoever drives the search hands the event loop back before the
 * next slice.
 */
export class SliceBudget {
  private startedAt = 0
  private allowanceMs: number

  constructor(private readonly defaultMs: number = 4) {
    this.allowanceMs = defaultMs
  }

  /**
   * Open a new slice. Infinity means the slice never runs out.
   */
  open(allowanceMs: number = this.defaultMs): void {
    this.startedAt = performance.now()
    this.allowanceMs = allowanceMs
  }

  get elapsedMs(): number {
    return performance.now() - this.startedAt
  }

  get remainingMs(): number {
    return this.allowanceMs - this.elapsedMs
  }

  hasTimeRemaining(): boolean {
    return this.elapsedMs < this.allowanceMs
  }

  /**
   * Let other agents' ticks and pending I/O run, then open the next slice.
   */
  async handOff(): Promise<void> {
    await nextMacrotask()
    this.open()
  }
}
