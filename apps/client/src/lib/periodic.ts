import { createNamedLogger } from '@substore/logger'

const log = createNamedLogger({ name: 'scheduler' })

/**
 * Runs an async job every `intervalMs`, skipping a beat while the previous
 * run is still in flight. The timer does not keep the process alive.
 */
export class PeriodicTask {
  private timer: ReturnType<typeof setInterval> | null = null
  private running: Promise<void> | null = null

  constructor(
    readonly name: string,
    readonly intervalMs: number,
    private readonly job: () => Promise<unknown>
  ) {}

  get isRunning(): boolean {
    return this.timer !== null
  }

  start(): void {
    if (this.timer) return
    this.timer = setInterval(() => {
      this.runOnce().catch((error: unknown) => log.error(`${this.name} failed`, error))
    }, this.intervalMs)
    this.timer.unref?.()
    log.debug(`${this.name} every ${this.intervalMs}ms`)
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer)
      this.timer = null
    }
  }

  /**
   * Run the job now unless a run is already in flight.
   */
  async runOnce(): Promise<void> {
    if (this.running) {
      log.debug(`${this.name} still running, skipping`)
      return
    }
    this.running = this.job().then(() => undefined)
    try {
      await this.running
    } finally {
      this.running = null
    }
  }
}
