/**
 * Trailing-edge debouncer.
 *
 * Each `schedule` (re)arms one timer; only the last scheduled callback
 * runs, once the window has passed without another call.
 */
export class Debouncer {
  private timer: ReturnType<typeof setTimeout> | null = null
  private pendingTask: (() => void) | null = null

  constructor(readonly windowMs: number) {}

  get isPending(): boolean {
    return this.timer !== null
  }

  schedule(task: () => void): void {
    this.cancel()
    this.pendingTask = task
    this.timer = setTimeout(() => {
      this.timer = null
      this.pendingTask = null
      task()
    }, this.windowMs)
  }

  /**
   * Run the pending task now, if any.
   */
  flush(): void {
    const task = this.pendingTask
    this.cancel()
    task?.()
  }

  cancel(): void {
    if (this.timer !== null) {
      clearTimeout(this.timer)
    }
    this.timer = null
    this.pendingTask = null
  }
}
