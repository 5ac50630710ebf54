// Outstanding task bookkeeping.

/**
 * Handle for one counted task. Releasing it more than once has no effect.
 */
export class TaskRegistration {
  private released = false;

  constructor(private readonly counter: TaskCounter) {}

  get isReleased(): boolean {
    return this.released;
  }

  release(): void {
    if (this.released) return;
    this.released = true;
    this.counter["active"]--;
  }
}

/**
 * Counts tasks that are registered and not yet released.
 */
export class TaskCounter {
  private active = 0;

  /** Register a new task. */
  register(): TaskRegistration {
    this.active++;
    return new TaskRegistration(this);
  }

  /** Number of registered tasks not yet released. */
  get count(): number {
    return this.active;
  }
}
