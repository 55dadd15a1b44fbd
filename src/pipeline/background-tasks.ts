// =============================================================================
// BackgroundTaskRegistry: Tracked in-process jobs with abort handles
// =============================================================================

interface TrackedTask {
  /** Settles with the task, never rejects */
  done: Promise<void>;
  controller: AbortController;
}

/**
 * One AbortController and one completion promise per job id. Entries
 * remove themselves once the task settles.
 */
export class BackgroundTaskRegistry {
  private readonly tasks = new Map<string, TrackedTask>();

  /**
   * Starts `run` with a fresh abort signal and tracks it until it settles.
   * The returned promise carries the task's outcome.
   */
  track<T>(id: string, run: (signal: AbortSignal) => Promise<T>): Promise<T> {
    if (this.tasks.has(id)) throw new Error(`Task already running: ${id}`);

    const controller = new AbortController();
    const outcome = run(controller.signal);
    const done = outcome.then(
      () => undefined,
      () => undefined,
    );
    this.tasks.set(id, { done, controller });
    void done.then(() => {
      this.tasks.delete(id);
    });
    return outcome;
  }

  has(id: string): boolean {
    return this.tasks.has(id);
  }

  get size(): number {
    return this.tasks.size;
  }

  /** Aborts the task's signal. Returns false when no such task is running. */
  abort(id: string): boolean {
    const task = this.tasks.get(id);
    if (!task) return false;
    task.controller.abort();
    return true;
  }

  /** Resolves when the task settles; immediately when there is none. */
  async wait(id: string): Promise<void> {
    await this.tasks.get(id)?.done;
  }

  async waitAll(): Promise<void> {
    await Promise.all(Array.from(this.tasks.values(), (task) => task.done));
  }
}
