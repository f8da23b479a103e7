/**
 * Tracks detached background tasks (one per pipeline run). Nothing awaits a
 * task's result; completion is observed through the simulator store. The
 * supervisor only guarantees that a task's escaped error is logged, and lets
 * shutdown code and tests wait for in-flight work.
 *
 * There is no admission control: every spawn runs immediately.
 */
export class TaskSupervisor {
  private readonly inFlight = new Map<number, { name: string; promise: Promise<void> }>();
  private nextId = 1;

  spawn(name: string, task: () => Promise<void>): void {
    const id = this.nextId++;
    const promise = Promise.resolve()
      .then(task)
      .catch((err: unknown) => {
        console.error(`[TASK] ${name} crashed:`, err);
      })
      .finally(() => {
        this.inFlight.delete(id);
      });
    this.inFlight.set(id, { name, promise });
  }

  get size(): number {
    return this.inFlight.size;
  }

  names(): string[] {
    return Array.from(this.inFlight.values()).map(t => t.name);
  }

  /** Resolves once every task, including ones spawned while draining, has settled. */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all(Array.from(this.inFlight.values()).map(t => t.promise));
    }
  }
}
