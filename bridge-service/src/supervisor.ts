import { REAP_INTERVAL_MS, SERVICE, SHUTDOWN_GRACE_MS } from './config.js';
import { sleep } from './sleep.js';

export type TaskState = 'running' | 'finished' | 'failed' | 'cancelled';

export interface TaskHandle {
  readonly id: number;
  readonly name: string;
  readonly state: TaskState;
  readonly error: unknown;
  /** Settles once the task has finished, failed or been cancelled. Never rejects. */
  readonly done: Promise<void>;
}

export type TaskBody = (signal: AbortSignal) => Promise<void>;

type MutableTask = {
  -readonly [K in keyof TaskHandle]: TaskHandle[K];
};

function describe(task: TaskHandle): string {
  return `task #${task.id} (${task.name})`;
}

/**
 * Registry of background tasks.
 *
 * Every task receives the supervisor's abort signal and is expected to stop at
 * its next suspension point once it fires. Finished tasks stay in the registry
 * until `reap()` removes them, which is also where failures get logged.
 */
export class TaskSupervisor {
  private readonly tasks = new Map<number, MutableTask>();
  private readonly controller = new AbortController();
  private nextId = 1;

  get signal(): AbortSignal { return this.controller.signal; }
  get size(): number { return this.tasks.size; }

  handles(): TaskHandle[] {
    return Array.from(this.tasks.values());
  }

  spawn(name: string, body: TaskBody): TaskHandle {
    if (this.signal.aborted) throw new Error(`Cannot spawn ${name}: supervisor is shut down`);
    const signal = this.signal;
    const task: MutableTask = { id: this.nextId++, name, state: 'running', error: undefined, done: Promise.resolve() };
    task.done = Promise.resolve()
      .then(() => body(signal))
      .then(
        () => { task.state = 'finished'; },
        (err: unknown) => {
          task.error = err;
          task.state = signal.aborted ? 'cancelled' : 'failed';
        },
      );
    this.tasks.set(task.id, task);
    return task;
  }

  /** Remove settled tasks from the registry, logging the failed ones. */
  reap(): TaskHandle[] {
    const reaped: TaskHandle[] = [];
    for (const task of this.tasks.values()) {
      if (task.state === 'running') continue;
      if (task.state === 'failed') {
        console.error(`[${SERVICE}] ${describe(task)} failed:`, task.error);
      }
      this.tasks.delete(task.id);
      reaped.push(task);
    }
    return reaped;
  }

  async runReaper(signal: AbortSignal, intervalMs = REAP_INTERVAL_MS): Promise<void> {
    for (;;) {
      await sleep(intervalMs, signal);
      this.reap();
    }
  }

  /**
   * Cancel every registered task and wait for them to settle. A task stuck in
   * a call that ignores the signal is abandoned after `graceMs`.
   */
  async shutdown(graceMs = SHUTDOWN_GRACE_MS): Promise<void> {
    this.controller.abort();
    const pending = Array.from(this.tasks.values());
    let timer: ReturnType<typeof setTimeout> | undefined;
    const expired = new Promise<void>((resolve) => { timer = setTimeout(resolve, graceMs); });
    await Promise.race([Promise.all(pending.map((task) => task.done)), expired]);
    clearTimeout(timer);
    for (const task of pending) {
      if (task.state === 'running') {
        console.warn(`[${SERVICE}] ${describe(task)} did not stop within ${graceMs} ms; abandoning it`);
        task.state = 'cancelled';
      } else if (task.state === 'failed') {
        console.error(`[${SERVICE}] ${describe(task)} failed:`, task.error);
      }
    }
    this.tasks.clear();
  }
}
