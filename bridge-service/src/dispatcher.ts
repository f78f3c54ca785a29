import { SERVICE } from './config.js';
import { AsyncQueue } from './queue.js';
import type { TaskSupervisor } from './supervisor.js';
import type { OutputCommand, OutputSpec } from './types.js';

/** Write the pin state a SET payload asks for; mismatching payloads are dropped. */
export async function applyOutputCommand({ module, output, payload }: OutputCommand): Promise<void> {
  if (payload === output.onPayload) {
    await module.writePin(output.pin, true);
  } else if (payload === output.offPayload) {
    await module.writePin(output.pin, false);
  } else {
    console.warn(`[${SERVICE}] payload for output ${output.name} did not match 'on' or 'off' payloads: ${JSON.stringify(payload)}`);
  }
}

async function runWorker(queue: AsyncQueue<OutputCommand>, signal: AbortSignal): Promise<void> {
  for (;;) {
    const command = await queue.get(signal);
    await applyOutputCommand(command);
  }
}

/**
 * One FIFO queue and one worker per module that drives outputs, so that
 * writes to a module never overlap and land in submission order.
 */
export class OutputDispatcher {
  private readonly queues = new Map<string, AsyncQueue<OutputCommand>>();

  constructor(outputs: Iterable<OutputSpec>) {
    for (const output of outputs) {
      if (!this.queues.has(output.module)) this.queues.set(output.module, new AsyncQueue());
    }
  }

  get modules(): string[] { return Array.from(this.queues.keys()); }

  submit(command: OutputCommand): void {
    const queue = this.queues.get(command.output.module);
    if (!queue) throw new Error(`No output queue for module ${command.output.module}`);
    queue.put(command);
  }

  /** Spawn the per-module workers under the supervisor. */
  start(supervisor: TaskSupervisor): void {
    for (const [module, queue] of this.queues) {
      supervisor.spawn(`output:${module}`, (signal) => runWorker(queue, signal));
    }
  }
}
