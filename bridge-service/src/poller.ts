import { INPUT_POLL_INTERVAL_MS } from './config.js';
import type { PinModule } from './modules/types.js';
import { sleep } from './sleep.js';
import { TOPICS } from './topics.js';
import type { InputSpec, Publish } from './types.js';

/**
 * Poll one input pin until cancelled, publishing `<prefix>/input/<name>` on
 * the first read and on every change after that. Read and publish errors end
 * the loop; nothing restarts it.
 */
export async function runInputPoller(
  input: InputSpec,
  module: PinModule,
  prefix: string,
  publish: Publish,
  signal: AbortSignal,
  intervalMs = INPUT_POLL_INTERVAL_MS,
): Promise<void> {
  const topic = TOPICS.input(prefix, input.name);
  let last: boolean | undefined;
  for (;;) {
    const value = await module.readPin(input.pin);
    if (value !== last) {
      await publish(topic, value ? input.onPayload : input.offPayload);
      last = value;
    }
    await sleep(intervalMs, signal);
  }
}
