import { SERVICE } from './config.js';
import { PayloadFormatError } from './errors.js';
import type { PinModule } from './modules/types.js';
import { sleep } from './sleep.js';
import type { OutputSpec } from './types.js';

export type PulseAction = 'pulse_on' | 'pulse_off';

const DECIMAL = /^\+?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

export function parseDurationMs(payload: string): number {
  const text = payload.trim();
  const ms = DECIMAL.test(text) ? Number(text) : NaN;
  if (!Number.isFinite(ms) || ms < 0) throw new PayloadFormatError(payload);
  return ms;
}

/**
 * Drive an output to the pulse level, hold it for the duration in the
 * payload, then drive it back. Not routed through the output dispatcher:
 * a concurrent SET or pulse on the same pin may interleave with it.
 */
export async function runPulse(
  output: OutputSpec,
  module: PinModule,
  action: PulseAction,
  payload: string,
  signal: AbortSignal,
): Promise<void> {
  let ms: number;
  try {
    ms = parseDurationMs(payload);
  } catch (e) {
    if (!(e instanceof PayloadFormatError)) throw e;
    console.warn(`[${SERVICE}] output ${output.name}: ${e.message}`);
    return;
  }
  let target = action === 'pulse_on';
  if (output.inverted) target = !target;
  await module.writePin(output.pin, target);
  await sleep(ms, signal);
  await module.writePin(output.pin, !target);
}
