import { describe, expect, it } from 'vitest';
import type { PinModule } from './modules/types.js';
import { runInputPoller } from './poller.js';
import type { InputSpec } from './types.js';

const door: InputSpec = { name: 'door', module: 'board', pin: 17, pull: 'none', onPayload: 'OPEN', offPayload: 'CLOSED' };

/** Returns the scripted readings in order, then fails to end the loop. */
function scriptedModule(readings: boolean[]): PinModule & { reads: number } {
  const queue = [...readings];
  return {
    name: 'board',
    type: 'scripted',
    reads: 0,
    async setupPin() {},
    async readPin() {
      this.reads++;
      const next = queue.shift();
      if (next === undefined) throw new Error('end of script');
      return next;
    },
    async writePin() {},
  };
}

describe('runInputPoller', () => {
  it('publishes the first reading and every change, nothing for repeats', async () => {
    const module = scriptedModule([false, false, true, true, true, false, false]);
    const published: Array<[string, string]> = [];
    const publish = async (topic: string, payload: string) => { published.push([topic, payload]); };

    await expect(runInputPoller(door, module, 'home', publish, new AbortController().signal, 0))
      .rejects.toThrow('end of script');

    expect(module.reads).toBe(8);
    expect(published).toEqual([
      ['home/input/door', 'CLOSED'],
      ['home/input/door', 'OPEN'],
      ['home/input/door', 'CLOSED'],
    ]);
  });

  it('stops at its next sleep once cancelled', async () => {
    const module = scriptedModule([true, true, true]);
    const published: string[] = [];
    const controller = new AbortController();
    const publish = async (_topic: string, payload: string) => {
      published.push(payload);
      controller.abort(new Error('cancelled'));
    };

    await expect(runInputPoller(door, module, 'home', publish, controller.signal, 0)).rejects.toThrow('cancelled');
    expect(published).toEqual(['OPEN']);
    expect(module.reads).toBe(1);
  });
});
