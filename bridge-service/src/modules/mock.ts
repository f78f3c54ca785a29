import type { MockModuleConfig } from '../settings.js';
import type { PinConfig, PinDirection, PinModule, PinPull } from './types.js';

export interface MockPinSetup {
  direction: PinDirection;
  pull: PinPull;
  config: PinConfig;
}

/**
 * In-memory backend. Useful for dry runs on a workstation and as the
 * hardware stand-in for tests: inputs are driven with `setInput()`, and
 * every write is kept in `writes`.
 */
export class MockPinModule implements PinModule {
  readonly type = 'mock';
  readonly setups = new Map<number, MockPinSetup>();
  readonly writes: Array<{ pin: number; value: boolean }> = [];
  private readonly states = new Map<number, boolean>();

  constructor(readonly name: string) {}

  static fromConfig(config: MockModuleConfig): MockPinModule {
    return new MockPinModule(config.name);
  }

  async setupPin(pin: number, direction: PinDirection, pull: PinPull, config: PinConfig): Promise<void> {
    this.setups.set(pin, { direction, pull, config });
    // floating inputs settle towards their pull resistor
    if (direction === 'input' && !this.states.has(pin)) this.states.set(pin, pull === 'up');
  }

  async readPin(pin: number): Promise<boolean> {
    return this.states.get(pin) ?? false;
  }

  async writePin(pin: number, value: boolean): Promise<void> {
    this.states.set(pin, value);
    this.writes.push({ pin, value });
  }

  setInput(pin: number, value: boolean): void {
    this.states.set(pin, value);
  }

  state(pin: number): boolean | undefined {
    return this.states.get(pin);
  }
}
