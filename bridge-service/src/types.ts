import type { PinModule, PinPull } from './modules/types.js';

export interface InputSpec {
  readonly name: string;
  readonly module: string;
  readonly pin: number;
  readonly pull: PinPull;
  readonly onPayload: string;
  readonly offPayload: string;
}

export interface OutputSpec {
  readonly name: string;
  readonly module: string;
  readonly pin: number;
  readonly onPayload: string;
  readonly offPayload: string;
  readonly inverted: boolean;
}

/** A SET request waiting in a module's dispatch queue. */
export interface OutputCommand {
  readonly module: PinModule;
  readonly output: OutputSpec;
  readonly payload: string;
}

export type Publish = (topic: string, payload: string) => Promise<void>;
