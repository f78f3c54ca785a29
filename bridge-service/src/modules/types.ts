export type PinDirection = 'input' | 'output';
export type PinPull = 'none' | 'up' | 'down';

/** The input/output entry a pin was declared with, handed to the backend untouched. */
export type PinConfig = Readonly<Record<string, unknown>>;

/**
 * Capabilities every hardware backend provides. One instance exists per
 * configured module and is shared by every task that touches its pins.
 */
export interface PinModule {
  readonly name: string;
  readonly type: string;
  /** One-time pin setup, run at startup before any read or write. */
  setupPin(pin: number, direction: PinDirection, pull: PinPull, config: PinConfig): Promise<void>;
  readPin(pin: number): Promise<boolean>;
  writePin(pin: number, value: boolean): Promise<void>;
  /** Release hardware resources at shutdown. */
  cleanup?(): Promise<void>;
}
