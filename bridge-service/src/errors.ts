/** Settings file missing, unreadable or failing validation. */
export class ConfigError extends Error {
  constructor(message: string, readonly issues: string[] = []) {
    super(issues.length ? `${message}:\n  ${issues.join('\n  ')}` : message);
    this.name = 'ConfigError';
  }
}

/** Broker connect or subscribe failed during startup. */
export class ConnectionError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConnectionError';
  }
}

/** Broker session lost while the bridge was running. */
export class TransportError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TransportError';
  }
}

/** Pulse payload is not a usable millisecond duration. */
export class PayloadFormatError extends Error {
  constructor(readonly payload: string) {
    super(`Unable to parse ms value from payload ${JSON.stringify(payload)}`);
    this.name = 'PayloadFormatError';
  }
}
