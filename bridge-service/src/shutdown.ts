import { SERVICE } from './config.js';
import type { BridgeRuntime } from './runtime.js';

/** First SIGINT/SIGTERM winds the runtime down; a second one exits immediately. */
export function registerShutdown(runtime: BridgeRuntime): () => void {
  let requested = false;
  const shutdown = (signal: NodeJS.Signals) => {
    if (requested) {
      console.warn(`[${SERVICE}] received ${signal} again, exiting now`);
      process.exit(1);
    }
    requested = true;
    console.log(`[${SERVICE}] received ${signal}, shutting down...`);
    runtime.stop();
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
  return () => {
    process.off('SIGINT', shutdown);
    process.off('SIGTERM', shutdown);
  };
}
