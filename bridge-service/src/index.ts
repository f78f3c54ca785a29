/**
 * Bridge Service
 * ---------------------------------------------
 * Purpose
 * - Expose digital input and output pins of local hardware modules over MQTT.
 *
 * Responsibilities
 * - Poll configured inputs every 100 ms and publish transitions.
 * - Apply SET commands to outputs, serialized per hardware module.
 * - Run timed pulses (`set_on_ms` / `set_off_ms`) as independent tasks.
 * - Supervise background tasks and shut them down on SIGINT/SIGTERM.
 *
 * Topic Contracts (under the configured `topic_prefix`)
 * - Set output: `{prefix}/output/{name}/set` with the on/off payload.
 * - Pulse output: `{prefix}/output/{name}/set_on_ms` | `set_off_ms` with a duration in ms.
 * - Input state: `{prefix}/input/{name}` carries the on/off payload on every change.
 *
 * Environment & Dependencies
 * - BRIDGE_CONFIG: path to the JSON settings file (default `config.json`).
 * - MQTT_USERNAME, MQTT_PASSWORD: override broker credentials from the settings file.
 * - BRIDGE_DEBUG: `true` enables debug logging.
 *
 * Operational Notes
 * - Subscribes to `{prefix}/#` at QoS 1; publishes input state at QoS 1.
 * - Losing the broker connection stops the service with exit code 1 so the
 *   process manager can restart it.
 */
import { CONFIG_PATH, SERVICE } from './config.js';
import { createModules } from './modules/registry.js';
import { MqttBroker } from './mqtt.js';
import { BridgeRuntime } from './runtime.js';
import { loadSettings } from './settings.js';
import { registerShutdown } from './shutdown.js';

async function main() {
  console.log(`[${SERVICE}] starting...`);
  const settings = loadSettings(CONFIG_PATH);
  const modules = createModules(settings.gpio_modules);
  const broker = await MqttBroker.connect(settings.mqtt);

  const runtime = new BridgeRuntime(settings, broker, modules);
  try {
    await runtime.start();
  } catch (e) {
    await broker.disconnect().catch((err: unknown) => console.warn(`[${SERVICE}] Error closing MQTT client:`, err));
    throw e;
  }
  const unregister = registerShutdown(runtime);
  try {
    await runtime.run();
  } finally {
    unregister();
  }
  console.log(`[${SERVICE}] stopped`);
}

main().catch((e) => {
  console.error(`[${SERVICE}] fatal:`, e);
  process.exitCode = 1;
});
