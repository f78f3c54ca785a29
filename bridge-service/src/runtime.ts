import { DEBUG, INPUT_POLL_INTERVAL_MS, REAP_INTERVAL_MS, SERVICE } from './config.js';
import { OutputDispatcher } from './dispatcher.js';
import type { PinModule, PinPull } from './modules/types.js';
import type { Broker } from './mqtt.js';
import { runInputPoller } from './poller.js';
import { runPulse } from './pulse.js';
import type { BridgeSettings, DigitalInputConfig, DigitalOutputConfig } from './settings.js';
import { TaskSupervisor } from './supervisor.js';
import { parseCommandTopic, TOPICS } from './topics.js';
import type { InputSpec, OutputSpec, Publish } from './types.js';

export interface RuntimeOptions {
  pollIntervalMs?: number;
  reapIntervalMs?: number;
  shutdownGraceMs?: number;
}

function pullOf(config: DigitalInputConfig): PinPull {
  if (config.pullup) return 'up';
  if (config.pulldown) return 'down';
  return 'none';
}

function toInputSpec(config: DigitalInputConfig): InputSpec {
  return {
    name: config.name,
    module: config.module,
    pin: config.pin,
    pull: pullOf(config),
    onPayload: config.on_payload,
    offPayload: config.off_payload,
  };
}

function toOutputSpec(config: DigitalOutputConfig): OutputSpec {
  return {
    name: config.name,
    module: config.module,
    pin: config.pin,
    onPayload: config.on_payload,
    offPayload: config.off_payload,
    inverted: config.inverted,
  };
}

/**
 * Owns the broker session and every background task of the bridge.
 *
 * Lifecycle: `start()` subscribes, configures pins and spawns the input
 * pollers and output workers; `run()` then receives and dispatches messages
 * until `stop()` is called or the broker session fails, and finishes by
 * cancelling all tasks and disconnecting.
 */
export class BridgeRuntime {
  readonly supervisor = new TaskSupervisor();
  private readonly prefix: string;
  private readonly inputs: Array<{ spec: InputSpec; config: DigitalInputConfig }>;
  private readonly outputs: Array<{ spec: OutputSpec; config: DigitalOutputConfig }>;
  private readonly outputsByName = new Map<string, OutputSpec>();
  private readonly dispatcher: OutputDispatcher;
  private readonly loops = new AbortController();
  private started = false;

  constructor(
    settings: BridgeSettings,
    private readonly broker: Broker,
    private readonly modules: Map<string, PinModule>,
    private readonly options: RuntimeOptions = {},
  ) {
    this.prefix = settings.mqtt.topic_prefix;
    this.inputs = settings.digital_inputs.map((config) => ({ spec: toInputSpec(config), config }));
    this.outputs = settings.digital_outputs.map((config) => ({ spec: toOutputSpec(config), config }));
    for (const { spec } of this.outputs) this.outputsByName.set(spec.name, spec);
    this.dispatcher = new OutputDispatcher(this.outputs.map(({ spec }) => spec));
  }

  private module(name: string): PinModule {
    const module = this.modules.get(name);
    if (!module) throw new Error(`Unknown module ${name}`);
    return module;
  }

  private readonly publish: Publish = async (topic, payload) => {
    if (DEBUG) console.debug(`[${SERVICE}] publish ${topic}: ${JSON.stringify(payload)}`);
    await this.broker.publish(topic, payload);
  };

  /** Subscribe, configure every pin, then spawn pollers and output workers. */
  async start(): Promise<void> {
    if (this.started) throw new Error('Runtime already started');
    this.started = true;

    await this.broker.subscribe(TOPICS.subscription(this.prefix));

    try {
      for (const { spec, config } of this.inputs) {
        await this.module(spec.module).setupPin(spec.pin, 'input', spec.pull, config);
      }
      for (const { spec, config } of this.outputs) {
        await this.module(spec.module).setupPin(spec.pin, 'output', 'none', config);
      }
    } catch (e) {
      await this.cleanupModules();
      throw e;
    }

    const intervalMs = this.options.pollIntervalMs ?? INPUT_POLL_INTERVAL_MS;
    for (const { spec } of this.inputs) {
      const module = this.module(spec.module);
      this.supervisor.spawn(`input:${spec.name}`, (signal) => runInputPoller(spec, module, this.prefix, this.publish, signal, intervalMs));
    }
    this.dispatcher.start(this.supervisor);
    console.log(`[${SERVICE}] started ${this.inputs.length} input(s), ${this.outputs.length} output(s) on ${this.modules.size} module(s)`);
  }

  /**
   * Receive and dispatch until stopped or until the broker session fails,
   * then shut everything down. Rejects with the transport error in the
   * latter case.
   */
  async run(): Promise<void> {
    if (!this.started) throw new Error('Runtime not started');
    const signal = this.loops.signal;
    const receive = this.receiveLoop(signal);
    const reaper = this.supervisor.runReaper(signal, this.options.reapIntervalMs ?? REAP_INTERVAL_MS);

    let failure: unknown = null;
    try {
      await Promise.race([receive, reaper]);
    } catch (e) {
      if (!signal.aborted) failure = e;
    }
    this.loops.abort();
    await Promise.allSettled([receive, reaper]);
    await this.shutdown();
    if (failure) throw failure;
  }

  /** Ask `run()` to wind down. Safe to call more than once. */
  stop(): void {
    if (this.loops.signal.aborted) return;
    console.log(`[${SERVICE}] stopping...`);
    this.loops.abort();
  }

  private async receiveLoop(signal: AbortSignal): Promise<void> {
    for (;;) {
      const { topic, payload } = await this.broker.nextMessage(signal);
      this.handleMessage(topic, payload);
    }
  }

  handleMessage(topic: string, payload: string): void {
    const route = parseCommandTopic(topic, this.prefix);
    if (!route) {
      if (topic.startsWith(TOPICS.outputRoot(this.prefix))) {
        console.warn(`[${SERVICE}] unable to parse topic ${topic}: expected ${this.prefix}/output/<name>/<set|set_on_ms|set_off_ms>`);
      } else if (DEBUG) {
        console.debug(`[${SERVICE}] ignoring message on ${topic}`);
      }
      return;
    }

    const output = this.outputsByName.get(route.output);
    if (!output) {
      console.warn(`[${SERVICE}] no output named ${route.output}; ignoring message on ${topic}`);
      return;
    }
    console.log(`[${SERVICE}] received message on topic ${topic}: ${JSON.stringify(payload)}`);
    const module = this.module(output.module);

    if (route.action === 'set') {
      this.dispatcher.submit({ module, output, payload });
      return;
    }
    const action = route.action;
    this.supervisor.spawn(`pulse:${output.name}`, (signal) => runPulse(output, module, action, payload, signal));
  }

  private async cleanupModules(): Promise<void> {
    for (const module of this.modules.values()) {
      if (!module.cleanup) continue;
      try {
        await module.cleanup();
      } catch (error) {
        console.warn(`[${SERVICE}] Error cleaning up module ${module.name}:`, error);
      }
    }
  }

  private async shutdown(): Promise<void> {
    console.log(`[${SERVICE}] cancelling ${this.supervisor.size} background task(s)...`);
    await this.supervisor.shutdown(this.options.shutdownGraceMs);
    await this.cleanupModules();

    console.log(`[${SERVICE}] disconnecting from MQTT...`);
    try {
      await this.broker.disconnect();
      console.log(`[${SERVICE}] MQTT disconnected`);
    } catch (error) {
      console.warn(`[${SERVICE}] Error closing MQTT client:`, error);
    }
  }
}
