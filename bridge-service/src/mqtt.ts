import { createHash } from 'crypto';
import { existsSync, readFileSync } from 'fs';
import { connectAsync, IClientOptions, MqttClient } from 'mqtt';
import { SERVICE } from './config.js';
import { ConnectionError, TransportError } from './errors.js';
import { AsyncQueue } from './queue.js';
import type { MqttSettings } from './settings.js';

export interface BrokerMessage {
  topic: string;
  payload: string;
}

/** The slice of a broker session the runtime needs. */
export interface Broker {
  subscribe(topic: string): Promise<void>;
  publish(topic: string, payload: string): Promise<void>;
  /** Next inbound message; rejects with TransportError once the session is gone. */
  nextMessage(signal?: AbortSignal): Promise<BrokerMessage>;
  disconnect(): Promise<void>;
}

export function defaultClientId(prefix: string): string {
  return `pin-bridge-${createHash('sha1').update(prefix, 'utf8').digest('hex')}`;
}

export function brokerUrl(settings: MqttSettings): string {
  return `${settings.tls.enabled ? 'mqtts' : 'mqtt'}://${settings.host}:${settings.port}`;
}

function readTlsFile(label: string, file: string | undefined): Buffer | undefined {
  if (!file) return undefined;
  if (!existsSync(file)) {
    console.warn(`[${SERVICE}] WARNING: ${label} path set but file not found: ${file}`);
    return undefined;
  }
  return readFileSync(file);
}

export function buildClientOptions(settings: MqttSettings): IClientOptions {
  const options: IClientOptions = {
    clientId: settings.client_id || defaultClientId(settings.topic_prefix),
    clean: false,
    // A dropped session ends the bridge instead of reconnecting behind its back
    reconnectPeriod: 0,
  };
  if (settings.user) options.username = settings.user;
  if (settings.password) options.password = settings.password;
  // Only consider TLS materials when TLS is on to avoid accidental TLS on mqtt://
  if (settings.tls.enabled) {
    options.ca = readTlsFile('tls.ca_file', settings.tls.ca_file);
    options.cert = readTlsFile('tls.certfile', settings.tls.certfile);
    options.key = readTlsFile('tls.keyfile', settings.tls.keyfile);
    options.rejectUnauthorized = !settings.tls.insecure;
  }
  return options;
}

/**
 * Buffers inbound messages between the client's `message` events and the
 * receive loop. Closing it lets already-buffered messages drain first.
 */
export class MessageInbox {
  private readonly queue = new AsyncQueue<BrokerMessage>();

  deliver(topic: string, payload: Buffer | string): void {
    this.queue.put({ topic, payload: typeof payload === 'string' ? payload : payload.toString('utf8') });
  }

  close(reason: Error): void {
    this.queue.fail(reason);
  }

  next(signal?: AbortSignal): Promise<BrokerMessage> {
    return this.queue.get(signal);
  }
}

export class MqttBroker implements Broker {
  private readonly inbox = new MessageInbox();
  private closing = false;

  constructor(private readonly client: MqttClient) {
    client.on('message', (topic, payload) => this.inbox.deliver(topic, payload));
    client.on('error', (err) => console.error(`[${SERVICE}] mqtt error`, err));
    client.on('close', () => {
      if (!this.closing) console.warn(`[${SERVICE}] mqtt connection closed`);
      this.inbox.close(new TransportError('MQTT connection closed'));
    });
  }

  static async connect(settings: MqttSettings): Promise<MqttBroker> {
    const url = brokerUrl(settings);
    const options = buildClientOptions(settings);
    // Log effective MQTT settings for diagnostics (avoid secrets)
    console.log(
      `[${SERVICE}] MQTT config: url=${url} clientId=${options.clientId} user=${options.username || 'unset'} ca=${settings.tls.ca_file || 'unset'} cert=${settings.tls.certfile || 'unset'} key=${settings.tls.keyfile || 'unset'} rejectUnauthorized=${!settings.tls.insecure}`
    );
    try {
      const client = await connectAsync(url, options, false);
      console.log(`[${SERVICE}] connected to MQTT`);
      return new MqttBroker(client);
    } catch (e) {
      throw new ConnectionError(`Unable to connect to MQTT broker at ${url}: ${(e as Error).message}`, { cause: e });
    }
  }

  async subscribe(topic: string): Promise<void> {
    const grants = await this.client.subscribeAsync(topic, { qos: 1 }).catch((e: Error) => {
      throw new ConnectionError(`Unable to subscribe to ${topic}: ${e.message}`, { cause: e });
    });
    if (grants.some((g) => g.qos === 128)) throw new ConnectionError(`Subscription to ${topic} rejected by broker`);
    console.log(`[${SERVICE}] subscribed to ${topic}`);
  }

  async publish(topic: string, payload: string): Promise<void> {
    await this.client.publishAsync(topic, payload, { qos: 1 });
  }

  nextMessage(signal?: AbortSignal): Promise<BrokerMessage> {
    return this.inbox.next(signal);
  }

  async disconnect(): Promise<void> {
    this.closing = true;
    await this.client.endAsync();
  }
}
