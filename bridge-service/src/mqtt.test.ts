import { mkdtempSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import path from 'path';
import { beforeEach, describe, expect, it, vi } from 'vitest';
import { brokerUrl, buildClientOptions, defaultClientId, MessageInbox } from './mqtt.js';
import { parseSettings } from './settings.js';

function mqttSettings(mqtt: Record<string, unknown>) {
  return parseSettings({ mqtt: { host: 'broker.local', topic_prefix: 'home', ...mqtt } }).mqtt;
}

describe('broker connection options', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  it('derives the client id from the topic prefix', () => {
    expect(defaultClientId('home')).toBe('pin-bridge-e83249bd3ba79932e16fb1fb5100dafade9954c2');
  });

  it('picks the scheme from the TLS flag', () => {
    expect(brokerUrl(mqttSettings({}))).toBe('mqtt://broker.local:1883');
    expect(brokerUrl(mqttSettings({ port: 8883, tls: { enabled: true } }))).toBe('mqtts://broker.local:8883');
  });

  it('builds plain options without credentials', () => {
    expect(buildClientOptions(mqttSettings({}))).toEqual({
      clientId: 'pin-bridge-e83249bd3ba79932e16fb1fb5100dafade9954c2',
      clean: false,
      reconnectPeriod: 0,
    });
  });

  it('passes credentials and an explicit client id', () => {
    expect(buildClientOptions(mqttSettings({ user: 'bridge', password: 'test-secret', client_id: 'garage' }))).toEqual({
      clientId: 'garage',
      clean: false,
      reconnectPeriod: 0,
      username: 'bridge',
      password: 'test-secret',
    });
  });

  it('loads TLS material and skips missing files', () => {
    const dir = mkdtempSync(path.join(tmpdir(), 'bridge-tls-'));
    const ca = path.join(dir, 'ca.crt');
    writeFileSync(ca, 'test-ca');

    const options = buildClientOptions(mqttSettings({
      tls: { enabled: true, ca_file: ca, certfile: path.join(dir, 'missing.crt'), insecure: true },
    }));

    expect(options.ca).toEqual(Buffer.from('test-ca'));
    expect(options.cert).toBeUndefined();
    expect(options.key).toBeUndefined();
    expect(options.rejectUnauthorized).toBe(false);
    expect(console.warn).toHaveBeenCalledWith(`[bridge-service] WARNING: tls.certfile path set but file not found: ${path.join(dir, 'missing.crt')}`);
  });

  it('ignores TLS files when TLS is off', () => {
    const options = buildClientOptions(mqttSettings({ tls: { enabled: false, ca_file: '/nonexistent/ca.crt' } }));
    expect(options.ca).toBeUndefined();
    expect(console.warn).not.toHaveBeenCalled();
  });
});

describe('MessageInbox', () => {
  it('decodes payloads as UTF-8', async () => {
    const inbox = new MessageInbox();
    inbox.deliver('home/output/lamp1/set', Buffer.from('GRÜN', 'utf8'));
    expect(await inbox.next()).toEqual({ topic: 'home/output/lamp1/set', payload: 'GRÜN' });
  });

  it('delivers buffered messages before reporting the close', async () => {
    const inbox = new MessageInbox();
    inbox.deliver('a', 'first');
    inbox.close(new Error('closed'));
    expect(await inbox.next()).toEqual({ topic: 'a', payload: 'first' });
    await expect(inbox.next()).rejects.toThrow('closed');
  });
});
