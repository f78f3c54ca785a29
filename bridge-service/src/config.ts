export const SERVICE = 'bridge-service';
export const CONFIG_PATH: string = process.env.BRIDGE_CONFIG || 'config.json';
// Credentials from env take precedence over the settings file
export const MQTT_USERNAME: string | undefined = process.env.MQTT_USERNAME || undefined;
export const MQTT_PASSWORD: string | undefined = process.env.MQTT_PASSWORD || undefined;
export const DEBUG: boolean = (process.env.BRIDGE_DEBUG || '').toLowerCase() === 'true';

export const INPUT_POLL_INTERVAL_MS = 100;
export const REAP_INTERVAL_MS = 1000;
export const SHUTDOWN_GRACE_MS = 2000;
