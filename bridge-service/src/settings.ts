import { readFileSync } from 'fs';
import { z } from 'zod';
import { MQTT_PASSWORD, MQTT_USERNAME } from './config.js';
import { ConfigError } from './errors.js';

const nameSchema = z.string().min(1).regex(/^[^/#+]+$/, 'must not contain "/", "#" or "+"');
const pinSchema = z.number().int().nonnegative();

const tlsSchema = z.object({
  enabled: z.boolean().default(false),
  ca_file: z.string().optional(),
  certfile: z.string().optional(),
  keyfile: z.string().optional(),
  insecure: z.boolean().default(false),
});

const mqttSchema = z.object({
  host: z.string().min(1),
  port: z.number().int().min(1).max(65535).default(1883),
  user: z.string().default(''),
  password: z.string().default(''),
  client_id: z.string().default(''),
  topic_prefix: z.string()
    .min(1)
    .regex(/^[^#+]+$/, 'must not contain wildcards')
    .refine((p) => !p.startsWith('/') && !p.endsWith('/'), 'must not start or end with "/"')
    .default('mqtt-gpio'),
  tls: tlsSchema.default({}),
});

export const mockModuleSchema = z.object({
  name: nameSchema,
  module: z.literal('mock'),
});

export const sysfsModuleSchema = z.object({
  name: nameSchema,
  module: z.literal('sysfs'),
  base_path: z.string().min(1).default('/sys/class/gpio'),
});

const moduleSchema = z.discriminatedUnion('module', [mockModuleSchema, sysfsModuleSchema]);

const digitalInputSchema = z.object({
  name: nameSchema,
  module: z.string().min(1),
  pin: pinSchema,
  on_payload: z.string().default('ON'),
  off_payload: z.string().default('OFF'),
  pullup: z.boolean().default(false),
  pulldown: z.boolean().default(false),
});

const digitalOutputSchema = z.object({
  name: nameSchema,
  module: z.string().min(1),
  pin: pinSchema,
  on_payload: z.string().default('ON'),
  off_payload: z.string().default('OFF'),
  inverted: z.boolean().default(false),
});

function flagDuplicates(names: string[], path: (string | number)[], ctx: z.RefinementCtx) {
  const seen = new Set<string>();
  names.forEach((name, i) => {
    if (seen.has(name)) ctx.addIssue({ code: z.ZodIssueCode.custom, path: [...path, i, 'name'], message: `duplicate name "${name}"` });
    seen.add(name);
  });
}

export const settingsSchema = z.object({
  mqtt: mqttSchema,
  gpio_modules: z.array(moduleSchema).default([]),
  digital_inputs: z.array(digitalInputSchema).default([]),
  digital_outputs: z.array(digitalOutputSchema).default([]),
}).superRefine((s, ctx) => {
  flagDuplicates(s.gpio_modules.map((m) => m.name), ['gpio_modules'], ctx);
  flagDuplicates(s.digital_inputs.map((i) => i.name), ['digital_inputs'], ctx);
  flagDuplicates(s.digital_outputs.map((o) => o.name), ['digital_outputs'], ctx);

  const modules = new Set(s.gpio_modules.map((m) => m.name));
  s.digital_inputs.forEach((input, i) => {
    if (!modules.has(input.module)) ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['digital_inputs', i, 'module'], message: `unknown module "${input.module}"` });
    if (input.pullup && input.pulldown) ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['digital_inputs', i], message: 'pullup and pulldown are mutually exclusive' });
  });
  s.digital_outputs.forEach((output, i) => {
    if (!modules.has(output.module)) ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['digital_outputs', i, 'module'], message: `unknown module "${output.module}"` });
  });
});

export type BridgeSettings = z.infer<typeof settingsSchema>;
export type MqttSettings = BridgeSettings['mqtt'];
export type ModuleConfig = z.infer<typeof moduleSchema>;
export type MockModuleConfig = z.infer<typeof mockModuleSchema>;
export type SysfsModuleConfig = z.infer<typeof sysfsModuleSchema>;
export type DigitalInputConfig = z.infer<typeof digitalInputSchema>;
export type DigitalOutputConfig = z.infer<typeof digitalOutputSchema>;

function formatIssue(issue: z.ZodIssue): string {
  const path = issue.path.length ? issue.path.join('.') : '(root)';
  return `${path}: ${issue.message}`;
}

/** Validate a raw settings document, fill defaults and apply env credentials. */
export function parseSettings(raw: unknown): BridgeSettings {
  const result = settingsSchema.safeParse(raw);
  if (!result.success) throw new ConfigError('Invalid settings', result.error.issues.map(formatIssue));
  const settings = result.data;
  if (MQTT_USERNAME) settings.mqtt.user = MQTT_USERNAME;
  if (MQTT_PASSWORD) settings.mqtt.password = MQTT_PASSWORD;
  return settings;
}

export function loadSettings(path: string): BridgeSettings {
  let text: string;
  try {
    text = readFileSync(path, 'utf8');
  } catch (e) {
    throw new ConfigError(`Unable to read settings file ${path}: ${(e as Error).message}`);
  }
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (e) {
    throw new ConfigError(`Settings file ${path} is not valid JSON: ${(e as Error).message}`);
  }
  return parseSettings(raw);
}
