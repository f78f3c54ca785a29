export type CommandAction = 'set' | 'pulse_on' | 'pulse_off';

export interface CommandRoute {
  action: CommandAction;
  output: string;
}

const OUTPUT_SEGMENT = 'output';
const INPUT_SEGMENT = 'input';

const ACTION_SEGMENTS: Record<string, CommandAction> = {
  set: 'set',
  set_on_ms: 'pulse_on',
  set_off_ms: 'pulse_off',
};

export const TOPICS = {
  subscription: (prefix: string) => `${prefix}/#`,
  input: (prefix: string, name: string) => `${prefix}/${INPUT_SEGMENT}/${name}`,
  outputRoot: (prefix: string) => `${prefix}/${OUTPUT_SEGMENT}/`,
};

/**
 * Match `<prefix>/output/<name>/<set|set_on_ms|set_off_ms>` exactly.
 * Returns null for anything else: other prefixes, missing or unknown action,
 * empty name, extra segments.
 */
export function parseCommandTopic(topic: string, prefix: string): CommandRoute | null {
  if (!topic.startsWith(`${prefix}/`)) return null;
  const parts = topic.slice(prefix.length + 1).split('/');
  if (parts.length !== 3) return null;
  const [segment, output, actionSegment] = parts;
  if (segment !== OUTPUT_SEGMENT || !output) return null;
  if (!Object.prototype.hasOwnProperty.call(ACTION_SEGMENTS, actionSegment)) return null;
  return { action: ACTION_SEGMENTS[actionSegment], output };
}
