import { describe, expect, it } from 'vitest';
import { parseCommandTopic, TOPICS } from './topics.js';

describe('parseCommandTopic', () => {
  it('parses set, set_on_ms and set_off_ms', () => {
    expect(parseCommandTopic('home/output/lamp1/set', 'home')).toEqual({ action: 'set', output: 'lamp1' });
    expect(parseCommandTopic('home/output/lamp1/set_on_ms', 'home')).toEqual({ action: 'pulse_on', output: 'lamp1' });
    expect(parseCommandTopic('home/output/lamp1/set_off_ms', 'home')).toEqual({ action: 'pulse_off', output: 'lamp1' });
  });

  it('rejects a missing action', () => {
    expect(parseCommandTopic('home/output/lamp1', 'home')).toBeNull();
  });

  it('rejects a different prefix', () => {
    expect(parseCommandTopic('other/output/lamp1/set', 'home')).toBeNull();
    expect(parseCommandTopic('homes/output/lamp1/set', 'home')).toBeNull();
  });

  it('rejects extra segments, unknown actions and empty names', () => {
    expect(parseCommandTopic('home/output/lamp1/set/now', 'home')).toBeNull();
    expect(parseCommandTopic('home/output/lamp1/toggle', 'home')).toBeNull();
    expect(parseCommandTopic('home/output//set', 'home')).toBeNull();
    expect(parseCommandTopic('home/input/lamp1/set', 'home')).toBeNull();
    expect(parseCommandTopic('home/output/lamp1/constructor', 'home')).toBeNull();
  });

  it('accepts a multi-level prefix', () => {
    expect(parseCommandTopic('site/a/output/pump/set', 'site/a')).toEqual({ action: 'set', output: 'pump' });
    expect(parseCommandTopic('site/output/pump/set', 'site/a')).toBeNull();
  });

  it('builds input and subscription topics', () => {
    expect(TOPICS.input('home', 'door')).toBe('home/input/door');
    expect(TOPICS.subscription('home')).toBe('home/#');
  });
});
