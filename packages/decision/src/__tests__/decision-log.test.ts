import { describe, it, expect } from 'vitest';
import { Outcome } from '@promptgate/core';
import { InMemoryDecisionLog, promptEntry, routeEntry } from '../decision-log.js';
import { buildClassifiedPrompt } from '../prompt-detector.js';

const NOW = new Date('2026-03-01T12:00:00.000Z');

describe('decision log entries', () => {
  it('builds a prompt entry from a classified prompt', () => {
    const prompt = buildClassifiedPrompt('Start a new session? [y/n]', 'initialization');
    expect(promptEntry(prompt, Outcome.yes, NOW)).toEqual({
      type: 'prompt',
      input: 'Start a new session? [y/n]',
      outcome: { kind: 'yes' },
      sourceContext: 'initialization',
      timestamp: '2026-03-01T12:00:00.000Z',
    });
  });

  it('builds a route entry', () => {
    expect(routeEntry('ls', 'shell-command', false, NOW)).toEqual({
      type: 'route',
      input: 'ls',
      outcome: 'shell-command',
      sessionOverride: false,
      timestamp: '2026-03-01T12:00:00.000Z',
    });
  });
});

describe('InMemoryDecisionLog', () => {
  it('keeps entries in append order', () => {
    const log = new InMemoryDecisionLog();
    log.append(routeEntry('first', 'shell-command', false, NOW));
    log.append(routeEntry('second', 'assistant-task', true, NOW));
    log.append(promptEntry(buildClassifiedPrompt('Enter your API key:'), Outcome.abort, NOW));

    expect(log.size).toBe(3);
    expect(log.entries().map((e) => e.input)).toEqual(['first', 'second', 'Enter your API key:']);
  });

  it('returns snapshots that later appends do not change', () => {
    const log = new InMemoryDecisionLog();
    log.append(routeEntry('a', 'shell-command', false, NOW));
    const snapshot = log.entries();
    log.append(routeEntry('b', 'shell-command', false, NOW));

    expect(snapshot).toHaveLength(1);
    expect(log.entries()).toHaveLength(2);
  });

  it('stores entries that cannot be edited', () => {
    const log = new InMemoryDecisionLog();
    log.append(routeEntry('a', 'shell-command', false, NOW));
    const [entry] = log.entries();
    expect(Object.isFrozen(entry)).toBe(true);
    expect(Object.isFrozen(log.entries())).toBe(true);
  });
});
