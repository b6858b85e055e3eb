import type {
  ClassifiedPrompt,
  DecisionLogEntry,
  DecisionOutcome,
  IDecisionLog,
  PromptDecisionEntry,
  RoutingDecisionEntry,
  RoutingTarget,
} from '@promptgate/core';

/**
 * Array-backed decision log. Appends run to completion on the event loop, so
 * concurrent sessions sharing one log never interleave an entry.
 */
export class InMemoryDecisionLog implements IDecisionLog {
  private readonly items: DecisionLogEntry[] = [];

  append(entry: DecisionLogEntry): void {
    this.items.push(Object.freeze({ ...entry }));
  }

  entries(): readonly DecisionLogEntry[] {
    return Object.freeze([...this.items]);
  }

  get size(): number {
    return this.items.length;
  }
}

export function promptEntry(
  prompt: ClassifiedPrompt,
  outcome: DecisionOutcome,
  now: Date = new Date(),
): PromptDecisionEntry {
  return {
    type: 'prompt',
    input: prompt.text,
    outcome,
    sourceContext: prompt.sourceContext,
    timestamp: now.toISOString(),
  };
}

export function routeEntry(
  instruction: string,
  target: RoutingTarget,
  sessionOverride: boolean,
  now: Date = new Date(),
): RoutingDecisionEntry {
  return {
    type: 'route',
    input: instruction,
    outcome: target,
    sessionOverride,
    timestamp: now.toISOString(),
  };
}
