/**
 * @fileoverview CommandRouter - decides whether an instruction is a shell
 * command or a task for the coding assistant.
 *
 * Routing rules (on the lower-cased, trimmed instruction):
 * 1. Starts with an assistant-intent prefix ("explain", "fix bug", ...)
 * 2. Contains "how to" together with a code keyword ("function", "api", ...)
 * 3. Anything else is a shell command
 *
 * The router is stateless. Session-level overrides (assistant mode) live in
 * RoutingSession.
 *
 * @module decision/command-router
 */

import type { RoutingCatalog, RoutingCatalogInput, RoutingTarget } from '@promptgate/core';

const DEFAULT_ASSISTANT_PREFIXES = [
  'explain',
  'analyze',
  'summarize',
  'refactor',
  'optimize',
  'document',
  'find bug',
  'fix bug',
  'add test',
  'implement',
  'create function',
  'improve',
  'rewrite',
  'debug',
  'add comments',
];

const DEFAULT_CODE_KEYWORDS = ['function', 'class', 'method', 'api', 'interface', 'code', 'script'];

const HOW_TO = 'how to';

function normalize(entries: readonly string[]): readonly string[] {
  return Object.freeze(
    entries.map((entry) => entry.trim().toLowerCase()).filter((entry) => entry.length > 0),
  );
}

/** Build a frozen routing catalog; a list given in `input` replaces the default. */
export function createRoutingCatalog(input: RoutingCatalogInput = {}): RoutingCatalog {
  return Object.freeze({
    assistantPrefixes: normalize(input.assistantPrefixes ?? DEFAULT_ASSISTANT_PREFIXES),
    codeKeywords: normalize(input.codeKeywords ?? DEFAULT_CODE_KEYWORDS),
  });
}

export const DEFAULT_ROUTING_CATALOG: RoutingCatalog = createRoutingCatalog();

export type RoutingRule = 'assistant-prefix' | 'how-to-code' | 'fallback';

export interface RoutingDecision {
  target: RoutingTarget;
  rule: RoutingRule;
  matched?: string;
}

export function explainRoute(
  instruction: string,
  catalog: RoutingCatalog = DEFAULT_ROUTING_CATALOG,
): RoutingDecision {
  const lower = instruction.trim().toLowerCase();

  const prefix = catalog.assistantPrefixes.find((p) => lower.startsWith(p));
  if (prefix !== undefined) {
    return { target: 'assistant-task', rule: 'assistant-prefix', matched: prefix };
  }

  if (lower.includes(HOW_TO)) {
    const keyword = catalog.codeKeywords.find((k) => lower.includes(k));
    if (keyword !== undefined) {
      return { target: 'assistant-task', rule: 'how-to-code', matched: keyword };
    }
  }

  return { target: 'shell-command', rule: 'fallback' };
}

export function routeInstruction(
  instruction: string,
  catalog: RoutingCatalog = DEFAULT_ROUTING_CATALOG,
): RoutingTarget {
  return explainRoute(instruction, catalog).target;
}

/**
 * Binds a routing catalog.
 *
 * @example
 * ```typescript
 * const router = new CommandRouter();
 * router.route('git status');                      // 'shell-command'
 * router.route('explain how this function works'); // 'assistant-task'
 * ```
 */
export class CommandRouter {
  constructor(readonly catalog: RoutingCatalog = DEFAULT_ROUTING_CATALOG) {}

  route(instruction: string): RoutingTarget {
    return routeInstruction(instruction, this.catalog);
  }

  explain(instruction: string): RoutingDecision {
    return explainRoute(instruction, this.catalog);
  }
}
