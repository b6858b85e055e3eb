/**
 * @fileoverview PromptClassifier - fail-closed policy for interactive prompts.
 *
 * Rules, first match wins:
 * 1. any require-user pattern        -> abort
 * 2. prompt has critical impact      -> abort
 * 3. any auto-approve pattern        -> yes
 * 4. any auto-decline pattern        -> no
 * 5. nothing matched                 -> abort
 *
 * Classification is a pure function of the prompt and the catalog. It keeps
 * no state between calls and never throws.
 *
 * @module decision/prompt-classifier
 */

import { Outcome } from '@promptgate/core';
import type { ClassifiedPrompt, DecisionOutcome, PromptPatternCatalog } from '@promptgate/core';
import { DEFAULT_PROMPT_CATALOG } from './prompt-catalog.js';

export type PromptRule =
  | 'require-user'
  | 'critical-impact'
  | 'auto-approve'
  | 'auto-decline'
  | 'fallback';

export interface PromptDecision {
  outcome: DecisionOutcome;
  rule: PromptRule;
  /** Catalog entry that fired, when the rule is pattern based */
  matchedPattern?: string;
}

function findPattern(lowerText: string, patterns: readonly string[]): string | undefined {
  return patterns.find((pattern) => lowerText.includes(pattern));
}

/** Classify a prompt and report which rule decided it. */
export function explainPrompt(
  prompt: ClassifiedPrompt,
  catalog: PromptPatternCatalog = DEFAULT_PROMPT_CATALOG,
): PromptDecision {
  const lower = prompt.text.toLowerCase();

  const requireUser = findPattern(lower, catalog.requireUserPatterns);
  if (requireUser !== undefined) {
    return { outcome: Outcome.abort, rule: 'require-user', matchedPattern: requireUser };
  }

  if (prompt.criticalImpact) {
    return { outcome: Outcome.abort, rule: 'critical-impact' };
  }

  const approve = findPattern(lower, catalog.autoApprovePatterns);
  if (approve !== undefined) {
    return { outcome: Outcome.yes, rule: 'auto-approve', matchedPattern: approve };
  }

  const decline = findPattern(lower, catalog.autoDeclinePatterns);
  if (decline !== undefined) {
    return { outcome: Outcome.no, rule: 'auto-decline', matchedPattern: decline };
  }

  return { outcome: Outcome.abort, rule: 'fallback' };
}

export function classifyPrompt(
  prompt: ClassifiedPrompt,
  catalog: PromptPatternCatalog = DEFAULT_PROMPT_CATALOG,
): DecisionOutcome {
  return explainPrompt(prompt, catalog).outcome;
}

/**
 * Binds a catalog to the classification functions.
 *
 * @example
 * ```typescript
 * const classifier = new PromptClassifier();
 * classifier.classify(buildClassifiedPrompt('Clear all settings? [y/n]'));
 * // { kind: 'no' }
 * ```
 */
export class PromptClassifier {
  constructor(readonly catalog: PromptPatternCatalog = DEFAULT_PROMPT_CATALOG) {}

  classify(prompt: ClassifiedPrompt): DecisionOutcome {
    return classifyPrompt(prompt, this.catalog);
  }

  explain(prompt: ClassifiedPrompt): PromptDecision {
    return explainPrompt(prompt, this.catalog);
  }
}
