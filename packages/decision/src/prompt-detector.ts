/**
 * @fileoverview Turns raw terminal output into a ClassifiedPrompt.
 *
 * Only the last non-empty line is considered. It becomes a prompt when it
 * contains one of the detection triggers; anything else produces `null`,
 * meaning "nothing to decide", which is not the same as escalating.
 *
 * @module decision/prompt-detector
 */

import type {
  ClassifiedPrompt,
  PromptDetectionRules,
  PromptPatternCatalog,
  SourceContext,
} from '@promptgate/core';
import { DEFAULT_DETECTION_RULES, DEFAULT_PROMPT_CATALOG } from './prompt-catalog.js';

const BRACKET_GROUP = /\[([^\]]+)\]/;
const PAREN_GROUP = /\(([^)]+)\)/;

/** Index of the last line with visible content, or -1 if there is none. */
export function lastNonEmptyLineIndex(buffer: string): number {
  const lines = buffer.split(/\r?\n/);
  for (let i = lines.length - 1; i >= 0; i--) {
    if (lines[i].trim()) return i;
  }
  return -1;
}

/** Last line with visible content, without trailing whitespace. Empty if none. */
export function lastNonEmptyLine(buffer: string): string {
  const index = lastNonEmptyLineIndex(buffer);
  return index < 0 ? '' : buffer.split(/\r?\n/)[index].trimEnd();
}

export function isPromptLine(line: string, rules: PromptDetectionRules = DEFAULT_DETECTION_RULES): boolean {
  return rules.triggers.some((trigger) => line.includes(trigger));
}

export function inferSourceContext(
  buffer: string,
  rules: PromptDetectionRules = DEFAULT_DETECTION_RULES,
): SourceContext {
  for (const { marker, context } of rules.contextMarkers) {
    if (buffer.includes(marker)) return context;
  }
  return 'general';
}

/**
 * Options offered by a prompt: the interior of the first `[...]` group, or of
 * the first `(...)` group when there is no bracket group, split on `/`.
 *
 *   extractPossibleResponses('Continue? [y/n]')        // ['y', 'n']
 *   extractPossibleResponses('Pick one (1 / 2 / 3)')   // ['1', '2', '3']
 */
export function extractPossibleResponses(line: string): string[] {
  const match = BRACKET_GROUP.exec(line) ?? PAREN_GROUP.exec(line);
  if (!match) return [];
  return match[1].split('/').map((token) => token.trim());
}

export function hasCriticalImpact(
  text: string,
  catalog: PromptPatternCatalog = DEFAULT_PROMPT_CATALOG,
): boolean {
  const lower = text.toLowerCase();
  for (const word of catalog.criticalVocabulary) {
    if (lower.includes(word)) return true;
  }
  return false;
}

/** Build the immutable prompt record for one captured line. */
export function buildClassifiedPrompt(
  text: string,
  sourceContext: SourceContext = 'general',
  catalog: PromptPatternCatalog = DEFAULT_PROMPT_CATALOG,
): ClassifiedPrompt {
  return Object.freeze({
    text,
    sourceContext,
    criticalImpact: hasCriticalImpact(text, catalog),
    possibleResponses: Object.freeze(extractPossibleResponses(text)),
  });
}

/**
 * Find the prompt waiting at the bottom of `buffer`, if there is one.
 *
 * @returns The prompt, or null when the last line is not a prompt
 */
export function detectPrompt(
  buffer: string,
  catalog: PromptPatternCatalog = DEFAULT_PROMPT_CATALOG,
  rules: PromptDetectionRules = DEFAULT_DETECTION_RULES,
): ClassifiedPrompt | null {
  const line = lastNonEmptyLine(buffer);
  if (!line || !isPromptLine(line, rules)) return null;
  return buildClassifiedPrompt(line, inferSourceContext(buffer, rules), catalog);
}
