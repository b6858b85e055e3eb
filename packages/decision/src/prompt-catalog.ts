/**
 * @fileoverview Pattern catalogs for prompt classification and prompt detection.
 *
 * Catalogs are built once at startup (defaults, or overrides from config) and
 * frozen. The classifier and detector take them as arguments so tests can
 * swap in their own without touching classification code.
 *
 * @module decision/prompt-catalog
 */

import type {
  ContextMarker,
  PromptCatalogInput,
  PromptDetectionRules,
  PromptPatternCatalog,
} from '@promptgate/core';

/** A Set whose mutators throw, so a shared catalog cannot drift at runtime. */
class FrozenSet<T> extends Set<T> {
  private sealed = false;

  constructor(values: Iterable<T>) {
    super(values);
    this.sealed = true;
  }

  override add(value: T): this {
    if (this.sealed) throw new TypeError('Catalog vocabulary is read-only');
    return super.add(value);
  }

  override delete(_value: T): boolean {
    throw new TypeError('Catalog vocabulary is read-only');
  }

  override clear(): void {
    throw new TypeError('Catalog vocabulary is read-only');
  }
}

/** Credentials and destructive file operations: never answered automatically */
const DEFAULT_REQUIRE_USER = [
  'api key',
  'password',
  'credential',
  'authentication',
  'secret',
  'token',
  'delete file',
  'remove file',
  'overwrite existing',
  'force push',
];

const DEFAULT_AUTO_APPROVE = [
  'do you want to create a claude.md file',
  'would you like me to commit these changes',
  'do you want me to add comments to this code',
  'start a new session',
  'do you want to see more examples',
];

// Broader destructive verbs go through requireUser and criticalVocabulary,
// so they escalate instead of being declined silently.
const DEFAULT_AUTO_DECLINE = [
  'clear all settings',
  'erase',
];

const DEFAULT_CRITICAL_VOCABULARY = [
  'delete',
  'remove',
  'overwrite',
  'permanent',
  'force',
];

const CONTEXT_MARKERS: readonly ContextMarker[] = Object.freeze<ContextMarker[]>([
  { marker: 'claude init', context: 'initialization' },
  { marker: 'claude commit', context: 'git_commit' },
  { marker: '/review', context: 'code_review' },
  { marker: '/doctor', context: 'diagnostics' },
]);

/**
 * Phrases that make the last line of output count as a prompt. Matched
 * case-sensitively, as the assistant CLI prints them.
 */
const DEFAULT_TRIGGERS = [
  'Do you want to',
  'Would you like to',
  'Would you like me to',
  'Proceed with',
  'Continue with',
  'Are you sure',
  '[y/n]',
  '(y/n)',
  'yes/no',
  'Please select:',
  'Enter your API key',
  'provide your password',
  'Authentication token',
  'Delete file',
  'Remove file',
  'Force push',
];

function normalizePatterns(patterns: readonly string[]): string[] {
  const seen = new Set<string>();
  for (const pattern of patterns) {
    const normalized = pattern.trim().toLowerCase();
    if (normalized) seen.add(normalized);
  }
  return [...seen];
}

/**
 * Build a frozen catalog. A group given in `input` replaces the default group
 * wholesale; omitted groups keep their defaults.
 */
export function createPromptCatalog(input: PromptCatalogInput = {}): PromptPatternCatalog {
  return Object.freeze({
    requireUserPatterns: Object.freeze(normalizePatterns(input.requireUserPatterns ?? DEFAULT_REQUIRE_USER)),
    autoApprovePatterns: Object.freeze(normalizePatterns(input.autoApprovePatterns ?? DEFAULT_AUTO_APPROVE)),
    autoDeclinePatterns: Object.freeze(normalizePatterns(input.autoDeclinePatterns ?? DEFAULT_AUTO_DECLINE)),
    criticalVocabulary: new FrozenSet(normalizePatterns(input.criticalVocabulary ?? DEFAULT_CRITICAL_VOCABULARY)),
  });
}

export const DEFAULT_PROMPT_CATALOG: PromptPatternCatalog = createPromptCatalog();

export function createDetectionRules(triggers: readonly string[] = DEFAULT_TRIGGERS): PromptDetectionRules {
  return Object.freeze({
    triggers: Object.freeze(triggers.filter((t) => t.length > 0)),
    contextMarkers: CONTEXT_MARKERS,
  });
}

export const DEFAULT_DETECTION_RULES: PromptDetectionRules = createDetectionRules();
