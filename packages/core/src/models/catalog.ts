import type { SourceContext } from './decision.js';

/**
 * Pattern groups used to classify interactive prompts. Every entry is a
 * lower-cased substring; matching is case-insensitive containment.
 */
export interface PromptPatternCatalog {
  /** Any match forces escalation, whatever else matches */
  readonly requireUserPatterns: readonly string[];
  readonly autoApprovePatterns: readonly string[];
  readonly autoDeclinePatterns: readonly string[];
  /** Words that mark a prompt as having critical impact */
  readonly criticalVocabulary: ReadonlySet<string>;
}

/** Plain-data form of a catalog, as found in config files. */
export interface PromptCatalogInput {
  requireUserPatterns?: string[];
  autoApprovePatterns?: string[];
  autoDeclinePatterns?: string[];
  criticalVocabulary?: string[];
}

export interface RoutingCatalog {
  /** Instructions starting with one of these go to the assistant */
  readonly assistantPrefixes: readonly string[];
  /** Together with "how to", any of these marks a coding question */
  readonly codeKeywords: readonly string[];
}

export interface RoutingCatalogInput {
  assistantPrefixes?: string[];
  codeKeywords?: string[];
}

export interface ContextMarker {
  readonly marker: string;
  readonly context: SourceContext;
}

/** Phrases that decide whether a captured line is a prompt at all. */
export interface PromptDetectionRules {
  /** Case-sensitive, matched against the line as it appears on screen */
  readonly triggers: readonly string[];
  /** Checked in order against the whole buffer; first hit wins */
  readonly contextMarkers: readonly ContextMarker[];
}
