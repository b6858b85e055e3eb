/** Where a prompt showed up, inferred from the output that preceded it. */
export type SourceContext =
  | 'general'
  | 'initialization'
  | 'git_commit'
  | 'code_review'
  | 'diagnostics';

/**
 * One interactive prompt captured from terminal output.
 * Built fresh for every captured line and never mutated.
 */
export interface ClassifiedPrompt {
  readonly text: string;
  readonly sourceContext: SourceContext;
  /** True when the text mentions a destructive action (delete, overwrite, ...) */
  readonly criticalImpact: boolean;
  /** Option tokens offered by the prompt, e.g. ['y', 'n'] for "[y/n]" */
  readonly possibleResponses: readonly string[];
}

/**
 * What to do about a prompt.
 * - `yes` / `no`: answer automatically
 * - `abort`: do not answer, hand the prompt to the operator
 * - `custom`: type the given text as the answer
 */
export type DecisionOutcome =
  | { readonly kind: 'yes' }
  | { readonly kind: 'no' }
  | { readonly kind: 'abort' }
  | { readonly kind: 'custom'; readonly text: string };

export type DecisionKind = DecisionOutcome['kind'];

export const Outcome = {
  yes: Object.freeze({ kind: 'yes' }) satisfies DecisionOutcome,
  no: Object.freeze({ kind: 'no' }) satisfies DecisionOutcome,
  abort: Object.freeze({ kind: 'abort' }) satisfies DecisionOutcome,
  custom: (text: string): DecisionOutcome => Object.freeze({ kind: 'custom', text }),
} as const;

export function isSameOutcome(a: DecisionOutcome, b: DecisionOutcome): boolean {
  if (a.kind === 'custom' && b.kind === 'custom') return a.text === b.text;
  return a.kind === b.kind;
}

export function describeOutcome(outcome: DecisionOutcome): string {
  return outcome.kind === 'custom' ? `custom(${outcome.text})` : outcome.kind;
}

/** Where a free-text instruction should be executed. */
export type RoutingTarget = 'shell-command' | 'assistant-task';

export interface PromptDecisionEntry {
  readonly type: 'prompt';
  readonly input: string;
  readonly outcome: DecisionOutcome;
  readonly sourceContext: SourceContext;
  readonly timestamp: string;
}

export interface RoutingDecisionEntry {
  readonly type: 'route';
  readonly input: string;
  readonly outcome: RoutingTarget;
  /** Routed by the session's assistant mode rather than by the router */
  readonly sessionOverride: boolean;
  readonly timestamp: string;
}

export type DecisionLogEntry = PromptDecisionEntry | RoutingDecisionEntry;
