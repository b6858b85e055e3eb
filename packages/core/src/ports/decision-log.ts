import type { DecisionLogEntry } from '../models/decision.js';

/**
 * Append-only record of every decision made. Read by operators and tests,
 * never by the decision logic itself.
 */
export interface IDecisionLog {
  /** Record an entry. Insertion order is chronological order. */
  append(entry: DecisionLogEntry): void;
  /** All entries so far, oldest first */
  entries(): readonly DecisionLogEntry[];
}
