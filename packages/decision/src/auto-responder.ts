/**
 * @fileoverview AutoResponder - answers or escalates prompts found in
 * terminal output.
 *
 * For each output buffer: detect a prompt on the last line, classify it,
 * append the decision to the log, then act through the dispatcher. The log
 * entry is always written before any keystroke is sent.
 *
 * @module decision/auto-responder
 */

import type {
  ClassifiedPrompt,
  DecisionOutcome,
  ICommandDispatcher,
  IDecisionLog,
  IEventBus,
  PromptDecidedEvent,
  PromptDetectedEvent,
  PromptDetectionRules,
  PromptEscalatedEvent,
  PromptPatternCatalog,
} from '@promptgate/core';
import { Events, createLogger, describeOutcome } from '@promptgate/core';
import { DEFAULT_DETECTION_RULES, DEFAULT_PROMPT_CATALOG } from './prompt-catalog.js';
import { detectPrompt, lastNonEmptyLineIndex } from './prompt-detector.js';
import { explainPrompt, type PromptRule } from './prompt-classifier.js';
import { promptEntry } from './decision-log.js';

const log = createLogger('AutoResponder');

export interface AutoResponderOptions {
  log: IDecisionLog;
  dispatcher: ICommandDispatcher;
  catalog?: PromptPatternCatalog;
  rules?: PromptDetectionRules;
  eventBus?: IEventBus;
  /** Label for log lines when several terminals are watched */
  sessionId?: string;
}

export interface AutoResponseResult {
  prompt: ClassifiedPrompt;
  outcome: DecisionOutcome;
  rule: PromptRule;
  /** An answer was typed into the terminal */
  responded: boolean;
}

export class AutoResponder {
  private readonly catalog: PromptPatternCatalog;
  private readonly rules: PromptDetectionRules;
  private readonly eventBus: IEventBus | null;
  /** Prompt answered or escalated last; cleared once the screen moves on */
  private lastHandled: { text: string; line: number } | null = null;

  constructor(private readonly options: AutoResponderOptions) {
    this.catalog = options.catalog ?? DEFAULT_PROMPT_CATALOG;
    this.rules = options.rules ?? DEFAULT_DETECTION_RULES;
    this.eventBus = options.eventBus ?? null;
  }

  /**
   * Inspect the latest terminal output.
   *
   * A prompt is identified by its text and its line in the buffer. Repeated
   * polls, and our own answer echoed on the same line, are ignored; the same
   * text on a later line is a new prompt.
   *
   * @returns The decision taken, or null when there was nothing to decide
   */
  handleOutput(buffer: string): AutoResponseResult | null {
    const prompt = detectPrompt(buffer, this.catalog, this.rules);
    if (!prompt) {
      this.lastHandled = null;
      return null;
    }
    const line = lastNonEmptyLineIndex(buffer);
    if (
      this.lastHandled !== null
      && this.lastHandled.line === line
      && prompt.text.startsWith(this.lastHandled.text)
    ) {
      return null;
    }
    this.lastHandled = { text: prompt.text, line };

    const detected: PromptDetectedEvent = { prompt };
    this.eventBus?.emit(Events.PROMPT_DETECTED, detected);

    const decision = explainPrompt(prompt, this.catalog);
    this.options.log.append(promptEntry(prompt, decision.outcome));

    const responded = this.act(prompt, decision.outcome);
    log.info(
      `Prompt "${prompt.text}" -> ${describeOutcome(decision.outcome)} (${decision.rule})`,
      { sourceContext: prompt.sourceContext, matched: decision.matchedPattern },
      this.options.sessionId,
    );

    const decided: PromptDecidedEvent = { prompt, outcome: decision.outcome, responded };
    this.eventBus?.emit(Events.PROMPT_DECIDED, decided);

    return { prompt, outcome: decision.outcome, rule: decision.rule, responded };
  }

  /** Forget the last handled prompt so an identical one is handled again */
  reset(): void {
    this.lastHandled = null;
  }

  private act(prompt: ClassifiedPrompt, outcome: DecisionOutcome): boolean {
    const { dispatcher } = this.options;
    switch (outcome.kind) {
      case 'yes':
        dispatcher.sendKeystroke('yes');
        return true;
      case 'no':
        dispatcher.sendKeystroke('no');
        return true;
      case 'custom':
        dispatcher.sendInput(outcome.text);
        return true;
      case 'abort': {
        dispatcher.requestHumanInput(prompt);
        const escalated: PromptEscalatedEvent = { prompt };
        this.eventBus?.emit(Events.PROMPT_ESCALATED, escalated);
        return false;
      }
    }
  }
}
