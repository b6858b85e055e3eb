import type {
  ClassifiedPrompt,
  DecisionOutcome,
  RoutingTarget,
} from '../models/decision.js';
import type { InputSource, TerminalSnapshot } from '../models/terminal.js';

export interface PromptDetectedEvent {
  prompt: ClassifiedPrompt;
}

export interface PromptDecidedEvent {
  prompt: ClassifiedPrompt;
  outcome: DecisionOutcome;
  /** Whether an answer was typed into the terminal */
  responded: boolean;
}

export interface PromptEscalatedEvent {
  prompt: ClassifiedPrompt;
}

export interface CommandRoutedEvent {
  instruction: string;
  target: RoutingTarget;
  sessionOverride: boolean;
  source?: InputSource;
}

export interface AssistantModeChangedEvent {
  active: boolean;
  reason: 'command' | 'detected';
}

export type TerminalOutputEvent = TerminalSnapshot;

export const Events = {
  PROMPT_DETECTED: 'prompt:detected',
  PROMPT_DECIDED: 'prompt:decided',
  PROMPT_ESCALATED: 'prompt:escalated',
  COMMAND_ROUTED: 'command:routed',
  ASSISTANT_MODE_CHANGED: 'assistant:modeChanged',
  TERMINAL_OUTPUT: 'terminal:output',
} as const;

export type EventName = (typeof Events)[keyof typeof Events];
