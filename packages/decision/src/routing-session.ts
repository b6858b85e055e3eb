import type {
  IDecisionLog,
  IEventBus,
  InputSource,
  RoutingTarget,
  AssistantModeChangedEvent,
  CommandRoutedEvent,
} from '@promptgate/core';
import { Events, createLogger } from '@promptgate/core';
import { CommandRouter, type RoutingRule } from './command-router.js';
import { routeEntry } from './decision-log.js';

const log = createLogger('RoutingSession');

const DEFAULT_HISTORY_LIMIT = 50;

export interface RoutingSessionOptions {
  log: IDecisionLog;
  router?: CommandRouter;
  eventBus?: IEventBus;
  /** How many assistant tasks to remember (default 50) */
  historyLimit?: number;
}

export interface RouteOptions {
  source?: InputSource;
  /** The operator addressed the assistant by name for this one instruction */
  addressedToAssistant?: boolean;
}

export interface RoutedInstruction {
  instruction: string;
  target: RoutingTarget;
  sessionOverride: boolean;
  rule: RoutingRule | 'assistant-mode' | 'addressed';
}

/**
 * Per-terminal routing state. While assistant mode is on (an assistant CLI
 * session is open) every instruction goes to the assistant; otherwise the
 * stateless CommandRouter decides. Every decision is logged before it is
 * returned.
 */
export class RoutingSession {
  private assistantMode = false;
  private history: string[] = [];
  private readonly router: CommandRouter;
  private readonly decisionLog: IDecisionLog;
  private readonly eventBus: IEventBus | null;
  private readonly historyLimit: number;

  constructor(options: RoutingSessionOptions) {
    this.decisionLog = options.log;
    this.router = options.router ?? new CommandRouter();
    this.eventBus = options.eventBus ?? null;
    this.historyLimit = options.historyLimit ?? DEFAULT_HISTORY_LIMIT;
  }

  get isAssistantMode(): boolean {
    return this.assistantMode;
  }

  setAssistantMode(active: boolean, reason: AssistantModeChangedEvent['reason'] = 'command'): void {
    if (this.assistantMode === active) return;
    this.assistantMode = active;
    log.info(`Assistant mode ${active ? 'on' : 'off'} (${reason})`);
    const event: AssistantModeChangedEvent = { active, reason };
    this.eventBus?.emit(Events.ASSISTANT_MODE_CHANGED, event);
  }

  route(instruction: string, options: RouteOptions = {}): RoutedInstruction {
    let routed: RoutedInstruction;
    if (this.assistantMode) {
      routed = { instruction, target: 'assistant-task', sessionOverride: true, rule: 'assistant-mode' };
    } else if (options.addressedToAssistant) {
      routed = { instruction, target: 'assistant-task', sessionOverride: true, rule: 'addressed' };
    } else {
      const decision = this.router.explain(instruction);
      routed = { instruction, target: decision.target, sessionOverride: false, rule: decision.rule };
    }

    this.decisionLog.append(routeEntry(instruction, routed.target, routed.sessionOverride));
    if (routed.target === 'assistant-task') this.remember(instruction);

    log.debug(`Routed "${instruction.slice(0, 60)}" -> ${routed.target} (${routed.rule})`);
    const event: CommandRoutedEvent = {
      instruction,
      target: routed.target,
      sessionOverride: routed.sessionOverride,
      source: options.source,
    };
    this.eventBus?.emit(Events.COMMAND_ROUTED, event);
    return routed;
  }

  /** Most recent assistant tasks, oldest first */
  getAssistantHistory(): readonly string[] {
    return [...this.history];
  }

  private remember(task: string): void {
    this.history.push(task);
    if (this.history.length > this.historyLimit) {
      this.history.splice(0, this.history.length - this.historyLimit);
    }
  }
}
