/**
 * @fileoverview AssistantBridge - connects operator input and a terminal.
 *
 * Input flows parser -> session/router -> dispatcher. Terminal output flows
 * watcher -> auto-responder, which answers or escalates prompts, and drives
 * assistant mode when an assistant session appears or disappears.
 *
 * @module bridge/assistant-bridge
 */

import type {
  ClassifiedPrompt,
  IDecisionLog,
  IEventBus,
  ITerminalSource,
  InputSource,
  Keystroke,
  TerminalSnapshot,
} from '@promptgate/core';
import { createLogger } from '@promptgate/core';
import {
  AutoResponder,
  CommandRouter,
  RoutingSession,
  createDetectionRules,
  createPromptCatalog,
  createRoutingCatalog,
  type RoutedInstruction,
} from '@promptgate/decision';
import { CommandParser } from '@promptgate/voice';
import { TerminalWatcher } from '@promptgate/terminal';
import type { PromptgateConfig } from './config.js';
import { TerminalCommandDispatcher, type TerminalSink } from './terminal-dispatcher.js';

const log = createLogger('AssistantBridge');

export type BridgeConfig = Pick<
  PromptgateConfig,
  'pollIntervalMs' | 'assistantCommand' | 'promptTriggers' | 'promptCatalog' | 'routingCatalog' | 'voice'
>;

export interface AssistantBridgeOptions {
  terminal: ITerminalSource & TerminalSink;
  config: BridgeConfig;
  log: IDecisionLog;
  eventBus?: IEventBus;
  /** Stops polling when aborted */
  signal?: AbortSignal;
  onHumanInput?: (prompt: ClassifiedPrompt) => void;
}

/** What `submit` did with a line of input */
export type SubmitResult =
  | { kind: 'ignored'; reason: 'empty' | 'noise' }
  | { kind: 'keystroke'; key: Keystroke }
  | { kind: 'interrupt' }
  | { kind: 'slash-command'; command: string }
  | { kind: 'assistant-mode'; active: boolean }
  | { kind: 'routed'; routed: RoutedInstruction };

export class AssistantBridge {
  readonly session: RoutingSession;
  readonly responder: AutoResponder;
  readonly watcher: TerminalWatcher;
  private readonly parser: CommandParser;
  private readonly dispatcher: TerminalCommandDispatcher;
  /** Whether the last snapshot showed an assistant session */
  private assistantVisible = false;
  private unsubscribe: (() => void) | null = null;

  constructor(private readonly options: AssistantBridgeOptions) {
    const { config, eventBus, terminal } = options;

    this.parser = new CommandParser({
      assistantNames: config.voice.assistantNames,
      noiseBlocklist: config.voice.noiseBlocklist,
    });
    this.session = new RoutingSession({
      log: options.log,
      router: new CommandRouter(createRoutingCatalog(config.routingCatalog)),
      eventBus,
    });
    this.dispatcher = new TerminalCommandDispatcher(terminal, {
      assistantCommand: config.assistantCommand,
      isAssistantActive: () => this.assistantVisible,
      onHumanInput: options.onHumanInput,
    });
    this.responder = new AutoResponder({
      log: options.log,
      dispatcher: this.dispatcher,
      catalog: createPromptCatalog(config.promptCatalog),
      rules: config.promptTriggers ? createDetectionRules(config.promptTriggers) : undefined,
      eventBus,
    });
    this.watcher = new TerminalWatcher({
      source: terminal,
      intervalMs: config.pollIntervalMs,
      signal: options.signal,
      eventBus,
    });
  }

  start(): void {
    if (!this.unsubscribe) {
      this.unsubscribe = this.watcher.onSnapshot((snapshot) => this.handleSnapshot(snapshot));
    }
    this.watcher.start();
  }

  stop(): void {
    this.watcher.stop();
    this.unsubscribe?.();
    this.unsubscribe = null;
  }

  /** Handle one line typed or spoken by the operator. */
  submit(input: string, source: InputSource = 'text'): SubmitResult {
    if (!input.trim()) return { kind: 'ignored', reason: 'empty' };

    const command = this.parser.parse(input, source);
    switch (command.kind) {
      case 'noise':
        log.debug(`Dropped noise: "${command.text}"`);
        return { kind: 'ignored', reason: 'noise' };

      case 'keystroke':
        this.dispatcher.sendKeystroke(command.key);
        return { kind: 'keystroke', key: command.key };

      case 'interrupt':
        this.dispatcher.sendKeystroke('interrupt');
        return { kind: 'interrupt' };

      case 'slash-command':
        this.dispatcher.sendInput(command.command);
        return { kind: 'slash-command', command: command.command };

      case 'assistant-mode':
        this.session.setAssistantMode(command.active, 'command');
        if (command.active && !this.assistantVisible) {
          this.dispatcher.runShellCommand(this.options.config.assistantCommand);
        }
        return { kind: 'assistant-mode', active: command.active };

      case 'instruction': {
        const routed = this.session.route(command.instruction, {
          source,
          addressedToAssistant: command.addressedToAssistant,
        });
        if (routed.target === 'assistant-task') {
          this.dispatcher.sendAssistantTask(routed.instruction);
        } else {
          this.dispatcher.runShellCommand(routed.instruction);
        }
        return { kind: 'routed', routed };
      }
    }
  }

  /**
   * React to a terminal snapshot: follow the assistant session in and out of
   * assistant mode, then let the responder look for a prompt.
   */
  handleSnapshot(snapshot: TerminalSnapshot): void {
    if (snapshot.assistantActive !== this.assistantVisible) {
      this.assistantVisible = snapshot.assistantActive;
      this.session.setAssistantMode(snapshot.assistantActive, 'detected');
    }
    this.responder.handleOutput(snapshot.content);
  }
}
