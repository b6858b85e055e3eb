import type { ClassifiedPrompt, ICommandDispatcher, Keystroke } from '@promptgate/core';
import { createLogger } from '@promptgate/core';
import { shellEscape } from '@promptgate/terminal';

const log = createLogger('TerminalDispatcher');

/** Where dispatched input is typed; PtyTerminal implements it */
export interface TerminalSink {
  sendKeystroke(key: Keystroke): void;
  sendInput(text: string): void;
}

export interface TerminalDispatcherOptions {
  /** Command that starts the assistant CLI with a task */
  assistantCommand: string;
  /** An assistant session is open, so tasks are typed straight into it */
  isAssistantActive: () => boolean;
  /** Called for prompts that need the operator */
  onHumanInput?: (prompt: ClassifiedPrompt) => void;
}

/**
 * Carries out decisions by typing into the terminal.
 */
export class TerminalCommandDispatcher implements ICommandDispatcher {
  constructor(
    private readonly terminal: TerminalSink,
    private readonly options: TerminalDispatcherOptions,
  ) {}

  sendKeystroke(key: Keystroke): void {
    this.terminal.sendKeystroke(key);
  }

  sendInput(text: string): void {
    this.terminal.sendInput(text);
  }

  runShellCommand(command: string): void {
    log.debug(`Shell: ${command}`);
    this.terminal.sendInput(command);
  }

  sendAssistantTask(task: string): void {
    if (this.options.isAssistantActive()) {
      this.terminal.sendInput(task);
      return;
    }
    const command = `${this.options.assistantCommand} ${shellEscape(task)}`;
    log.debug(`Starting assistant: ${command}`);
    this.terminal.sendInput(command);
  }

  requestHumanInput(prompt: ClassifiedPrompt): void {
    log.warn(`Needs your answer: ${prompt.text}`, { sourceContext: prompt.sourceContext });
    this.options.onHumanInput?.(prompt);
  }
}
