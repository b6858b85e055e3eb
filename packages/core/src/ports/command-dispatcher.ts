import type { ClassifiedPrompt } from '../models/decision.js';
import type { Keystroke } from '../models/terminal.js';

/**
 * Performs the side effects decided by the engine: typing into the terminal,
 * handing work to the assistant, or asking the operator.
 */
export interface ICommandDispatcher {
  sendKeystroke(key: Keystroke): void;
  /** Type `text` followed by Enter */
  sendInput(text: string): void;
  runShellCommand(command: string): void;
  sendAssistantTask(task: string): void;
  /** Surface a prompt the engine refused to answer */
  requestHumanInput(prompt: ClassifiedPrompt): void;
}
