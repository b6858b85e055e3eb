/** What the watcher saw on one poll. */
export interface TerminalSnapshot {
  /** Full cleaned content */
  content: string;
  /** Content that appeared since the previous poll */
  newContent: string;
  /** An assistant CLI session is visible */
  assistantActive: boolean;
  /** Some interactive prompt is waiting for input */
  interactive: boolean;
}

export type Keystroke = 'yes' | 'no' | 'enter' | 'escape' | 'up' | 'down' | 'interrupt';

export type InputSource = 'voice' | 'text';
