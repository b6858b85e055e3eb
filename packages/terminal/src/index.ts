export { PtyTerminal } from './pty-terminal.js';
export { PtyDataHandler, stripDsrRequests, buildCursorPositionResponse, SCROLLBACK_MAX } from './pty-utils.js';
export { TerminalWatcher, DEFAULT_POLL_INTERVAL_MS } from './terminal-watcher.js';
export {
  extractNewContent,
  isAssistantSessionVisible,
  isAwaitingInput,
  DEFAULT_ASSISTANT_MARKERS,
  DEFAULT_INTERACTIVE_PATTERNS,
} from './session-detector.js';
export { KEY_SEQUENCES, encodeKeystroke, encodeInput, encodeOutcome } from './keystrokes.js';
export { stripAnsi, stripAnsiSimple, buildCleanEnv, shellEscape } from './utils.js';

export type {
  PtySpawnOptions,
  PtySpawnResult,
  PtyExitHandler,
  PtyProcess,
  PtySpawner,
  PtyTerminalOptions,
} from './pty-terminal.js';
export type { PtyOutputHandler, WritablePty } from './pty-utils.js';
export type { TerminalWatcherOptions, SnapshotHandler } from './terminal-watcher.js';
