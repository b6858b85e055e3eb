export const SCROLLBACK_MAX = 10_000;
export const FLUSH_INTERVAL_MS = 16;

// DSR (Device Status Report) pattern: assistant CLIs send ESC[6n to query the
// cursor position and hang until they get an answer.
// eslint-disable-next-line no-control-regex
const DSR_PATTERN = /\x1b\[\??6n/g;

export function stripDsrRequests(input: string): { cleaned: string; dsrCount: number } {
  let dsrCount = 0;
  const cleaned = input.replace(DSR_PATTERN, () => {
    dsrCount++;
    return '';
  });
  return { cleaned, dsrCount };
}

/** Build a CPR (Cursor Position Report) response: ESC[row;colR */
export function buildCursorPositionResponse(row = 1, col = 1): string {
  return `\x1b[${row};${col}R`;
}

/** Writable PTY process, the only part the data handler needs */
export interface WritablePty {
  write(data: string): void;
}

export type PtyOutputHandler = (data: string) => void;

/**
 * Answers DSR queries, keeps a bounded scrollback and batches output (~60fps).
 */
export class PtyDataHandler {
  private outputBuffer = '';
  private flushTimer: ReturnType<typeof setTimeout> | null = null;
  private readonly cursorResponse = buildCursorPositionResponse();
  readonly scrollback: string[] = [];

  constructor(
    private readonly ptyProcess: WritablePty,
    private readonly outputHandler: () => PtyOutputHandler | null,
    private readonly scrollbackMax = SCROLLBACK_MAX,
  ) {}

  onData(data: string): void {
    const { cleaned, dsrCount } = stripDsrRequests(data);
    for (let i = 0; i < dsrCount; i++) {
      this.ptyProcess.write(this.cursorResponse);
    }

    // Output continues the last (possibly partial) line
    const lines = cleaned.split('\n');
    if (this.scrollback.length > 0) {
      this.scrollback[this.scrollback.length - 1] += lines.shift() ?? '';
    }
    this.scrollback.push(...lines);
    if (this.scrollback.length > this.scrollbackMax) {
      this.scrollback.splice(0, this.scrollback.length - this.scrollbackMax);
    }

    this.outputBuffer += cleaned;
    if (!this.flushTimer) {
      this.flushTimer = setTimeout(() => {
        this.outputHandler()?.(this.outputBuffer);
        this.outputBuffer = '';
        this.flushTimer = null;
      }, FLUSH_INTERVAL_MS);
    }
  }

  /** Flush remaining buffered output and clean up timers */
  flush(): void {
    if (this.outputBuffer) {
      this.outputHandler()?.(this.outputBuffer);
      this.outputBuffer = '';
    }
    if (this.flushTimer) {
      clearTimeout(this.flushTimer);
      this.flushTimer = null;
    }
  }

  getContent(): string {
    return this.scrollback.join('\n');
  }

  /** Last N lines of scrollback, for exit diagnostics */
  getLastOutput(lines = 30): string {
    return this.scrollback.slice(-lines).join('\n');
  }
}
