/* eslint-disable no-control-regex */

// OSC: ESC ] ... terminated by BEL or ST (ESC \)
const OSC_SEQUENCE = /\x1b\][^\x07\x1b]*(?:\x07|\x1b\\)/g;
// CSI: ESC [ params intermediates final, including DEC private modes (ESC[?25h)
const CSI_SEQUENCE = /\x1b\[[0-?]*[ -/]*[@-~]/g;
// Character set designation: ESC ( B, ESC ) 0
const CHARSET_SEQUENCE = /\x1b[()][0-9A-Za-z]/g;
// Two-byte escapes: ESC M, ESC 7, ...
const SIMPLE_ESCAPE = /\x1b[0-9@-Z\\-_]/g;
const CARRIAGE_RETURN = /\r/g;

const SIMPLE_CSI = /\x1b\[[0-9;]*[a-zA-Z]/g;

/** Remove every escape sequence and carriage return from terminal output. */
export function stripAnsi(text: string): string {
  return text
    .replace(OSC_SEQUENCE, '')
    .replace(CSI_SEQUENCE, '')
    .replace(CHARSET_SEQUENCE, '')
    .replace(SIMPLE_ESCAPE, '')
    .replace(CARRIAGE_RETURN, '');
}

/** Remove SGR-style CSI codes only. Used for short one-line status text. */
export function stripAnsiSimple(text: string): string {
  return text.replace(SIMPLE_CSI, '');
}

// Variables that make an assistant CLI think it is nested inside another session
const FILTERED_ENV_VARS = new Set(['CLAUDECODE', 'CLAUDE_PARENT_CLI']);

/** Copy of process.env without undefined values or filtered vars, plus `extra`. */
export function buildCleanEnv(extra: Record<string, string> = {}): Record<string, string> {
  const env: Record<string, string> = {};
  for (const [key, value] of Object.entries(process.env)) {
    if (value === undefined || FILTERED_ENV_VARS.has(key)) continue;
    env[key] = value;
  }
  return { ...env, ...extra };
}

/**
 * Escape a string for use in a shell command.
 * Wraps in single quotes, escaping any embedded single quotes.
 */
export function shellEscape(s: string): string {
  return `'${s.replace(/'/g, "'\\''")}'`;
}
