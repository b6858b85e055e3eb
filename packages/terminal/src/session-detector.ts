/** Text that shows an assistant CLI session is open in the terminal */
export const DEFAULT_ASSISTANT_MARKERS: readonly string[] = [
  'Claude Code',
  '/bug',
  '/clear',
  '/compact',
  '/config',
  '/cost',
  '/doctor',
  '/help',
  '/init',
  '/login',
  '/logout',
  '/pr_comments',
  '/review',
  '/terminal-setup',
];

/** Text that shows some program is waiting for input */
export const DEFAULT_INTERACTIVE_PATTERNS: readonly string[] = [
  'Do you want to proceed?',
  '[y/n]',
  '(y/n)',
  'Select an option:',
  'Press any key to continue',
  'Press Enter to continue',
  'to continue…',
];

/** Only the bottom of the screen counts, so a closed session stops matching */
export const DETECTION_WINDOW_LINES = 50;

function tail(content: string, lines: number): string {
  const all = content.split('\n');
  return all.length <= lines ? content : all.slice(-lines).join('\n');
}

export function isAssistantSessionVisible(
  content: string,
  markers: readonly string[] = DEFAULT_ASSISTANT_MARKERS,
  windowLines = DETECTION_WINDOW_LINES,
): boolean {
  const recent = tail(content, windowLines);
  return markers.some((marker) => recent.includes(marker));
}

export function isAwaitingInput(
  content: string,
  patterns: readonly string[] = DEFAULT_INTERACTIVE_PATTERNS,
  windowLines = DETECTION_WINDOW_LINES,
): boolean {
  const recent = tail(content, windowLines);
  return patterns.some((pattern) => recent.includes(pattern));
}

/**
 * Content that appeared between two reads: the suffix when `current` extends
 * `previous`, otherwise every line from the first one that differs.
 */
export function extractNewContent(previous: string, current: string): string {
  if (current.startsWith(previous)) {
    return current.slice(previous.length);
  }

  const oldLines = previous.split('\n');
  const newLines = current.split('\n');
  const common = Math.min(oldLines.length, newLines.length);

  let diverge = 0;
  while (diverge < common && oldLines[diverge] === newLines[diverge]) {
    diverge++;
  }
  return newLines.slice(diverge).join('\n');
}
