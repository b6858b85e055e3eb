import type { DecisionOutcome, Keystroke } from '@promptgate/core';

const ENTER = '\r';

/** Bytes written to the terminal for each named key */
export const KEY_SEQUENCES: Readonly<Record<Keystroke, string>> = Object.freeze({
  yes: `y${ENTER}`,
  no: `n${ENTER}`,
  enter: ENTER,
  escape: '\x1b',
  up: '\x1b[A',
  down: '\x1b[B',
  interrupt: '\x03',
});

export function encodeKeystroke(key: Keystroke): string {
  return KEY_SEQUENCES[key];
}

/** Text typed as a line */
export function encodeInput(text: string): string {
  return `${text}${ENTER}`;
}

/** Answer for a prompt decision; null for `abort`, which is never typed */
export function encodeOutcome(outcome: DecisionOutcome): string | null {
  switch (outcome.kind) {
    case 'yes':
      return KEY_SEQUENCES.yes;
    case 'no':
      return KEY_SEQUENCES.no;
    case 'custom':
      return encodeInput(outcome.text);
    case 'abort':
      return null;
  }
}
