/**
 * @fileoverview CommandParser - Turns a transcript or typed line into a
 * structured command for the bridge.
 *
 * Classification order (first match wins):
 * 1. Noise: phantom speech-to-text output (voice input only)
 * 2. Slash command: "/review", or "slash review" when spoken
 * 3. Assistant mode: "start claude mode", "exit claude"
 * 4. Keystroke: a bare "yes", "no", "enter", "escape", "up", "down"
 * 5. Interrupt: the whole command is "stop", "cancel", "never mind", ...
 * 6. Instruction: everything else, with an assistant address stripped
 *
 * @module voice/command-parser
 */

import type { InputSource, Keystroke } from '@promptgate/core';

/**
 * Result of parsing one line of input. `text` is always the trimmed input.
 */
export type ParsedCommand =
  | { kind: 'noise'; text: string }
  | { kind: 'keystroke'; text: string; key: Keystroke }
  | { kind: 'interrupt'; text: string }
  | { kind: 'slash-command'; text: string; command: string }
  | { kind: 'assistant-mode'; text: string; active: boolean }
  | {
      kind: 'instruction';
      text: string;
      /** Instruction with any assistant address removed */
      instruction: string;
      /** The operator addressed the assistant by name */
      addressedToAssistant: boolean;
    };

export type CommandKind = ParsedCommand['kind'];

export interface CommandParserOptions {
  /** Names the assistant answers to, e.g. "claude" (case-insensitive) */
  assistantNames?: readonly string[];
  /** Voice transcripts that are discarded as phantom speech */
  noiseBlocklist?: readonly string[];
}

export const DEFAULT_ASSISTANT_NAMES: readonly string[] = ['claude code', 'claude', 'assistant'];

/** Common speech-to-text output for silence or background audio */
export const DEFAULT_NOISE_BLOCKLIST: readonly string[] = [
  'bye', 'bye bye', 'goodbye',
  'thank you', 'thanks', 'you',
  'hmm', 'uh', 'um', 'ah', 'oh',
  'so', 'well', 'like',
  'thank you for watching',
  'thanks for watching',
  'please subscribe',
  'like and subscribe',
  'music',
  'applause',
  'laughter',
  'silence',
  'the',
  'a',
  'i',
  'it',
];

const KEYSTROKE_WORDS: ReadonlyMap<string, Keystroke> = new Map<string, Keystroke>([
  ['yes', 'yes'],
  ['no', 'no'],
  ['enter', 'enter'],
  ['return', 'enter'],
  ['escape', 'escape'],
  ['esc', 'escape'],
  ['up', 'up'],
  ['down', 'down'],
]);

/**
 * A whole command that interrupts, e.g. "stop", "cancel that", "please stop".
 * Anchored so "git merge --abort" or "docker stop web" stay instructions.
 */
const INTERRUPT_PHRASE =
  /^(?:please\s+)?(?:stop|cancel|abort|quit|never\s?mind|forget it)(?:\s+(?:it|that|this|now))?(?:\s+please)?$/;

const MODE_ON_VERBS = new Set(['start', 'enter', 'open']);

const SLASH_COMMAND = /^\/[a-z][\w-]*(?:\s.*)?$/i;
const SPOKEN_SLASH = /^slash\s+(\S.*)$/i;
/** Parenthetical or bracketed asides, e.g. "(music)" or "[applause]" */
const ASIDE = /[([][^)\]]*[)\]]/g;
const TRAILING_PUNCTUATION = /[.!?,;:]+$/;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** Lower-case, collapse whitespace and drop trailing punctuation. */
function normalize(text: string): string {
  return text.toLowerCase().replace(/\s+/g, ' ').trim().replace(TRAILING_PUNCTUATION, '').trim();
}

/**
 * Parses operator input into commands.
 *
 * @example
 * ```typescript
 * const parser = new CommandParser();
 * parser.parse('hey claude, explain the build script');
 * // { kind: 'instruction', text: 'hey claude, explain the build script',
 * //   instruction: 'explain the build script', addressedToAssistant: true }
 * parser.parse('yes');
 * // { kind: 'keystroke', text: 'yes', key: 'yes' }
 * ```
 */
export class CommandParser {
  private readonly noise: ReadonlySet<string>;
  private readonly modePattern: RegExp;
  private readonly addressPatterns: readonly RegExp[];

  constructor(options: CommandParserOptions = {}) {
    this.noise = new Set((options.noiseBlocklist ?? DEFAULT_NOISE_BLOCKLIST).map(normalize));

    // Longest name first so "claude code" is not read as "claude" + "code ..."
    const names = [...(options.assistantNames ?? DEFAULT_ASSISTANT_NAMES)]
      .map((name) => name.trim().toLowerCase())
      .filter((name) => name.length > 0)
      .sort((a, b) => b.length - a.length)
      .map(escapeRegExp)
      .join('|');

    this.modePattern = new RegExp(
      `^(start|enter|open|exit|leave|quit|close)\\s+(?:the\\s+)?(?:${names})(?:\\s+(?:mode|session))?$`,
      'i',
    );
    this.addressPatterns = [
      new RegExp(`^(?:hey|hi|ok|okay)[,.]?\\s+(?:${names})[,.:]?\\s+(\\S[\\s\\S]*)$`, 'i'),
      new RegExp(`^(?:ask|tell)\\s+(?:${names})\\s+(?:to\\s+)?(\\S[\\s\\S]*)$`, 'i'),
      // A bare name needs punctuation: "claude init" is a shell command
      new RegExp(`^(?:${names})[,:]\\s*(\\S[\\s\\S]*)$`, 'i'),
    ];
  }

  /**
   * Parse one line of input.
   *
   * @param input - Transcript or typed line
   * @param source - Noise filtering applies to voice input only
   */
  parse(input: string, source: InputSource = 'text'): ParsedCommand {
    const text = input.trim();
    const normalized = normalize(text);

    if (source === 'voice' && this.isNoise(text, normalized)) {
      return { kind: 'noise', text };
    }

    const slash = this.parseSlashCommand(text);
    if (slash !== null) {
      return { kind: 'slash-command', text, command: slash };
    }

    const mode = this.modePattern.exec(normalized);
    if (mode) {
      return { kind: 'assistant-mode', text, active: MODE_ON_VERBS.has(mode[1]) };
    }

    const words = normalized.split(' ').filter((word) => word.length > 0);

    const key = this.parseKeystroke(words);
    if (key !== null) {
      return { kind: 'keystroke', text, key };
    }

    // "stop" interrupts, "stop the dev server" is a task
    if (INTERRUPT_PHRASE.test(normalized.replace(/[,.!]/g, ''))) {
      return { kind: 'interrupt', text };
    }

    for (const pattern of this.addressPatterns) {
      const match = pattern.exec(text);
      if (match) {
        return { kind: 'instruction', text, instruction: match[1].trim(), addressedToAssistant: true };
      }
    }

    return { kind: 'instruction', text, instruction: text, addressedToAssistant: false };
  }

  private isNoise(text: string, normalized: string): boolean {
    if (normalized.length === 0) return true;
    if (this.noise.has(normalized)) return true;
    // Transcripts made only of asides, e.g. "(upbeat music)"
    return normalize(text.replace(ASIDE, ' ')).length === 0;
  }

  private parseSlashCommand(text: string): string | null {
    if (SLASH_COMMAND.test(text)) return text;
    const spoken = SPOKEN_SLASH.exec(text);
    if (spoken) return `/${spoken[1].trim().replace(TRAILING_PUNCTUATION, '')}`;
    return null;
  }

  /** One key word, optionally after "press" or "hit" */
  private parseKeystroke(words: readonly string[]): Keystroke | null {
    if (words.length === 0 || words.length > 2) return null;
    if (words.length === 2 && words[0] !== 'press' && words[0] !== 'hit') return null;
    return KEYSTROKE_WORDS.get(words[words.length - 1]) ?? null;
  }
}
