export { CommandParser, DEFAULT_ASSISTANT_NAMES, DEFAULT_NOISE_BLOCKLIST } from './command-parser.js';

export type { ParsedCommand, CommandKind, CommandParserOptions } from './command-parser.js';
