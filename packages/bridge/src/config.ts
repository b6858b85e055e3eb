import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import type { LogLevel, PromptCatalogInput, RoutingCatalogInput } from '@promptgate/core';
import { createLogger, isLogLevel } from '@promptgate/core';
import { DEFAULT_ASSISTANT_NAMES, DEFAULT_NOISE_BLOCKLIST } from '@promptgate/voice';

const log = createLogger('Config');

export const CONFIG_FILE_NAME = 'promptgate.config.json';

export interface VoiceConfig {
  /** Names the assistant answers to in "hey claude, ..." */
  assistantNames: string[];
  /** Voice transcripts dropped as phantom speech */
  noiseBlocklist: string[];
}

export interface PromptgateConfig {
  logLevel: LogLevel;
  /** Terminal polling interval */
  pollIntervalMs: number;
  /** Command that starts the assistant CLI */
  assistantCommand: string;
  /** Shell to run; null means $SHELL */
  shell: string | null;
  /** JSONL file for the decision log; null keeps it in memory */
  decisionLogPath: string | null;
  /** Phrases that make a line count as a prompt; null keeps the built-in list */
  promptTriggers: string[] | null;
  promptCatalog: PromptCatalogInput;
  routingCatalog: RoutingCatalogInput;
  voice: VoiceConfig;
}

export const DEFAULT_CONFIG: PromptgateConfig = {
  logLevel: 'info',
  pollIntervalMs: 500,
  assistantCommand: 'claude',
  shell: null,
  decisionLogPath: null,
  promptTriggers: null,
  promptCatalog: {},
  routingCatalog: {},
  voice: {
    assistantNames: [...DEFAULT_ASSISTANT_NAMES],
    noiseBlocklist: [...DEFAULT_NOISE_BLOCKLIST],
  },
};

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}

type FileConfig = Partial<Omit<PromptgateConfig, 'voice'>> & { voice?: Partial<VoiceConfig> };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

function isPositiveInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value > 0;
}

function pickStringArrays<K extends string>(
  value: unknown,
  keys: readonly K[],
): Partial<Record<K, string[]>> {
  const picked: Partial<Record<K, string[]>> = {};
  if (!isRecord(value)) return picked;
  for (const key of keys) {
    const entry = value[key];
    if (isStringArray(entry)) picked[key] = entry;
  }
  return picked;
}

/** Keep the known, well-typed fields of a parsed config file. */
export function sanitizeFileConfig(raw: unknown): FileConfig {
  if (!isRecord(raw)) return {};
  const config: FileConfig = {};

  const { logLevel, pollIntervalMs, assistantCommand, shell, decisionLogPath, promptTriggers } = raw;
  if (typeof logLevel === 'string' && isLogLevel(logLevel)) config.logLevel = logLevel;
  if (isPositiveInteger(pollIntervalMs)) config.pollIntervalMs = pollIntervalMs;
  if (typeof assistantCommand === 'string' && assistantCommand.trim()) {
    config.assistantCommand = assistantCommand.trim();
  }
  if (typeof shell === 'string' || shell === null) config.shell = shell;
  if (typeof decisionLogPath === 'string' || decisionLogPath === null) {
    config.decisionLogPath = decisionLogPath;
  }
  if (isStringArray(promptTriggers)) config.promptTriggers = promptTriggers;

  if (raw.promptCatalog !== undefined) {
    config.promptCatalog = pickStringArrays(raw.promptCatalog, [
      'requireUserPatterns',
      'autoApprovePatterns',
      'autoDeclinePatterns',
      'criticalVocabulary',
    ]);
  }
  if (raw.routingCatalog !== undefined) {
    config.routingCatalog = pickStringArrays(raw.routingCatalog, ['assistantPrefixes', 'codeKeywords']);
  }
  if (raw.voice !== undefined) {
    config.voice = pickStringArrays(raw.voice, ['assistantNames', 'noiseBlocklist']);
  }
  return config;
}

function readFileConfig(path: string): FileConfig {
  if (!existsSync(path)) {
    log.info('No config file found, using defaults');
    return {};
  }
  try {
    const parsed: unknown = JSON.parse(readFileSync(path, 'utf-8'));
    log.info(`Loaded config from ${path}`);
    return sanitizeFileConfig(parsed);
  } catch (error) {
    log.warn(`Failed to parse config at ${path}, using defaults: ${String(error)}`);
    return {};
  }
}

function readEnvOverrides(env: NodeJS.ProcessEnv): Partial<PromptgateConfig> {
  const overrides: Partial<PromptgateConfig> = {};

  const level = env.PROMPTGATE_LOG_LEVEL;
  if (level) {
    if (isLogLevel(level)) overrides.logLevel = level;
    else log.warn(`Ignoring PROMPTGATE_LOG_LEVEL=${level}`);
  }

  const interval = env.PROMPTGATE_POLL_INTERVAL_MS;
  if (interval) {
    const parsed = Number(interval);
    if (isPositiveInteger(parsed)) overrides.pollIntervalMs = parsed;
    else log.warn(`Ignoring PROMPTGATE_POLL_INTERVAL_MS=${interval}`);
  }

  if (env.PROMPTGATE_ASSISTANT_COMMAND) overrides.assistantCommand = env.PROMPTGATE_ASSISTANT_COMMAND;
  if (env.PROMPTGATE_DECISION_LOG) overrides.decisionLogPath = env.PROMPTGATE_DECISION_LOG;
  if (env.PROMPTGATE_SHELL) overrides.shell = env.PROMPTGATE_SHELL;

  return overrides;
}

/**
 * Resolve configuration: defaults < config file < environment.
 * The config file is `PROMPTGATE_CONFIG`, else promptgate.config.json in the
 * working directory.
 */
export function loadConfig(options: LoadConfigOptions = {}): PromptgateConfig {
  const env = options.env ?? process.env;
  const path = env.PROMPTGATE_CONFIG ?? join(options.cwd ?? process.cwd(), CONFIG_FILE_NAME);

  const fileConfig = readFileConfig(path);
  const envOverrides = readEnvOverrides(env);

  // Nested groups are merged so a partial override keeps the other defaults
  const merged: PromptgateConfig = {
    ...DEFAULT_CONFIG,
    ...fileConfig,
    ...envOverrides,
    promptCatalog: { ...DEFAULT_CONFIG.promptCatalog, ...fileConfig.promptCatalog },
    routingCatalog: { ...DEFAULT_CONFIG.routingCatalog, ...fileConfig.routingCatalog },
    voice: { ...DEFAULT_CONFIG.voice, ...fileConfig.voice },
  };

  log.info(
    `Config resolved: assistant=${merged.assistantCommand}, poll=${merged.pollIntervalMs}ms, ` +
      `decisionLog=${merged.decisionLogPath ?? 'memory'}`,
  );
  return merged;
}
