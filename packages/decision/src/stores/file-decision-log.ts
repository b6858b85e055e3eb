import { appendFile, mkdir, readFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { setTimeout as sleep } from 'node:timers/promises';
import type { DecisionLogEntry, IDecisionLog } from '@promptgate/core';
import { createLogger } from '@promptgate/core';

const log = createLogger('FileDecisionLog');

export interface FileDecisionLogOptions {
  /** Attempts per line before the write is given up (default 3) */
  maxAttempts?: number;
  /** Backoff step between attempts, multiplied by the attempt number (default 100) */
  retryDelayMs?: number;
}

const OUTCOME_KINDS = new Set(['yes', 'no', 'abort', 'custom']);
const ROUTING_TARGETS = new Set(['shell-command', 'assistant-task']);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isDecisionLogEntry(value: unknown): value is DecisionLogEntry {
  if (!isRecord(value)) return false;
  if (typeof value.input !== 'string' || typeof value.timestamp !== 'string') return false;

  const outcome = value.outcome;

  if (value.type === 'route') {
    return typeof outcome === 'string'
      && ROUTING_TARGETS.has(outcome)
      && typeof value.sessionOverride === 'boolean';
  }

  if (value.type === 'prompt') {
    if (!isRecord(outcome)) return false;
    const kind = outcome.kind;
    if (typeof kind !== 'string' || !OUTCOME_KINDS.has(kind)) return false;
    if (kind === 'custom' && typeof outcome.text !== 'string') return false;
    return typeof value.sourceContext === 'string';
  }

  return false;
}

/**
 * Decision log mirrored to a JSONL file, one entry per line.
 *
 * `append` updates the in-memory sequence immediately and queues the line on a
 * single write chain, so lines reach the file whole and in append order. A
 * line that still fails after the retries is reported on the next `flush()`;
 * the in-memory log keeps the entry either way.
 */
export class FileDecisionLog implements IDecisionLog {
  private readonly items: DecisionLogEntry[] = [];
  private writeChain: Promise<void> = Promise.resolve();
  private failures: Error[] = [];
  private loaded = false;
  private readonly maxAttempts: number;
  private readonly retryDelayMs: number;

  constructor(
    private readonly filePath: string,
    options: FileDecisionLogOptions = {},
  ) {
    this.maxAttempts = Math.max(1, options.maxAttempts ?? 3);
    this.retryDelayMs = options.retryDelayMs ?? 100;
  }

  /**
   * Read entries written by earlier runs. Call once, before the first
   * `append`, so lines this instance writes are never read back twice.
   * Malformed lines are skipped.
   *
   * @returns Number of entries restored
   */
  async load(): Promise<number> {
    if (this.loaded) throw new Error(`Decision log ${this.filePath} is already loaded`);
    if (this.items.length > 0) {
      throw new Error(`Decision log ${this.filePath} must be loaded before entries are appended`);
    }
    this.loaded = true;

    let raw: string;
    try {
      raw = await readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return 0;
      throw error;
    }

    const restored: DecisionLogEntry[] = [];
    let skipped = 0;
    for (const line of raw.split('\n')) {
      if (!line.trim()) continue;
      try {
        const parsed: unknown = JSON.parse(line);
        if (isDecisionLogEntry(parsed)) {
          restored.push(Object.freeze(parsed));
        } else {
          skipped++;
        }
      } catch {
        skipped++;
      }
    }

    if (skipped > 0) {
      log.warn(`Skipped ${skipped} malformed line(s) in ${this.filePath}`);
    }
    for (const entry of restored) this.items.push(entry);
    return restored.length;
  }

  append(entry: DecisionLogEntry): void {
    const frozen = Object.freeze({ ...entry });
    this.items.push(frozen);
    const line = `${JSON.stringify(frozen)}\n`;
    this.writeChain = this.writeChain.then(() => this.writeLine(line));
  }

  entries(): readonly DecisionLogEntry[] {
    return Object.freeze([...this.items]);
  }

  /**
   * Wait for queued lines to reach the file.
   * Rejects with the first write failure since the previous flush.
   */
  async flush(): Promise<void> {
    await this.writeChain;
    if (this.failures.length > 0) {
      const [first] = this.failures;
      this.failures = [];
      throw first;
    }
  }

  private async writeLine(line: string): Promise<void> {
    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      try {
        await mkdir(dirname(this.filePath), { recursive: true });
        await appendFile(this.filePath, line, 'utf-8');
        return;
      } catch (error) {
        if (attempt === this.maxAttempts) {
          const failure = error instanceof Error ? error : new Error(String(error));
          this.failures.push(failure);
          log.error(`Failed to persist decision after ${attempt} attempt(s): ${failure.message}`, {
            filePath: this.filePath,
          });
          return;
        }
        log.warn(`Decision write failed (attempt ${attempt}), retrying`);
        await sleep(this.retryDelayMs * attempt);
      }
    }
  }
}
