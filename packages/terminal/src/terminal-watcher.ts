/**
 * @fileoverview TerminalWatcher - polls a terminal source and reports what
 * changed.
 *
 * Each tick reads the source, strips escape sequences and, when the content
 * differs from the previous read, publishes a TerminalSnapshot to the
 * registered handlers and on the event bus. A read that fails is logged and
 * the next tick tries again. Ticks never overlap: if a read is still pending
 * when the timer fires, that tick is skipped.
 *
 * @module terminal/terminal-watcher
 */

import type { IEventBus, ITerminalSource, TerminalSnapshot } from '@promptgate/core';
import { Events, createLogger } from '@promptgate/core';
import { stripAnsi } from './utils.js';
import {
  DEFAULT_ASSISTANT_MARKERS,
  DEFAULT_INTERACTIVE_PATTERNS,
  extractNewContent,
  isAssistantSessionVisible,
  isAwaitingInput,
} from './session-detector.js';

const log = createLogger('TerminalWatcher');

export const DEFAULT_POLL_INTERVAL_MS = 500;

export type SnapshotHandler = (snapshot: TerminalSnapshot) => void;

export interface TerminalWatcherOptions {
  source: ITerminalSource;
  intervalMs?: number;
  /** Stops the watcher when aborted */
  signal?: AbortSignal;
  eventBus?: IEventBus;
  assistantMarkers?: readonly string[];
  interactivePatterns?: readonly string[];
}

export class TerminalWatcher {
  private timer: ReturnType<typeof setInterval> | null = null;
  private reading = false;
  private lastContent: string | null = null;
  private readonly handlers = new Set<SnapshotHandler>();
  private readonly intervalMs: number;
  private readonly assistantMarkers: readonly string[];
  private readonly interactivePatterns: readonly string[];

  constructor(private readonly options: TerminalWatcherOptions) {
    this.intervalMs = options.intervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.assistantMarkers = options.assistantMarkers ?? DEFAULT_ASSISTANT_MARKERS;
    this.interactivePatterns = options.interactivePatterns ?? DEFAULT_INTERACTIVE_PATTERNS;
  }

  get isRunning(): boolean {
    return this.timer !== null;
  }

  onSnapshot(handler: SnapshotHandler): () => void {
    this.handlers.add(handler);
    return () => {
      this.handlers.delete(handler);
    };
  }

  /** Read once now, then every interval until stopped. */
  start(): void {
    if (this.timer) return;
    const { signal } = this.options;
    if (signal?.aborted) {
      log.debug('Not starting, signal already aborted');
      return;
    }
    signal?.addEventListener('abort', () => this.stop(), { once: true });

    this.timer = setInterval(() => this.tick(), this.intervalMs);
    log.info(`Polling every ${this.intervalMs}ms`);
    this.tick();
  }

  stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
    log.info('Stopped polling');
  }

  /**
   * Read the source once.
   *
   * @returns The snapshot, or null when nothing changed or the read failed
   */
  async poll(): Promise<TerminalSnapshot | null> {
    let raw: string;
    try {
      raw = await this.options.source.read();
    } catch (error) {
      log.warn(`Terminal read failed: ${String(error)}`);
      return null;
    }

    const content = stripAnsi(raw);
    if (content === this.lastContent) return null;

    const newContent = this.lastContent === null ? content : extractNewContent(this.lastContent, content);
    this.lastContent = content;

    const snapshot: TerminalSnapshot = {
      content,
      newContent,
      assistantActive: isAssistantSessionVisible(content, this.assistantMarkers),
      interactive: isAwaitingInput(content, this.interactivePatterns),
    };
    this.publish(snapshot);
    return snapshot;
  }

  /** Forget the last read so the next poll reports the full content */
  reset(): void {
    this.lastContent = null;
  }

  private tick(): void {
    if (this.reading) return;
    this.reading = true;
    this.poll()
      .catch((error: unknown) => {
        log.error(`Snapshot handling failed: ${String(error)}`);
      })
      .finally(() => {
        this.reading = false;
      });
  }

  private publish(snapshot: TerminalSnapshot): void {
    for (const handler of [...this.handlers]) {
      try {
        handler(snapshot);
      } catch (error) {
        log.error(`Snapshot handler failed: ${String(error)}`);
      }
    }
    this.options.eventBus?.emit(Events.TERMINAL_OUTPUT, snapshot);
  }
}
