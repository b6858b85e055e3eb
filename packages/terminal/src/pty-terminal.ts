/**
 * @fileoverview PtyTerminal - an interactive shell under node-pty.
 *
 * The terminal is both the source the watcher polls (`read()` returns the
 * scrollback) and the sink for everything the bridge types: shell commands,
 * assistant tasks and prompt answers.
 *
 * @module terminal/pty-terminal
 */

import type { ITerminalSource, Keystroke } from '@promptgate/core';
import { createLogger } from '@promptgate/core';
import type * as pty from 'node-pty';
import treeKill from 'tree-kill';
import { PtyDataHandler, type PtyOutputHandler } from './pty-utils.js';
import { encodeInput, encodeKeystroke } from './keystrokes.js';
import { buildCleanEnv } from './utils.js';

const log = createLogger('PtyTerminal');

export type PtyExitHandler = (exitCode: number, lastOutput: string) => void;

export interface PtySpawnOptions {
  /** Shell executable; defaults to $SHELL, then /bin/bash */
  shell?: string;
  args?: string[];
  cwd?: string;
  env?: Record<string, string>;
  cols?: number;
  rows?: number;
  scrollbackMax?: number;
}

export interface PtySpawnResult {
  success: boolean;
  pid?: number;
  error?: string;
}

/** The part of node-pty's IPty the terminal uses */
export interface PtyProcess {
  readonly pid: number;
  write(data: string): void;
  resize(cols: number, rows: number): void;
  onData(listener: (data: string) => void): unknown;
  onExit(listener: (event: { exitCode: number }) => void): unknown;
}

export type PtySpawner = (file: string, args: string[], options: pty.IPtyForkOptions) => PtyProcess;

export interface PtyTerminalOptions {
  /** Label for log lines */
  sessionId?: string;
  /** Provides the spawn function; node-pty by default */
  loadSpawner?: () => Promise<PtySpawner>;
}

// Dynamic import keeps the native module out of code paths that never spawn
async function loadNodePty(): Promise<PtySpawner> {
  const nodePty = await import('node-pty');
  return nodePty.spawn;
}

interface PtySession {
  process: PtyProcess;
  data: PtyDataHandler;
}

export class PtyTerminal implements ITerminalSource {
  private session: PtySession | null = null;
  private outputHandler: PtyOutputHandler | null = null;
  private exitHandler: PtyExitHandler | null = null;
  private readonly sessionId: string;
  private readonly loadSpawner: () => Promise<PtySpawner>;

  constructor(options: PtyTerminalOptions = {}) {
    this.sessionId = options.sessionId ?? 'main';
    this.loadSpawner = options.loadSpawner ?? loadNodePty;
  }

  onOutput(handler: PtyOutputHandler): void {
    this.outputHandler = handler;
  }

  onExit(handler: PtyExitHandler): void {
    this.exitHandler = handler;
  }

  async spawn(options: PtySpawnOptions = {}): Promise<PtySpawnResult> {
    if (this.session) {
      return { success: false, error: 'Terminal is already running' };
    }

    try {
      const spawnPty = await this.loadSpawner();

      const shell = options.shell ?? process.env.SHELL ?? '/bin/bash';
      const env = buildCleanEnv({
        ...options.env,
        TERM: 'xterm-256color',
        COLORTERM: 'truecolor',
      });

      const ptyProcess = spawnPty(shell, options.args ?? [], {
        name: 'xterm-256color',
        cols: options.cols ?? 120,
        rows: options.rows ?? 30,
        cwd: options.cwd ?? process.cwd(),
        env,
      });

      const data = new PtyDataHandler(ptyProcess, () => this.outputHandler, options.scrollbackMax);
      const session: PtySession = { process: ptyProcess, data };

      ptyProcess.onData((chunk: string) => data.onData(chunk));
      ptyProcess.onExit(({ exitCode }) => {
        data.flush();
        const lastOutput = data.getLastOutput();
        if (this.session === session) this.session = null;
        log.info(`Shell exited with code ${exitCode}`, undefined, this.sessionId);
        this.exitHandler?.(exitCode, lastOutput);
      });

      this.session = session;
      log.info(`Spawned ${shell} (PID: ${ptyProcess.pid})`, undefined, this.sessionId);
      return { success: true, pid: ptyProcess.pid };
    } catch (error) {
      log.error(`Failed to spawn PTY: ${String(error)}`, { shell: options.shell }, this.sessionId);
      return { success: false, error: String(error) };
    }
  }

  get isRunning(): boolean {
    return this.session !== null;
  }

  get pid(): number | null {
    return this.session?.process.pid ?? null;
  }

  /** Scrollback as written by the shell, escape sequences included */
  read(): string {
    return this.session?.data.getContent() ?? '';
  }

  write(data: string): void {
    if (!this.session) {
      log.warn('Write ignored, terminal is not running', undefined, this.sessionId);
      return;
    }
    this.session.process.write(data);
  }

  sendKeystroke(key: Keystroke): void {
    this.write(encodeKeystroke(key));
  }

  sendInput(text: string): void {
    this.write(encodeInput(text));
  }

  resize(cols: number, rows: number): void {
    this.session?.process.resize(cols, rows);
  }

  /** Kill the shell and everything it started */
  kill(): void {
    const session = this.session;
    if (!session) return;
    this.session = null;
    session.data.flush();
    const pid = session.process.pid;
    treeKill(pid, 'SIGTERM', (err) => {
      if (err) log.warn(`tree-kill failed for PID ${pid}: ${err.message}`, undefined, this.sessionId);
    });
  }
}
