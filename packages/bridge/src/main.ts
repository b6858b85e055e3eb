/**
 * Interactive entry point: runs a shell under a PTY, mirrors its output,
 * and feeds each line typed on stdin through the bridge.
 */
import * as readline from 'node:readline';
import type { IDecisionLog } from '@promptgate/core';
import { createLogger, setLogLevel } from '@promptgate/core';
import { EventBus } from '@promptgate/eventbus';
import { FileDecisionLog, InMemoryDecisionLog } from '@promptgate/decision';
import { PtyTerminal } from '@promptgate/terminal';
import { AssistantBridge } from './assistant-bridge.js';
import { loadConfig } from './config.js';

const log = createLogger('Main');

async function openDecisionLog(path: string | null): Promise<{ log: IDecisionLog; flush: () => Promise<void> }> {
  if (!path) {
    return { log: new InMemoryDecisionLog(), flush: async () => {} };
  }
  const fileLog = new FileDecisionLog(path);
  const restored = await fileLog.load();
  log.info(`Decision log at ${path} (${restored} earlier entries)`);
  return { log: fileLog, flush: () => fileLog.flush() };
}

async function main(): Promise<void> {
  const config = loadConfig();
  setLogLevel(config.logLevel);

  const decisions = await openDecisionLog(config.decisionLogPath);
  const eventBus = new EventBus();
  const terminal = new PtyTerminal();
  terminal.onOutput((data) => process.stdout.write(data));

  const spawned = await terminal.spawn({
    shell: config.shell ?? undefined,
    cols: process.stdout.columns,
    rows: process.stdout.rows,
  });
  if (!spawned.success) {
    log.error(`Could not start the shell: ${spawned.error ?? 'unknown error'}`);
    process.exitCode = 1;
    return;
  }

  const controller = new AbortController();
  const bridge = new AssistantBridge({
    terminal,
    config,
    log: decisions.log,
    eventBus,
    signal: controller.signal,
    onHumanInput: (prompt) => {
      process.stderr.write(`\n[promptgate] Your answer is needed: ${prompt.text}\n`);
    },
  });

  const rl = readline.createInterface({ input: process.stdin, terminal: false });
  let closing = false;

  const shutdown = async (): Promise<void> => {
    if (closing) return;
    closing = true;
    controller.abort();
    bridge.stop();
    rl.close();
    terminal.kill();
    await decisions.flush();
  };

  const exit = (): void => {
    shutdown().catch((error: unknown) => {
      log.error(`Failed to write decision log: ${String(error)}`);
      process.exitCode = 1;
    });
  };

  rl.on('line', (line) => {
    bridge.submit(line, 'text');
  });
  rl.on('close', exit);
  terminal.onExit((exitCode) => {
    log.info(`Shell exited (${exitCode})`);
    exit();
  });
  process.on('SIGINT', () => bridge.submit('stop'));
  process.on('SIGTERM', exit);

  bridge.start();
}

main().catch((error: unknown) => {
  log.error(`Fatal: ${String(error)}`);
  process.exitCode = 1;
});
