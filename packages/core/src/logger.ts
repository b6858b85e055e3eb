export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  scope: string;
  message: string;
  data?: unknown;
  /** Terminal session the entry belongs to, when there is more than one */
  sessionId?: string;
}

export type LogTransport = (entry: LogEntry) => void;

export interface Logger {
  debug(message: string, data?: unknown, sessionId?: string): void;
  info(message: string, data?: unknown, sessionId?: string): void;
  warn(message: string, data?: unknown, sessionId?: string): void;
  error(message: string, data?: unknown, sessionId?: string): void;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

let globalTransports: LogTransport[] = [];
let globalMinLevel: LogLevel = 'info';

/** Add a transport that receives all log entries */
export function addLogTransport(transport: LogTransport): () => void {
  globalTransports.push(transport);
  return () => {
    globalTransports = globalTransports.filter((t) => t !== transport);
  };
}

/** Set the minimum log level (entries below this are dropped) */
export function setLogLevel(level: LogLevel): void {
  globalMinLevel = level;
}

export function getLogLevel(): LogLevel {
  return globalMinLevel;
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LOG_LEVELS, value);
}

/** Console transport, registered by default. Writes to stdout/stderr. */
export function consoleTransport(entry: LogEntry): void {
  const prefix = entry.sessionId ? `[${entry.scope}:${entry.sessionId}]` : `[${entry.scope}]`;
  const msg = entry.data !== undefined
    ? `${prefix} ${entry.message} ${JSON.stringify(entry.data)}`
    : `${prefix} ${entry.message}`;

  switch (entry.level) {
    case 'debug':
    case 'info':
      process.stdout.write(`${msg}\n`);
      break;
    case 'warn':
      process.stderr.write(`WARN ${msg}\n`);
      break;
    case 'error':
      process.stderr.write(`ERROR ${msg}\n`);
      break;
  }
}

/**
 * Redact API keys from log messages. Captured prompts and typed instructions
 * end up in logs verbatim, and operators do paste keys into terminals.
 */
export function redactSecrets(message: string): string {
  return message
    .replace(/\b(sk-[a-zA-Z0-9_-]{10})[a-zA-Z0-9_-]{20,}/g, '$1****')
    .replace(/\b((?:api[_-]?key|token|password)\s*[=:]\s*)\S+/gi, '$1****');
}

function emit(entry: LogEntry): void {
  if (LOG_LEVELS[entry.level] < LOG_LEVELS[globalMinLevel]) return;
  const sanitized = { ...entry, message: redactSecrets(entry.message) };
  for (const transport of globalTransports) {
    try {
      transport(sanitized);
    } catch {
      // A broken transport must not take the caller down with it
    }
  }
}

/**
 * Create a scoped logger. Each module creates one:
 *   const log = createLogger('AutoResponder');
 *   log.info('Prompt answered', { outcome: 'yes' });
 */
export function createLogger(scope: string): Logger {
  function log(level: LogLevel, message: string, data?: unknown, sessionId?: string): void {
    emit({
      timestamp: new Date().toISOString(),
      level,
      scope,
      message,
      data,
      sessionId,
    });
  }

  return {
    debug: (message, data, sessionId) => log('debug', message, data, sessionId),
    info: (message, data, sessionId) => log('info', message, data, sessionId),
    warn: (message, data, sessionId) => log('warn', message, data, sessionId),
    error: (message, data, sessionId) => log('error', message, data, sessionId),
  };
}

addLogTransport(consoleTransport);
