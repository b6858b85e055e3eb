export * from './models/decision.js';
export * from './models/catalog.js';
export * from './models/terminal.js';
export * from './ports/decision-log.js';
export * from './ports/command-dispatcher.js';
export * from './ports/terminal-source.js';
export * from './ports/event-bus.js';
export * from './events/index.js';
export * from './logger.js';
