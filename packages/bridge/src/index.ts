export { AssistantBridge } from './assistant-bridge.js';
export { TerminalCommandDispatcher } from './terminal-dispatcher.js';
export { loadConfig, sanitizeFileConfig, DEFAULT_CONFIG, CONFIG_FILE_NAME } from './config.js';

export type { AssistantBridgeOptions, BridgeConfig, SubmitResult } from './assistant-bridge.js';
export type { TerminalSink, TerminalDispatcherOptions } from './terminal-dispatcher.js';
export type { PromptgateConfig, VoiceConfig, LoadConfigOptions } from './config.js';
