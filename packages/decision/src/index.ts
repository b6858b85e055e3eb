export {
  createPromptCatalog,
  createDetectionRules,
  DEFAULT_PROMPT_CATALOG,
  DEFAULT_DETECTION_RULES,
} from './prompt-catalog.js';
export {
  detectPrompt,
  buildClassifiedPrompt,
  lastNonEmptyLine,
  lastNonEmptyLineIndex,
  isPromptLine,
  inferSourceContext,
  extractPossibleResponses,
  hasCriticalImpact,
} from './prompt-detector.js';
export { PromptClassifier, classifyPrompt, explainPrompt } from './prompt-classifier.js';
export {
  CommandRouter,
  routeInstruction,
  explainRoute,
  createRoutingCatalog,
  DEFAULT_ROUTING_CATALOG,
} from './command-router.js';
export { RoutingSession } from './routing-session.js';
export { InMemoryDecisionLog, promptEntry, routeEntry } from './decision-log.js';
export { FileDecisionLog, isDecisionLogEntry } from './stores/file-decision-log.js';
export { AutoResponder } from './auto-responder.js';
export { parseAssistantResponse } from './response-parser.js';

export type { PromptRule, PromptDecision } from './prompt-classifier.js';
export type { RoutingRule, RoutingDecision } from './command-router.js';
export type { RoutingSessionOptions, RouteOptions, RoutedInstruction } from './routing-session.js';
export type { FileDecisionLogOptions } from './stores/file-decision-log.js';
export type { AutoResponderOptions, AutoResponseResult } from './auto-responder.js';
export type { ParsedAssistantResponse } from './response-parser.js';
