// Dispatcher — request classification and routing
export type {
  Classification,
  ClassificationRule,
  Classifier,
  RequestCategory,
} from './classifier.js';
export {
  DEFAULT_CLASSIFICATION_RULES,
  DEFAULT_RULE_CONFIDENCE,
  UNMATCHED_CONFIDENCE,
  createKeywordClassifier,
} from './classifier.js';

export type { DirectResponder } from './direct-responder.js';
export { createDirectResponder } from './direct-responder.js';

export type {
  ConversationEntry,
  DispatchRoute,
  Dispatcher,
  DispatcherSettings,
} from './dispatcher.js';
export { DEFAULT_DISPATCHER_SETTINGS, DISPATCHER_AGENT_ID, createDispatcher } from './dispatcher.js';
