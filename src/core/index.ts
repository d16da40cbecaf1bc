// Core module — shared ids, Result type, error taxonomy
export type {
  AgentId,
  Capability,
  MessageId,
  RequestContext,
  SubtaskId,
  WorkflowId,
} from './types.js';

export type { Result } from './result.js';
export { ok, err, isOk, isErr, unwrap } from './result.js';

export {
  SwitchboardError,
  AgentUnavailableError,
  AgentTimeoutError,
  InvalidTransitionError,
  InvalidPlanError,
  NoAgentAvailableError,
  ApplicationError,
  RequestCancelledError,
  ValidationError,
  WorkflowNotFoundError,
  isRetryableError,
  toError,
} from './errors.js';
