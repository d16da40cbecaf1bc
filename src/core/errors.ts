/**
 * Base error class for all Switchboard errors.
 * Extends Error with a machine-readable code, HTTP status, and structured context.
 */
export class SwitchboardError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly context?: Record<string, unknown>;
  public readonly isOperational: boolean;

  constructor(params: {
    message: string;
    code: string;
    statusCode?: number;
    cause?: Error;
    context?: Record<string, unknown>;
    isOperational?: boolean;
  }) {
    super(params.message, { cause: params.cause });
    this.name = 'SwitchboardError';
    this.code = params.code;
    this.statusCode = params.statusCode ?? 500;
    this.context = params.context;
    this.isOperational = params.isOperational ?? true;
  }
}

/** Thrown when a message targets an agent that is not registered on the bus. */
export class AgentUnavailableError extends SwitchboardError {
  constructor(agentId: string) {
    super({
      message: `Agent "${agentId}" is not registered`,
      code: 'AGENT_UNAVAILABLE',
      statusCode: 503,
      context: { agentId },
    });
    this.name = 'AgentUnavailableError';
  }
}

/** Thrown when an agent does not answer a request within its deadline. */
export class AgentTimeoutError extends SwitchboardError {
  constructor(agentId: string, messageId: string, timeoutMs: number) {
    super({
      message: `Agent "${agentId}" did not respond within ${timeoutMs}ms`,
      code: 'TIMEOUT',
      statusCode: 504,
      context: { agentId, messageId, timeoutMs },
    });
    this.name = 'AgentTimeoutError';
  }
}

/** Returned when an agent state change is not in the transition table. */
export class InvalidTransitionError extends SwitchboardError {
  constructor(from: string, to: string, agentId?: string) {
    super({
      message: `Invalid state transition from "${from}" to "${to}"`,
      code: 'INVALID_TRANSITION',
      statusCode: 409,
      context: { from, to, ...(agentId !== undefined && { agentId }) },
    });
    this.name = 'InvalidTransitionError';
  }
}

/** Returned when a plan's subtask graph is malformed (cycle, dangling edge, empty). */
export class InvalidPlanError extends SwitchboardError {
  constructor(message: string, context?: Record<string, unknown>) {
    super({
      message,
      code: 'INVALID_PLAN',
      statusCode: 422,
      context,
    });
    this.name = 'InvalidPlanError';
  }
}

/** Returned when no registered agent can satisfy a capability and no fallback exists. */
export class NoAgentAvailableError extends SwitchboardError {
  constructor(capability: string, subtaskId?: string) {
    super({
      message: `No agent available for capability "${capability}"`,
      code: 'NO_AGENT_AVAILABLE',
      statusCode: 503,
      context: { capability, ...(subtaskId !== undefined && { subtaskId }) },
    });
    this.name = 'NoAgentAvailableError';
  }
}

/** An agent's own business failure, passed through verbatim. */
export class ApplicationError extends SwitchboardError {
  constructor(agentId: string, message: string, cause?: Error) {
    super({
      message,
      code: 'APPLICATION_ERROR',
      statusCode: 502,
      cause,
      context: { agentId },
    });
    this.name = 'ApplicationError';
  }
}

/** Thrown when the caller stopped waiting for a request through its abort signal. */
export class RequestCancelledError extends SwitchboardError {
  constructor(messageId: string) {
    super({
      message: `Request ${messageId} was cancelled by the caller`,
      code: 'REQUEST_CANCELLED',
      statusCode: 499,
      context: { messageId },
    });
    this.name = 'RequestCancelledError';
  }
}

/** Thrown when input validation (Zod) fails. */
export class ValidationError extends SwitchboardError {
  constructor(message: string, context?: Record<string, unknown>) {
    super({
      message,
      code: 'VALIDATION_ERROR',
      statusCode: 400,
      context,
    });
    this.name = 'ValidationError';
  }
}

/** Thrown when a workflow id is not present in the workflow store. */
export class WorkflowNotFoundError extends SwitchboardError {
  constructor(workflowId: string) {
    super({
      message: `Workflow "${workflowId}" not found`,
      code: 'WORKFLOW_NOT_FOUND',
      statusCode: 404,
      context: { workflowId },
    });
    this.name = 'WorkflowNotFoundError';
  }
}

/** Transport-level failures the caller's retry policy may try again. */
export function isRetryableError(error: unknown): error is AgentUnavailableError | AgentTimeoutError {
  return error instanceof AgentUnavailableError || error instanceof AgentTimeoutError;
}

/** Normalize anything thrown into an Error. */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
