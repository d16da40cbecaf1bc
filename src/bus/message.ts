/**
 * Message — the immutable unit of communication between agents.
 *
 * Requests carry their own id; responses and errors echo it back as
 * `correlationId`, which is how the bus matches replies to waiting callers.
 */
import { nanoid } from 'nanoid';
import { z } from 'zod';
import { ValidationError } from '@/core/errors.js';
import type { Result } from '@/core/result.js';
import { err, ok } from '@/core/result.js';
import type { AgentId, MessageId, RequestContext } from '@/core/types.js';

// ─── Types ───────────────────────────────────────────────────────

export const MESSAGE_TYPES = ['request', 'response', 'notification', 'status', 'error'] as const;

export type MessageType = (typeof MESSAGE_TYPES)[number];

export interface Message {
  readonly id: MessageId;
  readonly type: MessageType;
  readonly senderId: AgentId;
  /** `null` for broadcasts. */
  readonly receiverId: AgentId | null;
  readonly content: string;
  readonly context: Readonly<RequestContext>;
  /** For responses and errors: the originating request's id. */
  readonly correlationId: MessageId | null;
  readonly createdAt: Date;
  /** Per-call deadline; `null` defers to the bus configuration. */
  readonly timeoutMs: number | null;
}

export interface CreateMessageInput {
  type: MessageType;
  senderId: string;
  receiverId: string | null;
  content: string;
  context?: RequestContext;
  correlationId?: string | null;
  timeoutMs?: number | null;
}

// ─── Factories ───────────────────────────────────────────────────

/** Create a frozen message with a fresh id. */
export function createMessage(input: CreateMessageInput): Message {
  return Object.freeze({
    id: nanoid() as MessageId,
    type: input.type,
    senderId: input.senderId as AgentId,
    receiverId: input.receiverId === null ? null : (input.receiverId as AgentId),
    content: input.content,
    context: Object.freeze({ ...input.context }),
    correlationId: input.correlationId == null ? null : (input.correlationId as MessageId),
    createdAt: new Date(),
    timeoutMs: input.timeoutMs ?? null,
  });
}

/** Shorthand for a request message. */
export function createRequest(
  senderId: string,
  receiverId: string,
  content: string,
  options?: { context?: RequestContext; timeoutMs?: number },
): Message {
  return createMessage({
    type: 'request',
    senderId,
    receiverId,
    content,
    context: options?.context,
    timeoutMs: options?.timeoutMs,
  });
}

/** Shorthand for a broadcast notification. */
export function createNotification(senderId: string, content: string, context?: RequestContext): Message {
  return createMessage({ type: 'notification', senderId, receiverId: null, content, context });
}

/**
 * Build the reply to `request`: sender and receiver swapped, correlated by
 * the request id.
 */
export function createResponse(
  request: Message,
  reply: { content: string; context?: RequestContext },
  type: 'response' | 'error' = 'response',
): Message {
  return createMessage({
    type,
    senderId: request.receiverId ?? request.senderId,
    receiverId: request.senderId,
    content: reply.content,
    context: reply.context,
    correlationId: request.id,
  });
}

/** Copy of `message` with a new id, used when a request is re-sent. */
export function withFreshId(message: Message): Message {
  return Object.freeze({ ...message, id: nanoid() as MessageId, createdAt: new Date() });
}

// ─── Serialization ───────────────────────────────────────────────

const messageSchema = z
  .object({
    id: z.string().min(1),
    type: z.enum(MESSAGE_TYPES),
    senderId: z.string().min(1),
    receiverId: z.string().min(1).nullable(),
    content: z.string(),
    context: z.record(z.unknown()),
    correlationId: z.string().min(1).nullable(),
    createdAt: z.coerce.date(),
    timeoutMs: z.number().int().positive().nullable(),
  })
  .refine(
    (m) => (m.type === 'response' || m.type === 'error' ? m.correlationId !== null : true),
    { message: 'Responses and errors must carry a correlationId', path: ['correlationId'] },
  );

/** Serialize a message to JSON. */
export function serializeMessage(message: Message): string {
  return JSON.stringify(message);
}

/** Parse and validate a serialized message. */
export function deserializeMessage(json: string): Result<Message, ValidationError> {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch {
    return err(new ValidationError('Invalid JSON in serialized message'));
  }

  const parsed = messageSchema.safeParse(raw);
  if (!parsed.success) {
    return err(
      new ValidationError('Serialized message failed validation', {
        issues: parsed.error.issues.map((i) => ({ path: i.path.join('.'), message: i.message })),
      }),
    );
  }

  const data = parsed.data;
  return ok(
    Object.freeze({
      id: data.id as MessageId,
      type: data.type,
      senderId: data.senderId as AgentId,
      receiverId: data.receiverId === null ? null : (data.receiverId as AgentId),
      content: data.content,
      context: Object.freeze({ ...data.context }),
      correlationId: data.correlationId === null ? null : (data.correlationId as MessageId),
      createdAt: data.createdAt,
      timeoutMs: data.timeoutMs,
    }),
  );
}
