// Communication bus — message model, agent registry, routing
export type {
  BusSettings,
  CommunicationBus,
  RetryPolicy,
  SendAndAwaitOptions,
  SendOptions,
} from './types.js';

export type { CreateMessageInput, Message, MessageType } from './message.js';
export {
  MESSAGE_TYPES,
  createMessage,
  createNotification,
  createRequest,
  createResponse,
  deserializeMessage,
  serializeMessage,
  withFreshId,
} from './message.js';

export type { AgentRegistry, RegistryEntry } from './agent-registry.js';
export { createAgentRegistry } from './agent-registry.js';

export { DEFAULT_BUS_SETTINGS, createCommunicationBus } from './communication-bus.js';
