import type { Logger } from '@/observability/logger.js';
import type { CommunicationBus } from '@/bus/types.js';
import type { Orchestrator } from '@/orchestrator/orchestrator.js';
import type { Dispatcher } from '@/dispatcher/dispatcher.js';

// ─── API Response Envelope ───────────────────────────────────────

export interface ApiResponse<T> {
  success: boolean;
  data?: T;
  error?: ApiError;
}

export interface ApiError {
  code: string;
  message: string;
  details?: Record<string, unknown>;
}

// ─── Route Dependencies (DI) ───────────────────────────────────

/** Dependencies injected into every route plugin. */
export interface RouteDependencies {
  bus: CommunicationBus;
  orchestrator: Orchestrator;
  dispatcher: Dispatcher;
  logger: Logger;
}
