// ─── Logging ────────────────────────────────────────────────────

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export interface LogContext {
  agentId?: string;
  workflowId?: string;
  messageId?: string;
  component: string;
  [key: string]: unknown;
}
