// Orchestrator — planning, agent selection, execution, workflow history
export type {
  Decomposer,
  HistoryEntry,
  HistoryEventType,
  PlannedStep,
  Subtask,
  SubtaskFailure,
  SubtaskResult,
  SubtaskStatus,
  Workflow,
  WorkflowOutcome,
  WorkflowStatus,
  WorkflowSummary,
} from './types.js';
export { HISTORY_EVENT_TYPES, TERMINAL_WORKFLOW_STATUSES } from './types.js';

export type { GraphNode } from './graph.js';
export { topologicalOrder } from './graph.js';

export type { DecompositionRule, StepTemplate } from './decomposer.js';
export { DEFAULT_DECOMPOSITION_RULES, GENERAL_STEP, createRuleDecomposer } from './decomposer.js';

export type { Planner } from './planner.js';
export { createPlanner } from './planner.js';

export type { SelectableSubtask, SelectionOptions, SelectionWeights } from './agent-selector.js';
export {
  DEFAULT_SELECTION_WEIGHTS,
  coversCapability,
  failureRecency,
  scoreAgent,
  selectAgent,
} from './agent-selector.js';

export type { ExecuteOptions, Executor, ExecutorSettings } from './executor.js';
export {
  CANCELLED_REASON,
  DEFAULT_EXECUTOR_SETTINGS,
  ORCHESTRATOR_AGENT_ID,
  buildOutcome,
  createExecutor,
  deriveWorkflowStatus,
} from './executor.js';

export type {
  RetentionPolicy,
  WorkflowHistorySnapshot,
  WorkflowListOptions,
  WorkflowStore,
} from './workflow-store.js';
export {
  DEFAULT_RETENTION,
  createWorkflowStore,
  deserializeWorkflowHistory,
  serializeWorkflowHistory,
} from './workflow-store.js';

export type { Orchestrator } from './orchestrator.js';
export { createOrchestrator } from './orchestrator.js';
