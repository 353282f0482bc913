// Orchestrator Module - Main exports

export { Orchestrator, DEFAULT_MAX_ROUNDS, DEFAULT_MODEL_TIMEOUT_MS } from './orchestrator.js';
export type { OrchestratorDependencies } from './orchestrator.js';
export { ChatSession } from './session.js';
export { buildInstructions } from './prompt.js';
export type {
  AwaitingModelState,
  ChatOutcome,
  ChatStatus,
  DispatchSummary,
  OrchestratorOptions,
  OrchestratorState,
  RunContext,
  RunOptions,
} from './types.js';
