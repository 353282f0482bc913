// Orchestrator Types

import type { CallOutcome } from '../call-log/types.js';
import type { ChatSession } from './session.js';

export type ChatStatus = 'ok' | 'turn-limit-exceeded' | 'gateway-error' | 'cancelled';

export type FailureKind = 'TurnLimitExceeded' | 'GatewayError' | 'Cancelled';

export interface OrchestratorFailure {
  kind: FailureKind;
  message: string;
}

export interface DispatchSummary {
  name: string;
  arguments: unknown;
  outcome: CallOutcome;
  // Function data on success, { error } otherwise
  result: unknown;
}

interface StateBase {
  session: ChatSession;
  // Function-call round-trips used so far
  rounds: number;
  calls: readonly DispatchSummary[];
  // Latest assistant text produced during this request
  partialText: string;
}

export interface AwaitingModelState extends StateBase {
  phase: 'awaiting_model';
}

export interface DoneState extends StateBase {
  phase: 'done';
  text: string;
}

export interface FailedState extends StateBase {
  phase: 'failed';
  error: OrchestratorFailure;
}

export type OrchestratorState = AwaitingModelState | DoneState | FailedState;

export interface OrchestratorOptions {
  maxRounds?: number;
  modelTimeoutMs?: number;
  now?: () => Date;
}

export interface RunContext {
  correlationId: string;
  signal?: AbortSignal;
}

export interface RunOptions extends RunContext {
  // Earlier turns of the same conversation
  history?: ChatSession;
}

export interface ChatOutcome {
  status: ChatStatus;
  text: string;
  session: ChatSession;
  rounds: number;
  calls: readonly DispatchSummary[];
  error?: OrchestratorFailure;
}
