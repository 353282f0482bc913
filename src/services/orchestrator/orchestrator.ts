// Function-calling Orchestrator
// Drives one chat request: ask the model, dispatch the function it requests,
// feed the result back, and repeat until it answers or the round limit is hit

import { logger as rootLogger } from '../../logger.js';
import type { Logger } from '../../logger.js';
import { GatewayError } from '../../providers/types.js';
import type { FunctionCallRequest, FunctionMessagePayload, GatewayReply, ModelGateway } from '../../providers/types.js';
import { describeError } from '../../utils/errors.js';
import { TimeoutError, withTimeout } from '../../utils/timeout.js';
import type { CallLogger } from '../call-log/call-logger.js';
import type { CallOutcome } from '../call-log/types.js';
import type { FunctionRegistry } from '../functions/registry.js';
import { buildInstructions } from './prompt.js';
import { ChatSession } from './session.js';
import type {
  AwaitingModelState,
  ChatOutcome,
  DispatchSummary,
  FailedState,
  OrchestratorOptions,
  OrchestratorState,
  RunContext,
  RunOptions,
} from './types.js';

export const DEFAULT_MAX_ROUNDS = 5;
export const DEFAULT_MODEL_TIMEOUT_MS = 60000;

const TURN_LIMIT_TEXT = 'I could not finish answering within the allowed number of function calls.';
const GATEWAY_ERROR_TEXT = 'The language model is unavailable right now. Please try again later.';

export interface OrchestratorDependencies {
  gateway: ModelGateway;
  registry: FunctionRegistry;
  callLogger: CallLogger;
  logger?: Logger;
}

export class Orchestrator {
  private gateway: ModelGateway;
  private registry: FunctionRegistry;
  private callLogger: CallLogger;
  private log: Logger;
  private maxRounds: number;
  private modelTimeoutMs: number;
  private now: () => Date;

  constructor(deps: OrchestratorDependencies, options: OrchestratorOptions = {}) {
    this.gateway = deps.gateway;
    this.registry = deps.registry;
    this.callLogger = deps.callLogger;
    this.log = (deps.logger ?? rootLogger).child({ component: 'orchestrator' });
    this.maxRounds = options.maxRounds ?? DEFAULT_MAX_ROUNDS;
    this.modelTimeoutMs = options.modelTimeoutMs ?? DEFAULT_MODEL_TIMEOUT_MS;
    this.now = options.now ?? (() => new Date());
  }

  start(session: ChatSession): AwaitingModelState {
    return { phase: 'awaiting_model', session, rounds: 0, calls: [], partialText: '' };
  }

  async run(message: string, options: RunOptions): Promise<ChatOutcome> {
    const history = options.history ?? ChatSession.empty();
    const context: RunContext = { correlationId: options.correlationId, signal: options.signal };

    let state: OrchestratorState = this.start(history.appendUser(message));
    while (state.phase === 'awaiting_model') {
      state = await this.step(state, context);
    }

    this.log.info(
      {
        correlationId: context.correlationId,
        phase: state.phase,
        rounds: state.rounds,
        functions: state.calls.map(c => `${c.name}:${c.outcome}`),
        ...(state.phase === 'failed' ? { failure: state.error.kind } : {}),
      },
      'Chat request finished',
    );

    if (state.phase === 'done') {
      return {
        status: 'ok',
        text: state.text,
        session: state.session,
        rounds: state.rounds,
        calls: state.calls,
      };
    }

    const { kind } = state.error;
    return {
      status: kind === 'TurnLimitExceeded' ? 'turn-limit-exceeded' : kind === 'GatewayError' ? 'gateway-error' : 'cancelled',
      text: state.partialText || (kind === 'TurnLimitExceeded' ? TURN_LIMIT_TEXT : kind === 'GatewayError' ? GATEWAY_ERROR_TEXT : ''),
      session: state.session,
      rounds: state.rounds,
      calls: state.calls,
      error: state.error,
    };
  }

  /**
   * One turn: a model round-trip, then either a terminal state or the
   * dispatch of the requested function.
   */
  async step(state: AwaitingModelState, context: RunContext): Promise<OrchestratorState> {
    if (context.signal?.aborted) {
      return this.cancelled(state);
    }

    let reply: GatewayReply;
    try {
      reply = await withTimeout(
        signal =>
          this.gateway.complete({
            instructions: buildInstructions(this.now()),
            messages: state.session.messages,
            functions: this.registry.toFunctionSchemas(),
            signal,
          }),
        this.modelTimeoutMs,
        { label: `${this.gateway.name} gateway`, signal: context.signal },
      );
    } catch (error) {
      if (context.signal?.aborted) {
        return this.cancelled(state);
      }
      if (error instanceof GatewayError || error instanceof TimeoutError) {
        this.log.warn({ correlationId: context.correlationId, err: error }, 'Model gateway failed');
        return this.failed(state, 'GatewayError', describeError(error));
      }
      throw error;
    }

    if (context.signal?.aborted) {
      return this.cancelled(state);
    }

    if (reply.type === 'final') {
      return {
        ...state,
        phase: 'done',
        session: state.session.appendAssistantFinal(reply.text),
        text: reply.text,
        partialText: reply.text,
      };
    }

    const partialText = reply.call.text || state.partialText;
    if (state.rounds >= this.maxRounds) {
      return this.failed(
        { ...state, partialText },
        'TurnLimitExceeded',
        `Model requested more than ${this.maxRounds} function calls`,
      );
    }

    return this.dispatch({ ...state, partialText }, reply.call, context);
  }

  private async dispatch(
    state: AwaitingModelState,
    call: FunctionCallRequest,
    context: RunContext,
  ): Promise<OrchestratorState> {
    const session = state.session.appendAssistantCallRequest(call);
    const rounds = state.rounds + 1;
    const startedAt = this.now().toISOString();

    const spec = this.registry.resolve(call.name);
    if (!spec) {
      const available = this.registry.list().map(s => s.name).join(', ');
      const payload: FunctionMessagePayload = {
        ok: false,
        error: { kind: 'UnknownFunction', message: `Unknown function "${call.name}". Available functions: ${available}` },
      };
      await this.recordIfEnabled(context, call, 'unknown_function', payload, startedAt);
      return this.continueWith(state, session, rounds, call, call.arguments, 'unknown_function', payload);
    }

    const validation = this.registry.validate(spec, call.arguments);
    if (!validation.ok) {
      const payload: FunctionMessagePayload = { ok: false, error: validation.error };
      await this.recordIfEnabled(context, call, 'bad_argument', payload, startedAt);
      return this.continueWith(state, session, rounds, call, call.arguments, 'bad_argument', payload);
    }

    const result = await this.registry.execute(spec, validation.arguments, { signal: context.signal });

    // The request is gone; its result is neither appended nor logged
    if (context.signal?.aborted) {
      return this.cancelled({ ...state, session, rounds });
    }

    const outcome: CallOutcome = result.ok ? 'success' : 'execution_error';
    const values = validation.arguments.values;
    await this.callLogger.record({
      correlationId: context.correlationId,
      functionName: spec.name,
      arguments: values,
      outcome,
      result: result.ok ? result.data : null,
      error: result.ok ? null : result.error,
      startedAt,
      finishedAt: this.now().toISOString(),
    });

    return this.continueWith(state, session, rounds, call, values, outcome, result);
  }

  private continueWith(
    state: AwaitingModelState,
    session: ChatSession,
    rounds: number,
    call: FunctionCallRequest,
    args: unknown,
    outcome: CallOutcome,
    payload: FunctionMessagePayload,
  ): AwaitingModelState {
    const summary: DispatchSummary = {
      name: call.name,
      arguments: args,
      outcome,
      result: payload.ok ? payload.data : { error: payload.error },
    };
    return {
      ...state,
      phase: 'awaiting_model',
      session: session.appendFunctionResult(call.name, payload),
      rounds,
      calls: [...state.calls, summary],
    };
  }

  private async recordIfEnabled(
    context: RunContext,
    call: FunctionCallRequest,
    outcome: CallOutcome,
    payload: FunctionMessagePayload,
    startedAt: string,
  ): Promise<void> {
    if (!this.callLogger.shouldRecord(outcome)) return;

    await this.callLogger.record({
      correlationId: context.correlationId,
      functionName: call.name,
      arguments: call.arguments,
      outcome,
      result: null,
      error: payload.ok ? null : payload.error,
      startedAt,
      finishedAt: this.now().toISOString(),
    });
  }

  private cancelled(state: AwaitingModelState): FailedState {
    return this.failed(state, 'Cancelled', 'Request was cancelled');
  }

  private failed(state: AwaitingModelState, kind: FailedState['error']['kind'], message: string): FailedState {
    return { ...state, phase: 'failed', error: { kind, message } };
  }
}
