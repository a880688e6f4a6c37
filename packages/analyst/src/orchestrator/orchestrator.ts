import { nanoid } from 'nanoid';
import {
  AbortError,
  DEFAULT_RETRY_POLICY,
  assistantMessage,
  emptyUsage,
  responseText,
  responseToolCalls,
  retry,
  toolMessage,
  usageAdd,
  userMessage,
} from '@pitchside/llm';
import type {
  Client,
  ContentPart,
  LLMResponse,
  Message,
  RetryPolicy,
  ToolChoice,
  Usage,
} from '@pitchside/llm';
import type { Logger } from '../observability/logger.js';
import type { FunctionRegistry } from '../registry/index.js';
import {
  InvalidArgumentError,
  ModelUnavailableError,
  QueryCancelledError,
  UnknownFunctionError,
  isPitchsideError,
  isTerminal,
} from '../types/index.js';
import type {
  AwaitingFunctionDecisionState,
  DispatchRecord,
  DispatchingState,
  FailedState,
  PitchsideError,
  QueryOutcome,
  QueryState,
  QueryStateKind,
  SummarizingState,
  TerminalState,
} from '../types/index.js';
import { FAILURE_MESSAGES, SYSTEM_PROMPT } from './prompts.js';

export type OrchestratorOptions = {
  readonly client: Client;
  readonly registry: FunctionRegistry;
  readonly model: string;
  readonly provider?: string;
  readonly modelTimeoutMs: number;
  readonly retryPolicy?: RetryPolicy;
  readonly systemPrompt?: string;
  /** Corrective re-prompts allowed after an unknown function or bad arguments. */
  readonly maxCorrections?: number;
  readonly logger: Logger;
};

export type RunOptions = {
  readonly signal?: AbortSignal;
};

export type QueryOrchestrator = {
  readonly run: (query: string, options?: RunOptions) => Promise<QueryOutcome>;
  readonly answer: (query: string, options?: RunOptions) => Promise<string>;
};

/**
 * Per-query working set. The transcript and dispatch list are appended to
 * as the query moves through its states and dropped when it finishes.
 */
export type QueryContext = {
  readonly queryId: string;
  readonly query: string;
  readonly options: OrchestratorOptions;
  readonly transcript: Array<Message>;
  readonly dispatches: Array<DispatchRecord>;
  readonly signal?: AbortSignal;
  readonly log: Logger;
  correctionsLeft: number;
  usage: Usage;
};

export function createQueryContext(
  options: OrchestratorOptions,
  query: string,
  runOptions: RunOptions = {},
): QueryContext {
  const queryId = nanoid();
  return {
    queryId,
    query,
    options,
    transcript: [],
    dispatches: [],
    signal: runOptions.signal,
    log: options.logger.child({ component: 'orchestrator', queryId }),
    correctionsLeft: options.maxCorrections ?? 1,
    usage: emptyUsage(),
  };
}

export function failed(error: PitchsideError): FailedState {
  return {
    kind: 'FAILED',
    message: FAILURE_MESSAGES[error.kind],
    errorKind: error.kind,
    error,
  };
}

function toModelFailure(error: unknown, signal: AbortSignal | undefined): PitchsideError {
  if (isPitchsideError(error)) {
    return error;
  }
  const cause = error instanceof Error ? error : undefined;
  if (signal?.aborted || error instanceof AbortError) {
    return new QueryCancelledError('query cancelled during model call', cause);
  }
  return new ModelUnavailableError(`model call failed: ${cause?.message ?? String(error)}`, cause);
}

/**
 * Sends the current transcript with every registered function attached.
 * Retryable provider errors are retried; anything left becomes
 * ModelUnavailableError, or QueryCancelledError once the query is aborted.
 */
export async function callModel(context: QueryContext, toolChoice: ToolChoice): Promise<LLMResponse> {
  const { client, registry, model, provider, modelTimeoutMs, systemPrompt } = context.options;
  const policy = context.options.retryPolicy ?? DEFAULT_RETRY_POLICY;

  let response: LLMResponse;
  try {
    response = await retry(
      () => client.complete({
        model,
        provider,
        system: systemPrompt ?? SYSTEM_PROMPT,
        messages: [...context.transcript],
        tools: registry.schemaForModel(),
        toolChoice,
        timeout: { requestMs: modelTimeoutMs },
        signal: context.signal,
      }),
      {
        policy,
        signal: context.signal,
        onRetry: (error, attempt, delayMs) => {
          context.log.warn(
            { attempt, delayMs: Math.round(delayMs), statusCode: error.statusCode, err: error },
            'retrying model call',
          );
        },
      },
    );
  } catch (error) {
    throw toModelFailure(error, context.signal);
  }

  context.usage = usageAdd(context.usage, response.usage);
  return response;
}

/** DRAFTING: start the transcript from the user's query and ask the model. */
export async function draft(context: QueryContext): Promise<AwaitingFunctionDecisionState> {
  context.transcript.push(userMessage(context.query));
  const response = await callModel(context, { mode: 'auto' });
  return { kind: 'AWAITING_FUNCTION_DECISION', response };
}

/**
 * AWAITING_FUNCTION_DECISION: a function call moves on to dispatch, plain
 * text is the answer. Only the first call is acted on; the others are left
 * out of the transcript so every call in it gets a result.
 */
export async function decide(
  state: AwaitingFunctionDecisionState,
  context: QueryContext,
): Promise<DispatchingState | TerminalState> {
  const [first] = responseToolCalls(state.response);
  const text = responseText(state.response).trim();

  if (first) {
    const kept: Array<ContentPart> = state.response.content.filter(
      (part) => part.kind !== 'TOOL_CALL' || part.toolCallId === first.toolCallId,
    );
    context.transcript.push(assistantMessage(kept));
    return {
      kind: 'DISPATCHING',
      call: { name: first.toolName, args: first.args, callId: first.toolCallId },
    };
  }

  if (text.length > 0) {
    context.transcript.push(assistantMessage(text));
    return { kind: 'DONE', answer: text };
  }

  return failed(new ModelUnavailableError('model returned neither text nor a function call'));
}

/**
 * DISPATCHING: run the call through the registry. An unknown function or
 * bad arguments earns the model one corrective re-prompt carrying the
 * validation error; any other failure ends the query.
 */
export async function dispatch(
  state: DispatchingState,
  context: QueryContext,
): Promise<SummarizingState | AwaitingFunctionDecisionState | FailedState> {
  const { call } = state;
  const callId = call.callId ?? call.name;

  try {
    const result = await context.options.registry.dispatch(call, { signal: context.signal });
    context.dispatches.push({ call, result, errorKind: null });
    return { kind: 'SUMMARIZING', call, result };
  } catch (error) {
    if (!(error instanceof UnknownFunctionError || error instanceof InvalidArgumentError)) {
      if (isPitchsideError(error)) {
        context.dispatches.push({ call, result: null, errorKind: error.kind });
      }
      throw error;
    }

    context.dispatches.push({ call, result: null, errorKind: error.kind });
    if (context.correctionsLeft <= 0) {
      return failed(error);
    }

    context.correctionsLeft--;
    context.log.info({ function: call.name, errorKind: error.kind }, 'asking model to correct its call');
    context.transcript.push(toolMessage(callId, error.message, true));
    const response = await callModel(context, { mode: 'auto' });
    return { kind: 'AWAITING_FUNCTION_DECISION', response };
  }
}

/** SUMMARIZING: hand the result back and ask for a text-only answer. */
export async function summarize(state: SummarizingState, context: QueryContext): Promise<TerminalState> {
  const callId = state.call.callId ?? state.call.name;
  context.transcript.push(toolMessage(callId, JSON.stringify(state.result)));

  const response = await callModel(context, { mode: 'none' });
  const text = responseText(response).trim();
  if (text.length === 0) {
    return failed(new ModelUnavailableError('model returned no answer after the function result'));
  }

  context.transcript.push(assistantMessage(text));
  return { kind: 'DONE', answer: text };
}

export async function step(
  state: Exclude<QueryState, TerminalState>,
  context: QueryContext,
): Promise<QueryState> {
  switch (state.kind) {
    case 'DRAFTING':
      return draft(context);
    case 'AWAITING_FUNCTION_DECISION':
      return decide(state, context);
    case 'DISPATCHING':
      return dispatch(state, context);
    case 'SUMMARIZING':
      return summarize(state, context);
  }
}

/** Rejects with QueryCancelledError as soon as `signal` fires, whatever `work` is doing. */
async function untilAborted<T>(work: Promise<T>, signal: AbortSignal | undefined): Promise<T> {
  if (!signal) {
    return work;
  }

  let onAbort = (): void => {};
  const aborted = new Promise<never>((_, reject) => {
    onAbort = () => reject(new QueryCancelledError('query cancelled'));
    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener('abort', onAbort, { once: true });
    }
  });

  try {
    return await Promise.race([work, aborted]);
  } finally {
    signal.removeEventListener('abort', onAbort);
  }
}

export function createQueryOrchestrator(options: OrchestratorOptions): QueryOrchestrator {
  async function run(query: string, runOptions: RunOptions = {}): Promise<QueryOutcome> {
    const context = createQueryContext(options, query, runOptions);
    const trace: Array<QueryStateKind> = [];
    let state: QueryState = { kind: 'DRAFTING' };
    trace.push(state.kind);

    while (!isTerminal(state)) {
      const current: Exclude<QueryState, TerminalState> = state;
      try {
        state = await untilAborted(step(current, context), context.signal);
      } catch (error) {
        if (!isPitchsideError(error)) {
          throw error;
        }
        state = failed(error);
      }
      context.log.debug({ from: current.kind, to: state.kind }, 'state transition');
      trace.push(state.kind);
    }

    if (state.kind === 'FAILED') {
      context.log.error({ errorKind: state.errorKind, err: state.error, trace }, 'query failed');
    } else {
      context.log.info(
        { dispatches: context.dispatches.length, trace, usage: context.usage },
        'query answered',
      );
    }

    return {
      queryId: context.queryId,
      state,
      trace,
      dispatches: context.dispatches,
      usage: context.usage,
    };
  }

  return {
    run,
    async answer(query: string, runOptions?: RunOptions): Promise<string> {
      const outcome = await run(query, runOptions);
      return outcome.state.kind === 'DONE' ? outcome.state.answer : outcome.state.message;
    },
  };
}
