import type { LLMResponse, Usage } from '@pitchside/llm';
import type { ErrorKind, PitchsideError } from './error.js';
import type { FunctionCallRequest, FunctionResult } from './function.js';

export type QueryStateKind =
  | 'DRAFTING'
  | 'AWAITING_FUNCTION_DECISION'
  | 'DISPATCHING'
  | 'SUMMARIZING'
  | 'DONE'
  | 'FAILED';

export type DraftingState = { readonly kind: 'DRAFTING' };

export type AwaitingFunctionDecisionState = {
  readonly kind: 'AWAITING_FUNCTION_DECISION';
  readonly response: LLMResponse;
};

export type DispatchingState = {
  readonly kind: 'DISPATCHING';
  readonly call: FunctionCallRequest;
};

export type SummarizingState = {
  readonly kind: 'SUMMARIZING';
  readonly call: FunctionCallRequest;
  readonly result: FunctionResult;
};

export type DoneState = {
  readonly kind: 'DONE';
  readonly answer: string;
};

export type FailedState = {
  readonly kind: 'FAILED';
  readonly message: string;
  readonly errorKind: ErrorKind;
  readonly error: PitchsideError;
};

export type QueryState =
  | DraftingState
  | AwaitingFunctionDecisionState
  | DispatchingState
  | SummarizingState
  | DoneState
  | FailedState;

export type TerminalState = DoneState | FailedState;

export type DispatchRecord = {
  readonly call: FunctionCallRequest;
  readonly result: FunctionResult | null;
  readonly errorKind: ErrorKind | null;
};

export type QueryOutcome = {
  readonly queryId: string;
  readonly state: TerminalState;
  readonly trace: ReadonlyArray<QueryStateKind>;
  readonly dispatches: ReadonlyArray<DispatchRecord>;
  /** Token usage summed over every model call the query made. */
  readonly usage: Usage;
};

export function isTerminal(state: QueryState): state is TerminalState {
  return state.kind === 'DONE' || state.kind === 'FAILED';
}
