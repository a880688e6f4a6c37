export type ParameterType = 'string' | 'number' | 'integer' | 'boolean';

export type ParameterSpec = {
  readonly type: ParameterType;
  readonly required: boolean;
  readonly description?: string;
};

/**
 * Contract for one callable operation exposed to the model.
 */
export type FunctionSpec = {
  readonly name: string;
  readonly description: string;
  readonly parameters: Readonly<Record<string, ParameterSpec>>;
};

export type ArgumentValue = string | number | boolean;

export type FunctionArguments = Readonly<Record<string, ArgumentValue | undefined>>;

/**
 * A function call as decided by the model. `args` is raw and unvalidated.
 */
export type FunctionCallRequest = {
  readonly name: string;
  readonly args: Readonly<Record<string, unknown>>;
  readonly callId?: string;
};

export type FoundResult = {
  readonly status: 'found';
  readonly data: Readonly<Record<string, unknown>>;
};

export type NotFoundResult = {
  readonly status: 'not_found';
  readonly entity: string;
  readonly identifier: string;
};

export type FunctionResult = FoundResult | NotFoundResult;

export type DispatchContext = {
  readonly signal?: AbortSignal;
};

export type FunctionHandler = (
  args: FunctionArguments,
  context: DispatchContext,
) => Promise<FunctionResult>;

export function found(data: Readonly<Record<string, unknown>>): FoundResult {
  return { status: 'found', data };
}

export function notFound(entity: string, identifier: string): NotFoundResult {
  return { status: 'not_found', entity, identifier };
}
