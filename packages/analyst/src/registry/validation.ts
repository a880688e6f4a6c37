import { z } from 'zod';
import { InvalidArgumentError } from '../types/index.js';
import type {
  ArgumentValue,
  FunctionArguments,
  FunctionSpec,
  ParameterSpec,
  ParameterType,
} from '../types/index.js';

export type ArgumentValidator = (args: Readonly<Record<string, unknown>>) => FunctionArguments;

const PARAMETER_SCHEMAS: Record<ParameterType, () => z.ZodTypeAny> = {
  string: () => z.string(),
  number: () => z.number().finite(),
  integer: () => z.number().int(),
  boolean: () => z.boolean(),
};

// Models often send null for an optional parameter they mean to leave out.
function parameterSchema(spec: ParameterSpec): z.ZodTypeAny {
  const base = PARAMETER_SCHEMAS[spec.type]();
  return spec.required ? base : base.nullish();
}

function isArgumentValue(value: unknown): value is ArgumentValue {
  return typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean';
}

function withoutEmpty(data: Readonly<Record<string, unknown>>): FunctionArguments {
  const args: Record<string, ArgumentValue> = {};
  for (const [name, value] of Object.entries(data)) {
    if (isArgumentValue(value)) {
      args[name] = value;
    }
  }
  return args;
}

/**
 * Compiles a spec's parameter table into a validator. The returned function
 * strips arguments the function does not declare, drops optional ones sent as
 * null, and throws InvalidArgumentError for the first parameter that is
 * missing or has the wrong type.
 */
export function compileArgumentValidator(spec: FunctionSpec): ArgumentValidator {
  const shape: Record<string, z.ZodTypeAny> = {};
  for (const [name, parameter] of Object.entries(spec.parameters)) {
    shape[name] = parameterSchema(parameter);
  }
  const schema = z.object(shape).strip();

  return (args) => {
    const parsed = schema.safeParse(args);
    if (parsed.success) {
      return withoutEmpty(parsed.data);
    }

    const issue = parsed.error.issues[0];
    const parameter = issue?.path[0];
    throw new InvalidArgumentError(
      spec.name,
      typeof parameter === 'string' ? parameter : '(arguments)',
      issue ? describeIssue(issue, spec) : 'arguments do not match the declared parameters',
    );
  };
}

function describeIssue(issue: z.ZodIssue, spec: FunctionSpec): string {
  const parameter = issue.path[0];
  const declared = typeof parameter === 'string' ? spec.parameters[parameter] : undefined;

  if (issue.code === z.ZodIssueCode.invalid_type && issue.received === 'undefined') {
    return 'missing required parameter';
  }
  if (issue.code === z.ZodIssueCode.invalid_type && declared) {
    return `expected ${declared.type}, received ${issue.received}`;
  }
  return issue.message;
}
