import type { Tool } from '@pitchside/llm';
import {
  DataAccessError,
  DuplicateNameError,
  UnknownFunctionError,
  isPitchsideError,
} from '../types/index.js';
import type {
  DispatchContext,
  FunctionCallRequest,
  FunctionHandler,
  FunctionResult,
  FunctionSpec,
  ParameterSpec,
} from '../types/index.js';
import { compileArgumentValidator } from './validation.js';
import type { ArgumentValidator } from './validation.js';

export type RegisteredFunction = {
  readonly spec: FunctionSpec;
  readonly handler: FunctionHandler;
};

/**
 * The set of operations the model may call. Populated once at startup and
 * read-only afterwards; queries share one instance.
 */
export type FunctionRegistry = {
  readonly register: (spec: FunctionSpec, handler: FunctionHandler) => void;
  readonly get: (name: string) => FunctionSpec | null;
  readonly specs: () => ReadonlyArray<FunctionSpec>;
  readonly names: () => ReadonlyArray<string>;
  readonly schemaForModel: () => ReadonlyArray<Tool>;
  readonly dispatch: (
    request: FunctionCallRequest,
    context?: DispatchContext,
  ) => Promise<FunctionResult>;
};

/** What callers outside startup may see of a registry: lookups, never `register`. */
export type FunctionRegistryView = Pick<FunctionRegistry, 'get' | 'specs' | 'names' | 'schemaForModel'>;

export function registryView(registry: FunctionRegistry): FunctionRegistryView {
  return Object.freeze({
    get: registry.get,
    specs: registry.specs,
    names: registry.names,
    schemaForModel: registry.schemaForModel,
  });
}

type Entry = {
  readonly spec: FunctionSpec;
  readonly handler: FunctionHandler;
  readonly validate: ArgumentValidator;
};

function freezeSpec(spec: FunctionSpec): FunctionSpec {
  const parameters: Record<string, ParameterSpec> = {};
  for (const [name, parameter] of Object.entries(spec.parameters)) {
    parameters[name] = Object.freeze({ ...parameter });
  }
  return Object.freeze({
    name: spec.name,
    description: spec.description,
    parameters: Object.freeze(parameters),
  });
}

export function specToTool(spec: FunctionSpec): Tool {
  const properties: Record<string, Record<string, unknown>> = {};
  const required: Array<string> = [];

  for (const [name, parameter] of Object.entries(spec.parameters)) {
    properties[name] = parameter.description === undefined
      ? { type: parameter.type }
      : { type: parameter.type, description: parameter.description };
    if (parameter.required) {
      required.push(name);
    }
  }

  return {
    name: spec.name,
    description: spec.description,
    parameters: {
      type: 'object',
      properties,
      required,
      additionalProperties: false,
    },
  };
}

export function createFunctionRegistry(initial?: ReadonlyArray<RegisteredFunction>): FunctionRegistry {
  const entries = new Map<string, Entry>();

  function register(spec: FunctionSpec, handler: FunctionHandler): void {
    if (entries.has(spec.name)) {
      throw new DuplicateNameError(spec.name);
    }
    const frozen = freezeSpec(spec);
    entries.set(frozen.name, {
      spec: frozen,
      handler,
      validate: compileArgumentValidator(frozen),
    });
  }

  function names(): ReadonlyArray<string> {
    return Array.from(entries.keys());
  }

  if (initial) {
    for (const fn of initial) {
      register(fn.spec, fn.handler);
    }
  }

  return {
    register,
    names,
    get(name: string): FunctionSpec | null {
      return entries.get(name)?.spec ?? null;
    },
    specs(): ReadonlyArray<FunctionSpec> {
      return Array.from(entries.values()).map((entry) => entry.spec);
    },
    schemaForModel(): ReadonlyArray<Tool> {
      return Array.from(entries.values()).map((entry) => specToTool(entry.spec));
    },
    async dispatch(request: FunctionCallRequest, context: DispatchContext = {}): Promise<FunctionResult> {
      const entry = entries.get(request.name);
      if (!entry) {
        throw new UnknownFunctionError(request.name, names());
      }

      // Throws before the handler runs, so a bad call never reaches the store.
      const args = entry.validate(request.args);

      try {
        return await entry.handler(args, context);
      } catch (error) {
        if (isPitchsideError(error)) {
          throw error;
        }
        const cause = error instanceof Error ? error : undefined;
        throw new DataAccessError(`${request.name} failed: ${String(error)}`, cause);
      }
    },
  };
}
