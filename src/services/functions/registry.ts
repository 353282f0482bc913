// Function Registry - the fixed set of functions the model may call
// Built once at startup and frozen; lookups need no locking

import { describeError } from '../../utils/errors.js';
import { withTimeout } from '../../utils/timeout.js';
import { createFunctionSpecs } from './catalog.js';
import type {
  ExecutionContext,
  FunctionExecutors,
  FunctionParameter,
  FunctionResult,
  FunctionSchema,
  FunctionSpec,
  ParameterSchema,
  ValidatedArguments,
  ValidationResult,
} from './types.js';

export interface FunctionRegistryOptions {
  executors: FunctionExecutors;
  timeoutMs?: number;
  now?: () => Date;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parameterToSchema(param: FunctionParameter): ParameterSchema {
  const schema: ParameterSchema = {
    type: 'string',
    description: param.description,
  };

  switch (param.type) {
    case 'date':
      schema.format = 'date';
      break;
    case 'currency':
      schema.pattern = '^[A-Z]{3}$';
      break;
    case 'number':
    case 'integer':
      schema.type = param.type;
      break;
  }

  if (param.minimum !== undefined) schema.minimum = param.minimum;
  if (param.maximum !== undefined) schema.maximum = param.maximum;
  if (param.default !== undefined) schema.default = param.default;

  return schema;
}

export class FunctionRegistry {
  private readonly specs: ReadonlyMap<string, FunctionSpec>;
  private readonly schemas: readonly FunctionSchema[];
  private readonly executors: FunctionExecutors;
  private readonly timeoutMs: number;
  private readonly now: () => Date;

  constructor(options: FunctionRegistryOptions) {
    this.now = options.now ?? (() => new Date());
    const specs = createFunctionSpecs({ now: this.now });

    this.specs = new Map(specs.map(spec => [spec.name, Object.freeze(spec)]));
    this.schemas = Object.freeze(specs.map(spec => this.toSchema(spec)));
    this.executors = Object.freeze({ ...options.executors });
    this.timeoutMs = options.timeoutMs ?? 12000;
    Object.freeze(this);
  }

  resolve(name: string): FunctionSpec | undefined {
    return this.specs.get(name);
  }

  list(): FunctionSpec[] {
    return Array.from(this.specs.values());
  }

  toFunctionSchemas(): readonly FunctionSchema[] {
    return this.schemas;
  }

  /**
   * Checks untrusted model output against the function's schema. A string
   * payload is decoded as JSON first; anything that is not an object is a
   * BadArgument.
   */
  validate(spec: FunctionSpec, rawArguments: unknown): ValidationResult {
    let payload = rawArguments;

    if (typeof payload === 'string') {
      const trimmed = payload.trim();
      try {
        payload = trimmed ? JSON.parse(trimmed) : {};
      } catch {
        return this.badArgument('arguments must be a JSON object');
      }
    }

    if (payload === undefined || payload === null) {
      payload = {};
    }

    if (!isPlainObject(payload)) {
      return this.badArgument('arguments must be a JSON object');
    }

    return spec.parse(payload);
  }

  /**
   * Runs the executor under the registry timeout. Provider failures and
   * timeouts come back as ExecutionError results; this never rejects for them.
   */
  async execute(
    spec: FunctionSpec,
    validated: ValidatedArguments,
    options: { signal?: AbortSignal } = {},
  ): Promise<FunctionResult> {
    if (spec.name !== validated.name) {
      throw new Error(`Arguments for "${validated.name}" cannot be executed as "${spec.name}"`);
    }

    const now = this.now();

    try {
      const data = await withTimeout(
        signal => this.dispatch(validated, { signal, now }),
        this.timeoutMs,
        { label: spec.name, signal: options.signal },
      );
      return { ok: true, data };
    } catch (error) {
      return {
        ok: false,
        error: { kind: 'ExecutionError', message: describeError(error) },
      };
    }
  }

  private dispatch(call: ValidatedArguments, context: ExecutionContext): Promise<unknown> {
    switch (call.name) {
      case 'get_weather_for_date':
        return this.executors.get_weather_for_date(call.values, context);
      case 'get_news_for_city':
        return this.executors.get_news_for_city(call.values, context);
      case 'convert_currency':
        return this.executors.convert_currency(call.values, context);
    }
  }

  private badArgument(message: string): ValidationResult {
    return { ok: false, error: { kind: 'BadArgument', message, detail: [message] } };
  }

  private toSchema(spec: FunctionSpec): FunctionSchema {
    const properties: Record<string, ParameterSchema> = {};
    for (const param of spec.parameters) {
      properties[param.name] = parameterToSchema(param);
    }

    return {
      name: spec.name,
      description: spec.description,
      parameters: {
        type: 'object',
        properties,
        required: spec.parameters.filter(p => p.required).map(p => p.name),
        additionalProperties: false,
      },
    };
  }
}
