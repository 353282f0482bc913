// Function system types
// The callable set is closed: weather lookup, news lookup and currency conversion

export type FunctionName = 'get_weather_for_date' | 'get_news_for_city' | 'convert_currency';

export type ParameterType = 'string' | 'date' | 'number' | 'integer' | 'currency';

export interface FunctionParameter {
  name: string;
  type: ParameterType;
  description: string;
  required: boolean;
  minimum?: number;
  maximum?: number;
  default?: number;
}

export interface WeatherArgs {
  city: string;
  date: string; // YYYY-MM-DD
}

export interface NewsArgs {
  city: string;
  page_size: number;
}

export interface CurrencyArgs {
  amount: number;
  base: string;
  target: string;
}

export type ValidatedArguments =
  | { name: 'get_weather_for_date'; values: WeatherArgs }
  | { name: 'get_news_for_city'; values: NewsArgs }
  | { name: 'convert_currency'; values: CurrencyArgs };

export type ArgumentsFor<N extends FunctionName> = Extract<ValidatedArguments, { name: N }>['values'];

export type FunctionErrorKind = 'UnknownFunction' | 'BadArgument' | 'ExecutionError';

export interface FunctionError<K extends FunctionErrorKind = FunctionErrorKind> {
  kind: K;
  message: string;
  detail?: string[];
}

export type ValidationResult =
  | { ok: true; arguments: ValidatedArguments }
  | { ok: false; error: FunctionError<'BadArgument'> };

export type FunctionResult =
  | { ok: true; data: unknown }
  | { ok: false; error: FunctionError<'ExecutionError'> };

export interface FunctionSpec {
  readonly name: FunctionName;
  readonly description: string;
  readonly parameters: readonly FunctionParameter[];
  parse(raw: Record<string, unknown>): ValidationResult;
}

export interface ExecutionContext {
  signal: AbortSignal;
  // Registry clock, the same one relative dates were resolved against
  now: Date;
}

export type FunctionExecutors = {
  readonly [N in FunctionName]: (args: ArgumentsFor<N>, context: ExecutionContext) => Promise<unknown>;
};

// JSON schema handed to the model gateway (OpenAI function format)
export type ParameterSchema = {
  type: 'string' | 'number' | 'integer';
  description: string;
  format?: 'date';
  pattern?: string;
  minimum?: number;
  maximum?: number;
  default?: number;
};

export type FunctionSchema = {
  name: string;
  description: string;
  parameters: {
    type: 'object';
    properties: Record<string, ParameterSchema>;
    required: string[];
    additionalProperties: false;
  };
};
