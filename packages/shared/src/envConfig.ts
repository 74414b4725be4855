import { z } from 'zod';

export type EnvSource = Record<string, string | undefined>;

export type LoadEnvConfigOptions = {
  env?: EnvSource;
  /** Prefix of the error message, e.g. the package reading the variables. */
  context?: string;
};

export class EnvConfigError extends Error {
  readonly issues: readonly string[];

  constructor(context: string, issues: readonly string[]) {
    super([`[${context}] Invalid environment configuration`, ...issues.map((issue) => `  - ${issue}`)].join('\n'));
    this.name = 'EnvConfigError';
    this.issues = issues;
  }
}

/**
 * Parses the environment with `schema`. Every failing variable is reported in
 * one `EnvConfigError`, in schema order.
 */
export function loadEnvConfig<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  options: LoadEnvConfigOptions = {}
): T {
  const result = schema.safeParse({ ...(options.env ?? process.env) });
  if (result.success) {
    return result.data;
  }
  const issues = result.error.issues.map((issue) => {
    const variable = issue.path.length > 0 ? issue.path.join('.') : '<root>';
    return `${variable}: ${issue.message}`;
  });
  throw new EnvConfigError(options.context ?? 'tideline', issues);
}

// Blank and whitespace-only values count as unset.
function readValue(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

export type IntegerVarOptions = {
  defaultValue?: number;
  min?: number;
};

export function integerVar(options: IntegerVarOptions = {}) {
  return z
    .string()
    .optional()
    .transform((value, ctx) => {
      const raw = readValue(value);
      if (raw === undefined) {
        return options.defaultValue;
      }
      if (!/^[-+]?\d+$/.test(raw)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `must be an integer, got "${raw}"` });
        return z.NEVER;
      }
      const parsed = Number(raw);
      if (options.min !== undefined && parsed < options.min) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `must be >= ${options.min}, got ${parsed}` });
        return z.NEVER;
      }
      return parsed;
    });
}

export type StringVarOptions = {
  defaultValue?: string;
  lowercase?: boolean;
};

export function stringVar(options: StringVarOptions = {}) {
  return z
    .string()
    .optional()
    .transform((value) => {
      const raw = readValue(value) ?? options.defaultValue;
      return raw !== undefined && options.lowercase ? raw.toLowerCase() : raw;
    });
}
