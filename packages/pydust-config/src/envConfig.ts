import { z } from 'zod';

export type EnvSource = Record<string, string | undefined>;

export type LoadEnvConfigOptions = {
  env?: EnvSource;
  context?: string;
};

export class EnvConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'EnvConfigError';
  }
}

type EnvIssueTarget = {
  path: (string | number)[];
  message: string;
};

function formatIssue({ path, message }: EnvIssueTarget): string {
  const location = path.length > 0 ? path.join('.') : '<root>';
  return `${location}: ${message}`;
}

function formatErrorMessage(context: string, issues: EnvIssueTarget[]): string {
  const header = `[${context}] Invalid environment configuration`;
  const details = issues.map((issue) => `  - ${formatIssue(issue)}`).join('\n');
  return `${header}\n${details}`;
}

export function loadEnvConfig<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  options?: LoadEnvConfigOptions
): T {
  const envSource: EnvSource = { ...(options?.env ?? process.env) };
  const context = options?.context ?? 'pydust';

  const result = schema.safeParse(envSource);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({
      path: issue.path,
      message: issue.message
    }));
    throw new EnvConfigError(formatErrorMessage(context, issues));
  }

  return result.data;
}

export type EnumVarOptions<T extends string> = {
  values: readonly [T, ...T[]];
  defaultValue: T;
  description?: string;
};

export function enumVar<T extends string>(options: EnumVarOptions<T>) {
  return z
    .string()
    .optional()
    .transform((value, ctx): T => {
      const pathName = ctx.path.length > 0 ? ctx.path[ctx.path.length - 1] : undefined;
      const description = options.description ?? String(pathName ?? 'value');

      const normalized = value?.trim().toLowerCase() ?? '';
      if (normalized.length === 0) {
        return options.defaultValue;
      }
      const match = options.values.find((candidate) => candidate === normalized);
      if (match === undefined) {
        const accepted = options.values.map((entry) => `'${entry}'`).join(', ');
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Invalid ${description}. Accepted values: ${accepted}`
        });
        return z.NEVER;
      }
      return match;
    });
}

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const pydustEnvSchema = z
  .object({
    PYDUST_LOG_LEVEL: enumVar<LogLevel>({
      values: LOG_LEVELS,
      defaultValue: 'warn',
      description: 'log level'
    })
  })
  .transform((env) => ({
    logLevel: env.PYDUST_LOG_LEVEL
  }));

export type PydustEnv = z.infer<typeof pydustEnvSchema>;

export function loadPydustEnv(env?: EnvSource): PydustEnv {
  return loadEnvConfig(pydustEnvSchema, { env, context: 'pydust' });
}
