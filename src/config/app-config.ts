import type { LogLevel } from '@nestjs/common';
import { z } from 'zod';
import { ConfigurationError } from '../common/errors';
import { blankToUndefined } from '../common/blank';

export const APP_CONFIG = Symbol('APP_CONFIG');

const LOG_LEVELS: LogLevel[] = ['error', 'warn', 'log', 'debug', 'verbose'];

const optionalString = z.preprocess(
  blankToUndefined,
  z.string().trim().optional(),
);

// Secrets are taken as-is.
const optionalSecret = z.preprocess(blankToUndefined, z.string().optional());

const stringOr = (def: string) =>
  z.preprocess(blankToUndefined, z.string().trim().default(def));

const flag = (def: boolean) =>
  z.preprocess(
    blankToUndefined,
    z
      .string()
      .optional()
      .transform((v) =>
        v === undefined ? def : ['1', 'true', 'yes'].includes(v.toLowerCase()),
      ),
  );

const positiveInt = (def: number) =>
  z.preprocess(
    blankToUndefined,
    z.coerce.number().int().positive().default(def),
  );

const optionalPort = z.preprocess(
  blankToUndefined,
  z.coerce.number().int().min(1).max(65535).optional(),
);

const EnvSchema = z.object({
  PORT: positiveInt(3000),
  LOG_LEVEL: z.preprocess(
    blankToUndefined,
    z.enum(['error', 'warn', 'log', 'debug', 'verbose']).default('log'),
  ),
  DEV_MODE: flag(false),
  CORS_ORIGIN: z.preprocess(blankToUndefined, z.string().default('*')),

  POSTGRES_HOST: optionalString,
  POSTGRES_PORT: optionalPort,
  POSTGRES_DB: optionalString,
  POSTGRES_USER: optionalString,
  POSTGRES_PASSWORD: optionalSecret,
  DOCKER_ENV: flag(false),

  POSTGRES_CONN_ID: stringOr('contracts_postgres'),
  AIRFLOW_API_URL: z.preprocess(blankToUndefined, z.string().url().optional()),
  AIRFLOW_API_USER: optionalString,
  AIRFLOW_API_PASSWORD: optionalSecret,
  AIRFLOW_API_TIMEOUT_MS: positiveInt(3000),

  CONTRACTS_TABLE: stringOr('public.sync_contratos'),
  CONTRACTS_LIST_LIMIT: positiveInt(1000),
  DB_STATEMENT_TIMEOUT_MS: positiveInt(5000),
  DB_CONNECT_TIMEOUT_MS: positiveInt(3000),
  DB_POOL_MAX: positiveInt(5),

  LLM_MODEL: stringOr('amazon.nova-lite-v1:0'),
  BEDROCK_AWS_REGION: optionalString,
  AWS_REGION: optionalString,
  AWS_DEFAULT_REGION: optionalString,
  LLM_TIMEOUT_MS: positiveInt(30000),
  LLM_MAX_TOKENS: positiveInt(1024),
  LLM_REPLY_LANGUAGE: stringOr('Spanish'),
});

export type EnvDatabaseSettings = {
  host?: string;
  port?: number;
  database?: string;
  user?: string;
  password?: string;
  dockerEnv: boolean;
};

export type AppConfig = {
  readonly port: number;
  readonly logLevels: readonly LogLevel[];
  readonly devMode: boolean;
  readonly corsOrigin: string;
  readonly database: {
    readonly env: Readonly<EnvDatabaseSettings>;
    readonly table: string;
    readonly listLimit: number;
    readonly statementTimeoutMs: number;
    readonly connectTimeoutMs: number;
    readonly poolMax: number;
  };
  readonly orchestrator: {
    readonly connectionId: string;
    /** Value of `AIRFLOW_CONN_<ID>`, Airflow's env-backed connection store. */
    readonly connectionUri?: string;
    readonly apiUrl?: string;
    readonly apiUser?: string;
    readonly apiPassword?: string;
    readonly timeoutMs: number;
  };
  readonly llm: {
    readonly model: string;
    readonly region?: string;
    readonly timeoutMs: number;
    readonly maxTokens: number;
    readonly replyLanguage: string;
  };
};

export function airflowConnEnvVar(connectionId: string): string {
  const suffix = connectionId.toUpperCase().replace(/[^A-Z0-9]/g, '_');
  return `AIRFLOW_CONN_${suffix}`;
}

function deepFreeze<T extends object>(obj: T): T {
  for (const value of Object.values(obj)) {
    if (value && typeof value === 'object') deepFreeze(value);
  }
  Object.freeze(obj);
  return obj;
}

/**
 * Builds the process-wide configuration from an environment map.
 * Throws {@link ConfigurationError} when a variable is present but malformed.
 */
export function loadConfig(env: NodeJS.ProcessEnv): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((i) => `${i.path.join('.')}: ${i.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid environment: ${details}`);
  }
  const e = parsed.data;
  const connectionUri = blankToUndefined(
    env[airflowConnEnvVar(e.POSTGRES_CONN_ID)],
  );

  return deepFreeze<AppConfig>({
    port: e.PORT,
    logLevels: LOG_LEVELS.slice(0, LOG_LEVELS.indexOf(e.LOG_LEVEL) + 1),
    devMode: e.DEV_MODE,
    corsOrigin: e.CORS_ORIGIN,
    database: {
      env: {
        host: e.POSTGRES_HOST,
        port: e.POSTGRES_PORT,
        database: e.POSTGRES_DB,
        user: e.POSTGRES_USER,
        password: e.POSTGRES_PASSWORD,
        dockerEnv: e.DOCKER_ENV,
      },
      table: e.CONTRACTS_TABLE,
      listLimit: e.CONTRACTS_LIST_LIMIT,
      statementTimeoutMs: e.DB_STATEMENT_TIMEOUT_MS,
      connectTimeoutMs: e.DB_CONNECT_TIMEOUT_MS,
      poolMax: e.DB_POOL_MAX,
    },
    orchestrator: {
      connectionId: e.POSTGRES_CONN_ID,
      connectionUri:
        typeof connectionUri === 'string' ? connectionUri : undefined,
      apiUrl: e.AIRFLOW_API_URL,
      apiUser: e.AIRFLOW_API_USER,
      apiPassword: e.AIRFLOW_API_PASSWORD,
      timeoutMs: e.AIRFLOW_API_TIMEOUT_MS,
    },
    llm: {
      model: e.LLM_MODEL,
      region: e.BEDROCK_AWS_REGION ?? e.AWS_REGION ?? e.AWS_DEFAULT_REGION,
      timeoutMs: e.LLM_TIMEOUT_MS,
      maxTokens: e.LLM_MAX_TOKENS,
      replyLanguage: e.LLM_REPLY_LANGUAGE,
    },
  });
}
