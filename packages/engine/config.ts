import { z } from 'zod';
import { ConfigError } from './errors.js';
import { formatIssues } from './schemas.js';

export type RetractionPolicy = 'keep' | 'retract';
export type StorageKind = 'memory' | 'sqlite';
export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export interface EngineConfig {
  /**
   * What an edit does to an existing public counterpart. `keep` leaves it in
   * place until the next successful materialize; `retract` removes it along
   * with every descendant counterpart.
   */
  retractionPolicy: RetractionPolicy;
  storage: StorageKind;
  dbPath: string;
  auditEnabled: boolean;
  logLevel: LogLevel;
  logPretty: boolean;
}

const truthy = new Set(['1', 'true', 'yes', 'on']);
const falsy = new Set(['0', 'false', 'no', 'off']);

const booleanish = z.string().transform((value, ctx) => {
  const normalized = value.trim().toLowerCase();
  if (truthy.has(normalized)) return true;
  if (falsy.has(normalized)) return false;
  ctx.addIssue({ code: z.ZodIssueCode.custom, message: `expected a boolean, got "${value}"` });
  return z.NEVER;
});

const EnvSchema = z.object({
  ENGINE_RETRACTION_POLICY: z.enum(['keep', 'retract']).default('keep'),
  ENGINE_STORAGE: z.enum(['memory', 'sqlite']).default('memory'),
  ENGINE_DB_PATH: z.string().min(1).default(':memory:'),
  ENGINE_AUDIT_ENABLED: booleanish.default('true'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  LOG_PRETTY: booleanish.default('false'),
});

export const defaultEngineConfig: EngineConfig = {
  retractionPolicy: 'keep',
  storage: 'memory',
  dbPath: ':memory:',
  auditEnabled: true,
  logLevel: 'info',
  logPretty: false,
};

export function loadEngineConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(formatIssues(parsed.error));
  }
  const values = parsed.data;
  return {
    retractionPolicy: values.ENGINE_RETRACTION_POLICY,
    storage: values.ENGINE_STORAGE,
    dbPath: values.ENGINE_DB_PATH,
    auditEnabled: values.ENGINE_AUDIT_ENABLED,
    logLevel: values.LOG_LEVEL,
    logPretty: values.LOG_PRETTY,
  };
}
