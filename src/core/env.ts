/**
 * Environment variable handling with validation
 * API keys are never logged or exposed
 */

import { ConfigError } from './errors';

const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'silent'] as const;
const NODE_ENVS = ['development', 'production', 'test'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];
export type NodeEnv = (typeof NODE_ENVS)[number];

export const DEFAULT_SEC_USER_AGENT = 'ticker-resolver contact@example.com';
export const DEFAULT_LLM_BASE_URL = 'https://openrouter.ai/api/v1';
export const DEFAULT_LLM_MODEL = 'anthropic/claude-3-haiku';

export interface EnvConfig {
  secUserAgent: string;
  enableLlm: boolean;
  openaiApiKey: string | null;
  llmBaseUrl: string;
  llmModel: string;
  logLevel: LogLevel;
  nodeEnv: NodeEnv;
}

function getEnvVar(name: string, required: boolean = false): string | undefined {
  const value = process.env[name]?.trim();
  if (required && !value) {
    throw new ConfigError(`Missing required environment variable: ${name}`);
  }
  return value || undefined;
}

function isOneOf<T extends string>(values: readonly T[], raw: string): raw is T {
  return values.some((value) => value === raw);
}

export function loadEnvConfig(): EnvConfig {
  const enableLlm = getEnvVar('ENABLE_LLM') === 'true';

  const logLevelRaw = getEnvVar('LOG_LEVEL') ?? 'info';
  const logLevel = isOneOf(LOG_LEVELS, logLevelRaw) ? logLevelRaw : 'info';

  const nodeEnvRaw = process.env.NODE_ENV || 'development';
  const nodeEnv = isOneOf(NODE_ENVS, nodeEnvRaw) ? nodeEnvRaw : 'development';

  return {
    secUserAgent: getEnvVar('SEC_USER_AGENT') ?? DEFAULT_SEC_USER_AGENT,
    enableLlm,
    openaiApiKey: enableLlm ? (getEnvVar('OPENAI_API_KEY', true) ?? null) : null,
    llmBaseUrl: getEnvVar('LLM_BASE_URL') ?? DEFAULT_LLM_BASE_URL,
    llmModel: getEnvVar('LLM_MODEL') ?? DEFAULT_LLM_MODEL,
    logLevel,
    nodeEnv,
  };
}

let cachedConfig: EnvConfig | null = null;

export function getEnvConfig(): EnvConfig {
  if (!cachedConfig) {
    cachedConfig = loadEnvConfig();
  }
  return cachedConfig;
}

export function resetEnvConfig(): void {
  cachedConfig = null;
}
