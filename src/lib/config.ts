import { z } from 'zod';
import {
  DEFAULT_MIN_REQUEST_INTERVAL_MS,
  DEFAULT_TIMEOUT_MS,
  type RegistryClientOptions,
} from '@/api/client';
import type { RateLimiter } from '@/api/rateLimiter';

export const MAX_RESULTS_RANGE = { min: 5, max: 50, default: 20 } as const;
export const MAX_COMPANIES_RANGE = { min: 1, max: 10, default: 5 } as const;

const baseUrlSchema = z
  .string()
  .trim()
  .refine((value) => value.startsWith('/') || /^https?:\/\//.test(value), {
    message: 'must be an http(s) URL or a path starting with /',
  })
  .optional();

export const configSchema = z.object({
  apiKey: z.string().trim().default(''),
  sandbox: z.boolean().default(false),
  baseUrl: baseUrlSchema,
  sandboxBaseUrl: baseUrlSchema,
  maxResults: z
    .number()
    .int()
    .min(MAX_RESULTS_RANGE.min)
    .max(MAX_RESULTS_RANGE.max)
    .default(MAX_RESULTS_RANGE.default),
  maxCompanies: z
    .number()
    .int()
    .min(MAX_COMPANIES_RANGE.min)
    .max(MAX_COMPANIES_RANGE.max)
    .default(MAX_COMPANIES_RANGE.default),
  timeoutMs: z.number().positive().finite().default(DEFAULT_TIMEOUT_MS),
  minRequestIntervalMs: z.number().min(0).finite().default(DEFAULT_MIN_REQUEST_INTERVAL_MS),
});

export type AppConfig = z.infer<typeof configSchema>;

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export function parseConfig(input: unknown): AppConfig {
  const parsed = configSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`)
    );
  }
  return parsed.data;
}

function readEnv(env: Record<string, unknown>, key: string): string | undefined {
  const value = env[key];
  return typeof value === 'string' && value !== '' ? value : undefined;
}

export function configFromEnv(env: Record<string, unknown>): AppConfig {
  return parseConfig({
    apiKey: readEnv(env, 'VITE_CH_API_KEY') ?? '',
    sandbox: readEnv(env, 'VITE_CH_SANDBOX') === 'true',
    baseUrl: readEnv(env, 'VITE_CH_BASE_URL'),
    sandboxBaseUrl: readEnv(env, 'VITE_CH_SANDBOX_BASE_URL'),
  });
}

export function clamp(value: number, range: { min: number; max: number }): number {
  if (!Number.isFinite(value)) return range.min;
  return Math.min(range.max, Math.max(range.min, Math.round(value)));
}

/** The configured override for the selected environment, if any. */
export function registryBaseUrl(config: Pick<AppConfig, 'sandbox' | 'baseUrl' | 'sandboxBaseUrl'>) {
  return config.sandbox ? config.sandboxBaseUrl : config.baseUrl;
}

export type RegistrySettings = Pick<AppConfig, 'apiKey' | 'sandbox' | 'baseUrl' | 'sandboxBaseUrl' | 'timeoutMs'> &
  Partial<Pick<AppConfig, 'minRequestIntervalMs'>>;

/** A shared limiter keeps its own interval; `minRequestIntervalMs` is only used without one. */
export function toRegistryOptions(config: RegistrySettings, limiter?: RateLimiter): RegistryClientOptions {
  const base = {
    apiKey: config.apiKey,
    sandbox: config.sandbox,
    baseUrl: registryBaseUrl(config),
    timeoutMs: config.timeoutMs,
  };
  return limiter ? { ...base, limiter } : { ...base, minRequestIntervalMs: config.minRequestIntervalMs };
}
