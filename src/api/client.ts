import type { z } from 'zod';
import { RateLimiter } from './rateLimiter';
import {
  MissingApiKeyError,
  RegistryError,
  err,
  ok,
  type RegistryResult,
} from '@/types/api';

export const LIVE_BASE_URL = 'https://api.company-information.service.gov.uk';
export const SANDBOX_BASE_URL = 'https://api-sandbox.company-information.service.gov.uk';

export const DEFAULT_TIMEOUT_MS = 10_000;
export const DEFAULT_MIN_REQUEST_INTERVAL_MS = 100;
export const DEFAULT_USER_AGENT = 'company-network-explorer/1.0';

export interface RegistryClientOptions {
  apiKey: string;
  /** Overrides `sandbox`. May be a same-origin path such as `/registry`. */
  baseUrl?: string;
  sandbox?: boolean;
  timeoutMs?: number;
  /** Ignored when `limiter` is given. */
  minRequestIntervalMs?: number;
  userAgent?: string;
  fetch?: typeof fetch;
  /** Shared spacing across clients; takes precedence over `minRequestIntervalMs`. */
  limiter?: RateLimiter;
}

export type QueryParams = Record<string, string | number | boolean | undefined>;

function isTimeout(error: unknown): boolean {
  return error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError');
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class RegistryClient {
  readonly baseUrl: string;
  readonly timeoutMs: number;
  readonly limiter: RateLimiter;
  private readonly headers: Record<string, string>;
  private readonly fetchImpl: typeof fetch;

  constructor(options: RegistryClientOptions) {
    if (!options.apiKey.trim()) {
      throw new MissingApiKeyError();
    }

    this.baseUrl = (options.baseUrl ?? (options.sandbox ? SANDBOX_BASE_URL : LIVE_BASE_URL)).replace(
      /\/+$/,
      ''
    );
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.limiter =
      options.limiter ??
      new RateLimiter(options.minRequestIntervalMs ?? DEFAULT_MIN_REQUEST_INTERVAL_MS);
    // Basic auth: the key is the username, the password is empty.
    this.headers = {
      Accept: 'application/json',
      Authorization: `Basic ${btoa(`${options.apiKey}:`)}`,
      'User-Agent': options.userAgent ?? DEFAULT_USER_AGENT,
    };
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
  }

  buildUrl(path: string, params?: QueryParams): string {
    const search = new URLSearchParams();
    if (params) {
      Object.entries(params).forEach(([key, value]) => {
        if (value !== undefined) {
          search.set(key, String(value));
        }
      });
    }
    const query = search.toString();
    return `${this.baseUrl}${path}${query ? `?${query}` : ''}`;
  }

  /**
   * GETs `path` and validates the body against `schema`. A 404 resolves to
   * `ok(null)`; every other failure is logged and returned as an error.
   */
  async get<T>(
    path: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    params?: QueryParams
  ): Promise<RegistryResult<T | null>> {
    const url = this.buildUrl(path, params);

    let response: Response;
    try {
      response = await this.limiter.schedule(() =>
        this.fetchImpl(url, {
          method: 'GET',
          headers: this.headers,
          signal: AbortSignal.timeout(this.timeoutMs),
        })
      );
    } catch (error) {
      return this.fail(
        path,
        isTimeout(error)
          ? new RegistryError('timeout', `Request timed out after ${this.timeoutMs}ms`)
          : new RegistryError('network', messageOf(error))
      );
    }

    if (response.status === 404) {
      return ok(null);
    }

    if (!response.ok) {
      return this.fail(
        path,
        new RegistryError('http', `API error: ${response.status} ${response.statusText}`, response.status)
      );
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      return this.fail(path, new RegistryError('parse', `Malformed response body: ${messageOf(error)}`));
    }

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
      return this.fail(
        path,
        new RegistryError('parse', `Unexpected response shape${where}: ${issue?.message ?? 'invalid'}`)
      );
    }
    return ok(parsed.data);
  }

  private fail<T>(path: string, error: RegistryError): RegistryResult<T> {
    console.error(`[registry] GET ${path} failed (${error.kind}): ${error.message}`);
    return err(error);
  }
}
