import axios, { type AxiosInstance } from 'axios';
import type { Logger } from '../logger.js';
import { sleep as defaultSleep, type Sleep } from '../utils/async.js';

/**
 * Baseline headers resembling a modern browser. Some sites reject generic clients
 * or requests missing these.
 */
export const BASE_REQUEST_HEADERS: Record<string, string> = {
  Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,application/json;q=0.8,*/*;q=0.7',
  'Accept-Language': 'en-US,en;q=0.9',
  'Cache-Control': 'no-cache',
  Pragma: 'no-cache',
  Referer: 'https://www.google.com/',
};

export type QueryParams = Record<string, string | number | boolean>;

export interface GetOptions {
  params?: QueryParams;
  headers?: Record<string, string>;
  timeoutMs?: number;
}

export interface SourceHttpClientOptions {
  timeoutMs?: number;
  maxAttempts?: number;
  backoffBaseMs?: number;
  logger?: Logger;
  sleep?: Sleep;
  axiosInstance?: AxiosInstance;
}

export class SourceHttpError extends Error {
  constructor(
    message: string,
    public readonly url: string,
    public readonly attempts: number,
    public readonly status?: number,
  ) {
    super(message);
    this.name = 'SourceHttpError';
  }
}

function describeError(error: unknown): { message: string; status?: number } {
  if (axios.isAxiosError(error)) {
    const status = error.response?.status;
    return { message: status ? `HTTP ${status} ${error.response?.statusText ?? ''}`.trim() : error.message, status };
  }
  return { message: error instanceof Error ? error.message : String(error) };
}

/**
 * GET client shared by all fetchers. Every request is retried up to `maxAttempts`
 * times with exponential backoff (base, 2x base, ...) before it fails.
 */
export class SourceHttpClient {
  private readonly axios: AxiosInstance;
  private readonly maxAttempts: number;
  private readonly backoffBaseMs: number;
  private readonly logger?: Logger;
  private readonly sleep: Sleep;

  constructor(opts: SourceHttpClientOptions = {}) {
    this.axios = opts.axiosInstance ?? axios.create({ timeout: opts.timeoutMs ?? 30000 });
    this.maxAttempts = Math.max(1, opts.maxAttempts ?? 3);
    this.backoffBaseMs = opts.backoffBaseMs ?? 1000;
    this.logger = opts.logger;
    this.sleep = opts.sleep ?? defaultSleep;
  }

  async getJson(url: string, opts: GetOptions = {}): Promise<unknown> {
    return this.request(url, opts, 'json');
  }

  async getText(url: string, opts: GetOptions = {}): Promise<string> {
    const data = await this.request(url, opts, 'text');
    return typeof data === 'string' ? data : JSON.stringify(data);
  }

  private async request(url: string, opts: GetOptions, responseType: 'json' | 'text'): Promise<unknown> {
    const headers = { ...BASE_REQUEST_HEADERS, ...(opts.headers ?? {}) };

    for (let attempt = 1; ; attempt++) {
      try {
        const { data } = await this.axios.get<unknown>(url, {
          params: opts.params,
          headers,
          responseType,
          timeout: opts.timeoutMs,
        });
        return data;
      } catch (error) {
        const { message, status } = describeError(error);
        if (attempt >= this.maxAttempts) {
          throw new SourceHttpError(message, url, attempt, status);
        }
        this.logger?.warn({ url, attempt, maxAttempts: this.maxAttempts, err: message }, 'Request failed, retrying');
        await this.sleep(this.backoffBaseMs * 2 ** (attempt - 1));
      }
    }
  }
}
