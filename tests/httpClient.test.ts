import { describe, expect, it, vi } from 'vitest';
import axios, { AxiosError, type AxiosAdapter, type InternalAxiosRequestConfig } from 'axios';
import { SourceHttpClient, SourceHttpError } from '../src/services/httpClient.js';

function stubAxios(handler: (config: InternalAxiosRequestConfig) => unknown) {
  const adapter: AxiosAdapter = async (config) => ({
    data: handler(config),
    status: 200,
    statusText: 'OK',
    headers: {},
    config,
  });
  return axios.create({ adapter });
}

describe('SourceHttpClient', () => {
  it('retries with exponential backoff and returns the eventual payload', async () => {
    let calls = 0;
    const sleep = vi.fn(async (_ms: number) => {});
    const client = new SourceHttpClient({
      sleep,
      axiosInstance: stubAxios(() => {
        calls += 1;
        if (calls < 3) throw new Error('socket hang up');
        return { ok: true };
      }),
    });

    await expect(client.getJson('https://api.example/items')).resolves.toEqual({ ok: true });
    expect(calls).toBe(3);
    expect(sleep.mock.calls).toEqual([[1000], [2000]]);
  });

  it('gives up after the last attempt', async () => {
    const sleep = vi.fn(async (_ms: number) => {});
    const client = new SourceHttpClient({
      sleep,
      axiosInstance: stubAxios(() => {
        throw new Error('socket hang up');
      }),
    });

    const error = await client.getJson('https://api.example/items').catch((e: unknown) => e);
    expect(error).toBeInstanceOf(SourceHttpError);
    expect(error).toMatchObject({
      message: 'socket hang up',
      url: 'https://api.example/items',
      attempts: 3,
    });
    expect(sleep).toHaveBeenCalledTimes(2);
  });

  it('reports the HTTP status of a rejected response', async () => {
    const adapter: AxiosAdapter = async (config) => {
      throw new AxiosError('Request failed with status code 503', 'ERR_BAD_RESPONSE', config, undefined, {
        data: null,
        status: 503,
        statusText: 'Service Unavailable',
        headers: {},
        config,
      });
    };
    const client = new SourceHttpClient({
      maxAttempts: 1,
      axiosInstance: axios.create({ adapter }),
    });

    await expect(client.getJson('https://api.example/down')).rejects.toMatchObject({
      name: 'SourceHttpError',
      message: 'HTTP 503 Service Unavailable',
      status: 503,
      attempts: 1,
    });
  });

  it('sends browser-like headers with per-request overrides and params', async () => {
    const seen: InternalAxiosRequestConfig[] = [];
    const client = new SourceHttpClient({
      axiosInstance: stubAxios((config) => {
        seen.push(config);
        return 'plain body';
      }),
    });

    const body = await client.getText('https://site.example/page', {
      params: { q: 'invite', limit: 5 },
      headers: { 'User-Agent': 'test-agent' },
    });

    expect(body).toBe('plain body');
    expect(seen[0].params).toEqual({ q: 'invite', limit: 5 });
    expect(seen[0].headers.get('User-Agent')).toBe('test-agent');
    expect(seen[0].headers.get('Accept-Language')).toBe('en-US,en;q=0.9');
  });
});
