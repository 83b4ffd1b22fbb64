import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { AxiosError } from 'axios';
import type { AxiosAdapter, AxiosResponse, InternalAxiosRequestConfig } from 'axios';
import { DEFAULT_DATEX2_URL, resetEnv } from '../config/env.js';
import { ExternalServiceError } from '../types/errors.js';
import { DgtDatex2Client } from './DgtDatex2Client.js';

const FEED_URL = 'https://feed.test/datex2.xml';
const PAYLOAD = '<d2:payload xmlns:d2="http://levelC/schema/3/d2Payload"/>';

const FAST_RETRY = { maxAttempts: 2, initialDelay: 1, maxDelay: 5 };

function ok(config: InternalAxiosRequestConfig, body: string): AxiosResponse {
  return { data: Buffer.from(body), status: 200, statusText: 'OK', headers: {}, config };
}

function httpError(config: InternalAxiosRequestConfig, status: number): AxiosError {
  const response: AxiosResponse = { data: '', status, statusText: String(status), headers: {}, config };
  return new AxiosError(
    `Request failed with status code ${status}`,
    AxiosError.ERR_BAD_RESPONSE,
    config,
    null,
    response
  );
}

describe('DgtDatex2Client', () => {
  beforeEach(() => {
    resetEnv();
  });

  afterEach(() => {
    resetEnv();
  });

  it('uses the DGT feed URL by default', () => {
    expect(new DgtDatex2Client().sourceUrl).toBe(DEFAULT_DATEX2_URL);
  });

  it('takes the feed URL from the environment', () => {
    vi.stubEnv('DATEX2_URL', 'https://mirror.test/feed.xml');
    try {
      expect(new DgtDatex2Client().sourceUrl).toBe('https://mirror.test/feed.xml');
    } finally {
      vi.unstubAllEnvs();
    }
  });

  it('downloads the payload as raw bytes', async () => {
    const adapter = vi.fn<AxiosAdapter>(async config => ok(config, PAYLOAD));
    const client = new DgtDatex2Client({ url: FEED_URL, retry: FAST_RETRY, http: { adapter } });

    const payload = await client.fetch();

    expect(payload.toString('utf-8')).toBe(PAYLOAD);
    expect(adapter).toHaveBeenCalledTimes(1);
    const [config] = adapter.mock.calls[0];
    expect(config.url).toBe(FEED_URL);
    expect(config.method).toBe('get');
    expect(config.responseType).toBe('arraybuffer');
  });

  it('retries transient server errors', async () => {
    let calls = 0;
    const adapter: AxiosAdapter = async config => {
      calls++;
      if (calls === 1) {
        throw httpError(config, 503);
      }
      return ok(config, PAYLOAD);
    };
    const client = new DgtDatex2Client({ url: FEED_URL, retry: FAST_RETRY, http: { adapter } });

    const payload = await client.fetch();

    expect(calls).toBe(2);
    expect(payload.toString('utf-8')).toBe(PAYLOAD);
  });

  it('does not retry client errors', async () => {
    let calls = 0;
    const adapter: AxiosAdapter = async config => {
      calls++;
      throw httpError(config, 404);
    };
    const client = new DgtDatex2Client({ url: FEED_URL, retry: FAST_RETRY, http: { adapter } });

    const error = await client.fetch().catch((e: unknown) => e);

    expect(calls).toBe(1);
    expect(error).toBeInstanceOf(ExternalServiceError);
    if (error instanceof ExternalServiceError) {
      expect(error.message).toBe('External service error (DGT DATEX2): Request failed with status code 404');
      expect(error.statusCode).toBe(502);
      expect(error.context).toEqual({ service: 'DGT DATEX2', url: FEED_URL, status: 404 });
    }
  });

  it('gives up after the configured number of retries', async () => {
    let calls = 0;
    const adapter: AxiosAdapter = async config => {
      calls++;
      throw httpError(config, 500);
    };
    const client = new DgtDatex2Client({ url: FEED_URL, retry: FAST_RETRY, http: { adapter } });

    await expect(client.fetch()).rejects.toThrow(ExternalServiceError);
    expect(calls).toBe(3);
  });

  it('takes the retry count from the environment', async () => {
    vi.stubEnv('DATEX2_FETCH_MAX_RETRIES', '0');
    try {
      let calls = 0;
      const adapter: AxiosAdapter = async config => {
        calls++;
        throw httpError(config, 503);
      };
      const client = new DgtDatex2Client({ url: FEED_URL, http: { adapter } });

      await expect(client.fetch()).rejects.toThrow(ExternalServiceError);
      expect(calls).toBe(1);
    } finally {
      vi.unstubAllEnvs();
    }
  });
});
