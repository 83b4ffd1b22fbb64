/**
 * DgtDatex2Client - Download the DGT DATEX2 v3 SituationPublication feed
 *
 * Returns the raw payload bytes; parsing is left to the DATEX2 adapter.
 */

import type { AxiosInstance, AxiosRequestConfig } from 'axios';
import { isAxiosError } from 'axios';
import { createHttpClient } from '../config/httpClient.js';
import { validateEnv } from '../config/env.js';
import { ExternalServiceError } from '../types/errors.js';
import { logger } from '../utils/logger.js';
import { retryWithBackoff } from '../utils/retry.js';
import type { RetryConfig } from '../utils/retry.js';

const SERVICE_NAME = 'DGT DATEX2';

/**
 * DGT DATEX2 client configuration
 */
export interface DgtDatex2ClientConfig {
  url?: string;
  timeoutMs?: number;
  /** Retry policy for transient failures; `maxAttempts` defaults to DATEX2_FETCH_MAX_RETRIES */
  retry?: RetryConfig;
  /** Extra axios configuration, merged over the defaults */
  http?: AxiosRequestConfig;
}

export class DgtDatex2Client {
  private client: AxiosInstance;
  private readonly url: string;
  private readonly retry: RetryConfig;

  constructor(config: DgtDatex2ClientConfig = {}) {
    const env = validateEnv();

    this.url = config.url || env.DATEX2_URL;
    this.retry = {
      maxAttempts: env.DATEX2_FETCH_MAX_RETRIES,
      ...config.retry,
    };

    this.client = createHttpClient({
      timeout: config.timeoutMs || env.DATEX2_FETCH_TIMEOUT_MS,
      headers: {
        'Accept': 'application/xml, text/xml',
      },
      ...config.http,
    });
  }

  get sourceUrl(): string {
    return this.url;
  }

  /**
   * Download the feed
   *
   * @returns Raw XML bytes
   * @throws ExternalServiceError when the download fails after retries
   */
  async fetch(): Promise<Buffer> {
    const startedAt = Date.now();

    try {
      const response = await retryWithBackoff(
        () => this.client.get<ArrayBuffer>(this.url, { responseType: 'arraybuffer' }),
        this.retry,
        `GET ${this.url}`
      );

      const payload = Buffer.from(response.data);

      logger.info(
        { url: this.url, bytes: payload.length, durationMs: Date.now() - startedAt },
        'Downloaded DATEX2 feed'
      );

      return payload;
    } catch (error) {
      const status = isAxiosError(error) ? error.response?.status : undefined;
      logger.error({ error, url: this.url, status }, 'Failed to download DATEX2 feed');
      throw new ExternalServiceError(
        SERVICE_NAME,
        error instanceof Error ? error.message : String(error),
        { url: this.url, status }
      );
    }
  }
}
