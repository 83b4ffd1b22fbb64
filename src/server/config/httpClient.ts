/**
 * Shared axios factory for outbound HTTP
 *
 * All clients share one pair of keep-alive agents, and no request leaves
 * without a timeout.
 */

import axios from 'axios';
import type { AxiosInstance, AxiosRequestConfig } from 'axios';
import https from 'https';
import http from 'http';
import { logger } from '../utils/logger.js';

export const DEFAULT_TIMEOUT_MS = 30000;

const AGENT_OPTIONS = {
  keepAlive: true,
  keepAliveMsecs: 30000,
  maxSockets: 4,
  maxFreeSockets: 1,
};

const httpAgent = new http.Agent(AGENT_OPTIONS);
const httpsAgent = new https.Agent(AGENT_OPTIONS);

/**
 * Create an axios instance on the shared agents
 *
 * @param config - Merged over the defaults
 */
export function createHttpClient(config?: AxiosRequestConfig): AxiosInstance {
  const client = axios.create({
    timeout: DEFAULT_TIMEOUT_MS,
    httpAgent,
    httpsAgent,
    ...config,
  });

  // A timeout of 0 would wait forever
  client.interceptors.request.use((requestConfig) => {
    if (!requestConfig.timeout) {
      requestConfig.timeout = DEFAULT_TIMEOUT_MS;
      logger.debug(
        { url: requestConfig.url, method: requestConfig.method },
        `HTTP request without explicit timeout, using default (${DEFAULT_TIMEOUT_MS}ms)`
      );
    }
    return requestConfig;
  });

  client.interceptors.response.use((response) => {
    logger.debug(
      { url: response.config.url, status: response.status },
      'HTTP response received'
    );
    return response;
  });

  return client;
}
