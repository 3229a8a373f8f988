/**
 * Centralized HTTP Client Configuration
 *
 * Provides shared HTTP/HTTPS agents with connection pooling and a factory
 * function for creating configured axios instances, so listing pages and
 * document downloads reuse connections to the same host.
 */

import axios, { type AxiosInstance, type CreateAxiosDefaults } from 'axios';
import https from 'https';
import http from 'http';
import { logger } from '../utils/logger.js';

// HTTP timeout constants for different scenarios
export const HTTP_TIMEOUTS = {
  PAGE: 10000,      // 10 seconds - listing pages
  DOCUMENT: 30000,  // 30 seconds - document downloads
} as const;

// Create HTTP agents with connection pooling
// These are shared across all HTTP clients to maximize connection reuse
const httpAgent = new http.Agent({
  keepAlive: true,
  keepAliveMsecs: 30000, // Keep connections alive for 30 seconds
  maxSockets: 10,        // Government sites do not like many parallel sockets
  maxFreeSockets: 5,
  timeout: 60000,        // Socket timeout in milliseconds
});

const httpsAgent = new https.Agent({
  keepAlive: true,
  keepAliveMsecs: 30000,
  maxSockets: 10,
  maxFreeSockets: 5,
  timeout: 60000,
});

/**
 * Create a configured axios instance with connection pooling and default settings
 *
 * @param config - Optional axios configuration to merge with defaults
 * @returns Configured axios instance
 */
export function createHttpClient(config?: CreateAxiosDefaults): AxiosInstance {
  const client = axios.create({
    timeout: HTTP_TIMEOUTS.PAGE,
    httpAgent,
    httpsAgent,
    ...config,
  });

  // Enforce a timeout on every request, even when a caller passes timeout: 0
  client.interceptors.request.use((requestConfig) => {
    if (!requestConfig.timeout) {
      requestConfig.timeout = HTTP_TIMEOUTS.PAGE;
      logger.debug(
        { url: requestConfig.url, method: requestConfig.method },
        'HTTP request without explicit timeout, using default PAGE timeout (10s)'
      );
    }
    return requestConfig;
  });

  return client;
}
