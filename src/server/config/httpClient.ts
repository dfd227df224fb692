/**
 * Centralized HTTP Client Configuration
 *
 * Provides shared HTTP/HTTPS agents with connection pooling and a factory
 * function for creating configured axios instances. Requests are never
 * retried here; callers decide what a failure means.
 */

import axios, { AxiosInstance, CreateAxiosDefaults, InternalAxiosRequestConfig } from 'axios';
import https from 'https';
import http from 'http';
import { logger } from '../utils/logger.js';

// HTTP timeout constants for different scenarios
export const HTTP_TIMEOUTS = {
  SHORT: 5000,      // 5 seconds - quick API calls
  STANDARD: 30000,  // 30 seconds - standard operations
  LONG: 120000,     // 2 minutes - long-running operations
} as const;

// Shared across all HTTP clients to maximize connection reuse
const httpAgent = new http.Agent({
  keepAlive: true,
  keepAliveMsecs: 30000,
  maxSockets: 50,
  maxFreeSockets: 10,
  timeout: 60000,
});

const httpsAgent = new https.Agent({
  keepAlive: true,
  keepAliveMsecs: 30000,
  maxSockets: 50,
  maxFreeSockets: 10,
  timeout: 60000,
});

type TimedRequestConfig = InternalAxiosRequestConfig & { _startTime?: number };

function requestLabel(config: InternalAxiosRequestConfig): { method: string; url: string } {
  return {
    method: (config.method ?? 'get').toUpperCase(),
    url: config.url ?? '',
  };
}

/**
 * Create a configured axios instance with connection pooling and default settings
 *
 * @param config - Optional axios configuration to merge with defaults
 * @returns Configured axios instance
 */
export function createHttpClient(config?: CreateAxiosDefaults): AxiosInstance {
  const client = axios.create({
    timeout: HTTP_TIMEOUTS.STANDARD,
    httpAgent,
    httpsAgent,
    ...config,
  });

  client.interceptors.request.use((requestConfig: TimedRequestConfig) => {
    if (!requestConfig.timeout) {
      requestConfig.timeout = HTTP_TIMEOUTS.STANDARD;
    }
    requestConfig._startTime = Date.now();
    return requestConfig;
  });

  client.interceptors.response.use(
    (response) => {
      const requestConfig: TimedRequestConfig = response.config;
      logger.debug(
        {
          ...requestLabel(requestConfig),
          status: response.status,
          durationMs: requestConfig._startTime ? Date.now() - requestConfig._startTime : undefined,
        },
        'HTTP request completed'
      );
      return response;
    },
    (error: unknown) => {
      if (axios.isAxiosError(error) && error.config) {
        const requestConfig: TimedRequestConfig = error.config;
        logger.debug(
          {
            ...requestLabel(requestConfig),
            status: error.response?.status,
            code: error.code,
            durationMs: requestConfig._startTime ? Date.now() - requestConfig._startTime : undefined,
          },
          'HTTP request failed'
        );
      }
      return Promise.reject(error);
    }
  );

  return client;
}
