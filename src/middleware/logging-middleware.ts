import { AxiosInstance, InternalAxiosRequestConfig, AxiosResponse, isAxiosError } from 'axios';
import { logger } from '../logging/index.js';

// Request start times, keyed by the config object axios threads through
const startTimes = new WeakMap<InternalAxiosRequestConfig, number>();

function elapsed(config: InternalAxiosRequestConfig | undefined): number {
  const startTime = config ? startTimes.get(config) : undefined;
  return startTime === undefined ? 0 : Date.now() - startTime;
}

export function setupLoggingMiddleware(axiosInstance: AxiosInstance): void {
  axiosInstance.interceptors.request.use(
    (config: InternalAxiosRequestConfig) => {
      startTimes.set(config, Date.now());

      if (logger.getConfig().requestsEnabled) {
        logger.debug('HTTP Request', {
          method: config.method?.toUpperCase(),
          url: config.url,
          params: config.params,
        }, 'http-client');
      }

      return config;
    },
    (error: unknown) => {
      if (!isAxiosError(error)) return Promise.reject(error);
      logger.error('HTTP Request Error', {
        message: error.message,
        code: error.code,
      }, 'http-client');
      return Promise.reject(error);
    }
  );

  axiosInstance.interceptors.response.use(
    (response: AxiosResponse) => {
      if (logger.getConfig().requestsEnabled) {
        logger.debug('HTTP Response', {
          method: response.config.method?.toUpperCase(),
          url: response.config.url,
          status: response.status,
          duration_ms: elapsed(response.config),
        }, 'http-client');
      }

      return response;
    },
    (error: unknown) => {
      if (!isAxiosError(error)) return Promise.reject(error);
      logger.error('HTTP Response Error', {
        method: error.config?.method?.toUpperCase(),
        url: error.config?.url,
        status: error.response?.status,
        duration_ms: elapsed(error.config),
        message: error.message,
      }, 'http-client');

      return Promise.reject(error);
    }
  );
}
