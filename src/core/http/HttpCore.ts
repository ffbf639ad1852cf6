// src/core/http/HttpCore.ts

import axios, { AxiosInstance } from 'axios';
import type { HttpCoreOptions, HttpRequestConfig, HttpResponse } from './types';
import type { Logger } from '../../observability/Logger';
import {
  ApiClientError,
  ApiServerError,
  NetworkTimeoutError,
  NetworkError,
} from '../../utils/errors';
import { withHttpSpan } from '../../observability/tracing';

const DEFAULT_TIMEOUT_MS = 30000;

/**
 * Thin axios wrapper: one attempt per request, errors mapped to the
 * ApiError / NetworkError hierarchy.
 */
export class HttpCore {
  private axiosInstance: AxiosInstance;
  private logger: Logger;
  private userAgent?: string;

  constructor(logger: Logger, options: HttpCoreOptions = {}) {
    this.logger = logger;
    this.userAgent = options.userAgent;

    this.axiosInstance = axios.create({
      timeout: options.timeout ?? DEFAULT_TIMEOUT_MS,
    });
  }

  async get<T = unknown>(
    url: string,
    config: Omit<HttpRequestConfig, 'url' | 'method'> = {}
  ): Promise<HttpResponse<T>> {
    return this.request<T>({ ...config, url, method: 'GET' });
  }

  async request<T = unknown>(config: HttpRequestConfig): Promise<HttpResponse<T>> {
    const requestId = this.generateRequestId();
    const method = config.method ?? 'GET';
    const host = this.extractHost(config.url);

    this.logger.debug('HTTP request', {
      requestId,
      host,
      url: config.url,
      method,
      query: config.query,
      headerKeys: Object.keys(config.headers ?? {}),
    });

    const headers: Record<string, string> = {
      'X-Request-ID': requestId,
      ...(this.userAgent ? { 'User-Agent': this.userAgent } : {}),
      ...config.headers,
    };

    let data: string | undefined;
    if (config.form) {
      data = new URLSearchParams(config.form).toString();
      headers['Content-Type'] = 'application/x-www-form-urlencoded';
    }

    return withHttpSpan(method, config.url, async () => {
      const startTime = Date.now();

      try {
        const axiosResponse = await this.axiosInstance.request<T>({
          url: config.url,
          method,
          headers,
          params: config.query,
          data,
          auth: config.auth,
        });

        this.logger.debug('HTTP response', {
          requestId,
          host,
          status: axiosResponse.status,
          durationMs: Date.now() - startTime,
        });

        return {
          data: axiosResponse.data,
          status: axiosResponse.status,
          headers: this.toHeaderRecord(axiosResponse.headers),
        };
      } catch (error: unknown) {
        throw this.transformError(error, host, requestId);
      }
    });
  }

  private extractHost(url: string): string {
    try {
      return new URL(url).host;
    } catch {
      return 'unknown';
    }
  }

  private generateRequestId(): string {
    return `req_${Date.now()}_${Math.random().toString(36).substring(7)}`;
  }

  private toHeaderRecord(headers: object): Record<string, string> {
    const record: Record<string, string> = {};
    for (const [key, value] of Object.entries(headers)) {
      if (typeof value === 'string') {
        record[key.toLowerCase()] = value;
      }
    }
    return record;
  }

  private transformError(error: unknown, host: string, requestId: string): Error {
    if (!axios.isAxiosError(error)) {
      return new NetworkError('Network error', { host, cause: error });
    }

    if (error.response) {
      const status = error.response.status;

      this.logger.debug('HTTP error response', {
        requestId,
        host,
        status,
        statusText: error.response.statusText,
        data: error.response.data,
      });

      if (status >= 500) {
        return new ApiServerError(`Server error: ${status}`, status, { host });
      }
      return new ApiClientError(`Client error: ${status}`, status, {
        host,
        response: error.response.data,
      });
    }

    if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
      return new NetworkTimeoutError('Request timeout', { host });
    }
    return new NetworkError(`Network error: ${error.message}`, { host, code: error.code });
  }
}
