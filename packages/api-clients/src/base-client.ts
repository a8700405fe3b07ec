/**
 * Base API Client
 * ===============
 * Shared axios plumbing for the data providers: one GET per call, the raw status
 * and body handed back to the caller, transport failures mapped onto the shared
 * error classes.
 *
 * No retries, no rate limiting: a caller that needs throttling adds it outside.
 */

import axios, { type AxiosInstance } from 'axios';
import type { z } from 'zod';
import { ApiError, TimeoutError, type LogContext } from '@coinlens/utils';
import { logger } from './logger';
import { readPayload, type PayloadResult, type RawResponse } from './response';

export interface BaseApiClientConfig {
  baseURL: string;
  timeout?: number;
  apiName?: string;
  /**
   * Optional axios instance for testing. It is used as is: `baseURL` and
   * `timeout` are not applied to it, `timeout` only labels timeout errors.
   */
  axiosInstance?: AxiosInstance;
}

export interface FetchOptions {
  params?: Record<string, string | number>;
  headers?: Record<string, string>;
}

export class BaseApiClient {
  protected axiosInstance: AxiosInstance;
  protected apiName: string;
  protected timeoutMs: number;

  constructor(config: BaseApiClientConfig) {
    this.apiName = config.apiName || 'API';
    this.timeoutMs = config.timeout || 30000;

    // Use injected axios instance or create a new one
    this.axiosInstance =
      config.axiosInstance ??
      axios.create({
        baseURL: config.baseURL,
        timeout: this.timeoutMs,
        headers: { Accept: 'application/json' },
      });

    this.axiosInstance.interceptors.response.use(
      (response) => response,
      (error: unknown) => Promise.reject(this.toTransportError(error))
    );
  }

  /**
   * Perform one GET and return the status code with the untouched body text.
   * Every HTTP status resolves; only transport failures reject.
   */
  async fetchRaw(url: string, options: FetchOptions = {}): Promise<RawResponse> {
    const startedAt = Date.now();

    const response = await this.axiosInstance.request<unknown>({
      method: 'GET',
      url,
      params: options.params,
      headers: options.headers,
      responseType: 'text',
      // Keep the body as text so non-JSON error pages can be surfaced verbatim
      transformResponse: [(data: unknown) => data],
      validateStatus: () => true,
    });

    const text =
      typeof response.data === 'string' ? response.data : JSON.stringify(response.data ?? '');

    logger.debug(`${this.apiName} request completed`, {
      apiName: this.apiName,
      method: 'GET',
      url,
      status: response.status,
      latencyMs: Date.now() - startedAt,
    });

    return { status: response.status, text, url };
  }

  /**
   * Classify a raw response and validate its body. Failures are logged once,
   * as a warning carrying the diagnostic message.
   */
  protected readPayload<S extends z.ZodTypeAny>(
    raw: RawResponse,
    schema: S,
    context: LogContext = {}
  ): PayloadResult<z.output<S>> {
    const result = readPayload(raw, schema);

    if (!result.ok) {
      logger.warn(result.failure.message, {
        ...context,
        apiName: this.apiName,
        url: raw.url,
        status: result.failure.status,
        kind: result.failure.kind,
        ...(result.failure.issues ? { issues: result.failure.issues } : {}),
      });
    }

    return result;
  }

  getAxiosInstance(): AxiosInstance {
    return this.axiosInstance;
  }

  private toTransportError(error: unknown): unknown {
    if (!axios.isAxiosError(error)) {
      return error;
    }

    const url = error.config?.url;

    if (
      error.code === 'ECONNABORTED' ||
      error.code === 'ETIMEDOUT' ||
      error.message.includes('timeout')
    ) {
      return new TimeoutError(`Request to ${this.apiName} timed out`, this.timeoutMs, {
        apiName: this.apiName,
        url,
      });
    }

    return new ApiError(
      `Network error: ${error.message}`,
      this.apiName,
      error.response?.status,
      undefined,
      { url, code: error.code }
    );
  }
}
