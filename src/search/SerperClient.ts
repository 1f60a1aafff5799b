import { setTimeout as delay } from 'node:timers/promises';

import nodeFetch, { RequestInit, Response } from 'node-fetch';
import { z } from 'zod';

import { appConfig } from '../config.js';
import { RequestError, SearchPhase } from '../errors.js';
import { ExecutionSession } from '../pipeline/ExecutionSession.js';
import { logger } from '../utils/logger.js';

export type SerperEndpoint = 'search' | 'maps' | 'autocomplete';

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export interface SerperClientOptions {
  apiKey?: string;
  baseUrl?: string;
  timeoutMs?: number;
  retryLimit?: number;
  retryDelayMs?: number;
  fetchImpl?: FetchLike;
}

export interface SerperRequest<Schema extends z.ZodTypeAny> {
  endpoint: SerperEndpoint;
  payload: Record<string, string | number>;
  schema: Schema;
  session: ExecutionSession;
  phase: SearchPhase;
  query: string;
}

const DEFAULT_BASE_URL = 'https://google.serper.dev';

class RetryableFailure extends Error {
  constructor(message: string, readonly status?: number, options?: { cause?: unknown }) {
    super(message, options);
  }
}

function isRetryableStatus(status: number): boolean {
  return status === 429 || status >= 500;
}

export class SerperClient {
  private apiKey: string;
  private baseUrl: string;
  private timeoutMs: number;
  private retryLimit: number;
  private retryDelayMs: number;
  private fetchImpl: FetchLike;

  constructor(options: SerperClientOptions = {}) {
    this.apiKey = options.apiKey ?? appConfig.serperApiKey ?? '';
    this.baseUrl = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/$/, '');
    this.timeoutMs = options.timeoutMs ?? appConfig.requestTimeoutMs;
    this.retryLimit = Math.max(0, options.retryLimit ?? appConfig.retryLimit);
    this.retryDelayMs = Math.max(0, options.retryDelayMs ?? appConfig.retryDelayMs);
    this.fetchImpl = options.fetchImpl ?? nodeFetch;
  }

  isConfigured(): boolean {
    return this.apiKey.length > 0;
  }

  /**
   * Sends one request, retrying network failures, timeouts, 429 and 5xx
   * responses up to `retryLimit` extra times with linear backoff.
   */
  async post<Schema extends z.ZodTypeAny>(request: SerperRequest<Schema>): Promise<z.output<Schema>> {
    const maxAttempts = this.retryLimit + 1;
    let lastFailure: RetryableFailure | undefined;

    for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
      if (attempt > 1) {
        const wait = this.retryDelayMs * (attempt - 1);
        logger.debug(`Retrying ${request.endpoint} request (attempt ${attempt}/${maxAttempts}) in ${wait}ms.`);
        if (wait > 0) {
          await delay(wait);
        }
      }

      let response: Response;
      try {
        response = await this.send(request.endpoint, request.payload);
      } catch (error) {
        lastFailure = new RetryableFailure(
          error instanceof Error && error.name === 'AbortError'
            ? `Request timed out after ${this.timeoutMs}ms`
            : `Network error: ${error instanceof Error ? error.message : String(error)}`,
          undefined,
          { cause: error }
        );
        continue;
      }

      request.session.recordCall();

      if (!response.ok) {
        const message = `Serper ${request.endpoint} returned ${response.status} ${response.statusText}`.trim();
        if (isRetryableStatus(response.status)) {
          lastFailure = new RetryableFailure(message, response.status);
          continue;
        }
        throw new RequestError(message, {
          phase: request.phase,
          query: request.query,
          status: response.status,
          attempts: attempt
        });
      }

      let body: unknown;
      try {
        body = await response.json();
      } catch (error) {
        throw new RequestError(`Serper ${request.endpoint} returned a body that is not JSON`, {
          phase: request.phase,
          query: request.query,
          status: response.status,
          attempts: attempt,
          cause: error
        });
      }

      const parsed = request.schema.safeParse(body);
      if (!parsed.success) {
        throw new RequestError(`Serper ${request.endpoint} returned an unexpected payload`, {
          phase: request.phase,
          query: request.query,
          status: response.status,
          attempts: attempt,
          cause: parsed.error
        });
      }
      return parsed.data;
    }

    throw new RequestError(lastFailure?.message ?? 'Request failed', {
      phase: request.phase,
      query: request.query,
      ...(lastFailure?.status !== undefined ? { status: lastFailure.status } : {}),
      attempts: maxAttempts,
      cause: lastFailure?.cause
    });
  }

  private async send(endpoint: SerperEndpoint, payload: Record<string, string | number>): Promise<Response> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);
    try {
      return await this.fetchImpl(`${this.baseUrl}/${endpoint}`, {
        method: 'POST',
        headers: {
          'X-API-KEY': this.apiKey,
          'Content-Type': 'application/json'
        },
        body: JSON.stringify(payload),
        signal: controller.signal
      });
    } finally {
      clearTimeout(timer);
    }
  }
}

export function createSerperClient(): SerperClient {
  return new SerperClient({
    apiKey: appConfig.serperApiKey,
    timeoutMs: appConfig.requestTimeoutMs,
    retryLimit: appConfig.retryLimit,
    retryDelayMs: appConfig.retryDelayMs
  });
}
