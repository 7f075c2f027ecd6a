// Network-backed legacy collaborator

import axios, { AxiosAdapter, AxiosInstance } from 'axios';
import { parseStringPromise } from 'xml2js';
import { CollaboratorError, describeError } from '../errors';
import { LegacyResultSchema, LegacyStatusSchema, formatIssues } from './schema';
import type {
  LegacyCollaborator,
  LegacyFormat,
  LegacyParams,
  LegacyResult,
  Logger,
  RetryPolicy
} from '../types';

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxRetries: 3,
  initialDelayMs: 1000,
  maxDelayMs: 10000,
  backoffMultiplier: 2
};

export interface HttpLegacyConfig {
  endpoint: string;
  apiKey?: string;
  format?: LegacyFormat;
  timeout?: number;
  retryPolicy?: RetryPolicy;
  /** Replaces axios' network transport; used to run the client in-process. */
  transport?: AxiosAdapter;
}

export class HttpLegacyApi implements LegacyCollaborator {
  private httpClient: AxiosInstance;
  private logger: Logger;
  private retryPolicy: RetryPolicy;

  constructor(config: HttpLegacyConfig, logger: Logger) {
    this.logger = logger;
    this.retryPolicy = config.retryPolicy ?? DEFAULT_RETRY_POLICY;

    const headers: Record<string, string> = {
      'Accept': this.getAcceptHeader(config.format ?? 'json')
    };
    if (config.apiKey) {
      headers['X-Api-Key'] = config.apiKey;
    }

    this.httpClient = axios.create({
      baseURL: config.endpoint,
      timeout: config.timeout ?? 30000,
      headers,
      adapter: config.transport
    });
  }

  async executeTask(taskId: string, params: LegacyParams): Promise<LegacyResult> {
    const body = await this.fetchBody('post', `/tasks/${encodeURIComponent(taskId)}/execute`, params);

    const parsed = LegacyResultSchema.safeParse(body);
    if (!parsed.success) {
      throw new CollaboratorError(`Malformed legacy result: ${formatIssues(parsed.error)}`, parsed.error);
    }

    const { status, result_code, output, timestamp } = parsed.data;
    return {
      status: status ?? undefined,
      result_code: result_code ?? undefined,
      output: output ?? undefined,
      timestamp: timestamp ?? undefined
    };
  }

  async getStatus(taskId: string): Promise<string> {
    const body = await this.fetchBody('get', `/tasks/${encodeURIComponent(taskId)}/status`);

    const parsed = LegacyStatusSchema.safeParse(body);
    if (!parsed.success) {
      throw new CollaboratorError(`Malformed legacy status: ${formatIssues(parsed.error)}`, parsed.error);
    }
    return parsed.data;
  }

  // Only transport failures are retried; an undecodable body fails on the first response.
  private async fetchBody(method: 'get' | 'post', url: string, data?: unknown): Promise<unknown> {
    const raw = await this.requestWithRetry(method, url, data);
    try {
      return await this.decodeBody(raw);
    } catch (error) {
      throw new CollaboratorError(`Malformed legacy body from ${url}: ${describeError(error)}`, error);
    }
  }

  private async requestWithRetry(method: 'get' | 'post', url: string, data?: unknown): Promise<unknown> {
    let lastError: unknown = null;
    let delay = this.retryPolicy.initialDelayMs;

    for (let attempt = 0; attempt <= this.retryPolicy.maxRetries; attempt++) {
      try {
        const response = await this.httpClient.request({ method, url, data });
        return response.data;
      } catch (error) {
        lastError = error;

        if (attempt < this.retryPolicy.maxRetries) {
          this.logger.warn(`Retry attempt ${attempt + 1}`, {
            url,
            error: describeError(error),
            delay
          });
          await this.sleep(delay);
          delay = Math.min(delay * this.retryPolicy.backoffMultiplier, this.retryPolicy.maxDelayMs);
        }
      }
    }

    throw new CollaboratorError(
      `Legacy request ${method.toUpperCase()} ${url} failed: ${describeError(lastError)}`,
      lastError
    );
  }

  private async decodeBody(data: unknown): Promise<unknown> {
    if (typeof data !== 'string') {
      return data;
    }

    const text = data.trim();
    if (!text.startsWith('<')) {
      return text;
    }

    const document: unknown = await parseStringPromise(text, { explicitArray: false });
    return this.unwrapRoot(document);
  }

  // <result><output>..</output></result> parses to { result: {...} }
  private unwrapRoot(document: unknown): unknown {
    if (typeof document !== 'object' || document === null) {
      return document;
    }
    const entries = Object.entries(document);
    if (entries.length === 1) {
      const inner = entries[0][1];
      if (typeof inner === 'object' && inner !== null && !Array.isArray(inner)) {
        return inner;
      }
    }
    return document;
  }

  private getAcceptHeader(format: LegacyFormat): string {
    switch (format) {
      case 'xml':
        return 'application/xml, text/xml';
      default:
        return 'application/json';
    }
  }

  private sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
  }
}
