// Types for the Agent API Adapter

import type { ValidationError } from './errors';

export type MaybePromise<T> = T | Promise<T>;

export interface LegacyParams {
  action: string;
  priority: number;
  data: Record<string, unknown>;
}

export interface LegacyResult {
  status?: string;
  result_code?: number;
  output?: string;
  timestamp?: string;
}

/**
 * Capability set the adapter needs from a legacy system. Implementations may be
 * in-process or network-backed; both methods may answer synchronously.
 */
export interface LegacyCollaborator {
  executeTask(taskId: string, params: LegacyParams): MaybePromise<LegacyResult>;
  /** Pipe-delimited status tokens, e.g. `RUNNING|COMPLETED`. */
  getStatus(taskId: string): MaybePromise<string>;
}

export interface JobMetrics {
  duration_ms: number;
  cpu_usage: number;
}

export interface JobResultData {
  job_id: string;
  result: string;
  metrics: JobMetrics;
}

export type JobStatus = 'COMPLETED' | 'RUNNING' | 'FAILED' | 'UNKNOWN';

export interface StatusResultData {
  job_id: string;
  status: JobStatus;
  error?: string;
}

export interface ModernResponse<T = JobResultData | StatusResultData> {
  success: boolean;
  code: number;
  data: T;
  created_at: string;
  completed_at: string;
}

export type ValidationResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: ValidationError };

/** Input to the fallback path: a job-shaped mapping, or anything else. */
export type JobInput =
  | { kind: 'job'; job: Record<string, unknown> }
  | { kind: 'opaque'; value: unknown };

export type LegacyFormat = 'json' | 'xml';

export interface RetryPolicy {
  maxRetries: number;
  initialDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
}

export interface AdapterConfig {
  name: string;
  endpoint?: string;
  apiKey?: string;
  format: LegacyFormat;
  timeout: number;
  retryPolicy: RetryPolicy;
  logLevel: LogLevel;
  logJson: boolean;
}

export interface AdapterMetrics {
  requestsTotal: number;
  requestsSuccess: number;
  requestsFailed: number;
  avgResponseTime: number;
  /** Log calls whose sink threw. */
  logFailures: number;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface Logger {
  info: (message: string, meta?: Record<string, unknown>) => void;
  warn: (message: string, meta?: Record<string, unknown>) => void;
  error: (message: string, meta?: Record<string, unknown>) => void;
  debug: (message: string, meta?: Record<string, unknown>) => void;
}
