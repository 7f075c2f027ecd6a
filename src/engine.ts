// Agent API Adapter
// Bridges a modern job API onto a legacy task API without ever throwing to the caller

import { CollaboratorError, ValidationError, describeError } from './errors';
import { safeAct } from './fallback';
import { LegacyResultSchema, formatIssues } from './legacy/schema';
import { defaultLogger } from './logger';
import { parseStatusTokens, resolveStatus, statusCode } from './status';
import {
  coerceAction,
  coercePriority,
  isPlainObject,
  normalizeJobId,
  normalizePayload,
  requireKeys
} from './validation';
import type {
  AdapterMetrics,
  JobResultData,
  LegacyCollaborator,
  LegacyParams,
  Logger,
  ModernResponse,
  StatusResultData,
  ValidationResult
} from './types';

export const REQUIRED_JOB_KEYS = ['id', 'type', 'priority'] as const;

export interface AgentApiAdapterOptions {
  logger?: Logger;
  now?: () => Date;
  name?: string;
}

type LogMethod = keyof Logger;

interface PreparedJob {
  jobId: string;
  params: LegacyParams;
}

export class AgentApiAdapter {
  private legacyApi: LegacyCollaborator;
  private logger: Logger;
  private now: () => Date;
  private name: string;
  private metrics: AdapterMetrics;

  constructor(legacyApi: LegacyCollaborator, options: AgentApiAdapterOptions = {}) {
    this.legacyApi = legacyApi;
    this.logger = options.logger ?? defaultLogger;
    this.now = options.now ?? (() => new Date());
    this.name = options.name ?? 'legacy-agent-api';

    this.metrics = {
      requestsTotal: 0,
      requestsSuccess: 0,
      requestsFailed: 0,
      avgResponseTime: 0,
      logFailures: 0
    };
  }

  /**
   * Execute a modern job through the legacy API.
   *
   * The returned promise always resolves. Validation, collaborator and
   * unexpected failures all come back as a `safeAct` response.
   */
  async run(job: unknown): Promise<ModernResponse<JobResultData>> {
    const startTime = this.now().getTime();
    const createdAt = this.now().toISOString();
    this.metrics.requestsTotal++;

    const response = await this.runJob(job, createdAt);

    if (response.success) {
      this.metrics.requestsSuccess++;
      const duration = this.now().getTime() - startTime;
      const successCount = this.metrics.requestsSuccess;
      this.metrics.avgResponseTime =
        (this.metrics.avgResponseTime * (successCount - 1) + duration) / successCount;
    } else {
      this.metrics.requestsFailed++;
    }

    return response;
  }

  /**
   * Query the legacy status of a job and collapse it to a single modern status.
   *
   * Errors are answered inline (400 for a bad job id, 500 otherwise) rather than
   * through `safeAct`.
   */
  async queryStatus(jobId: unknown): Promise<ModernResponse<StatusResultData>> {
    const createdAt = this.now().toISOString();
    const echoedId = typeof jobId === 'string' ? jobId : 'unknown';

    if (typeof jobId !== 'string' || !jobId.trim()) {
      const error = new ValidationError('job_id must be a non-empty string', ['job_id']);
      this.log('warn', `Validation failed for status query: ${error.message}`, { adapter: this.name });
      return this.statusError(400, echoedId, error.message, createdAt);
    }

    try {
      const legacyStatus = await this.legacyApi.getStatus(jobId.trim());
      const status = resolveStatus(parseStatusTokens(String(legacyStatus)));
      const success = status === 'COMPLETED';

      this.log('debug', 'Resolved legacy status', { adapter: this.name, jobId, status });

      return {
        success,
        code: statusCode(status),
        data: { job_id: jobId, status },
        created_at: createdAt,
        completed_at: this.now().toISOString()
      };
    } catch (error) {
      this.log('error', 'Unexpected error while querying status', {
        adapter: this.name,
        jobId,
        error: describeError(error)
      });
      return this.statusError(500, echoedId, describeError(error), createdAt);
    }
  }

  safeAct(job: unknown, errorMsg: string, createdAt?: string): ModernResponse<JobResultData> {
    return safeAct(job, errorMsg, createdAt, this.now);
  }

  getMetrics(): AdapterMetrics {
    return { ...this.metrics };
  }

  // Private methods

  private async runJob(job: unknown, createdAt: string): Promise<ModernResponse<JobResultData>> {
    try {
      const prepared = this.prepareJob(job);
      if (!prepared.ok) {
        this.log('warn', `Validation failed for job: ${prepared.error.message}`, {
          adapter: this.name,
          fields: prepared.error.fields
        });
        return this.safeAct(job, prepared.error.message, createdAt);
      }

      const { jobId, params } = prepared.value;
      const raw = await this.legacyApi.executeTask(jobId, params);
      const decoded = LegacyResultSchema.safeParse(raw);
      if (!decoded.success) {
        throw new CollaboratorError(`Malformed legacy result: ${formatIssues(decoded.error)}`, decoded.error);
      }

      const code = decoded.data.result_code ?? 500;
      this.log('info', `Legacy task executed: ${jobId}`, { adapter: this.name, action: params.action, code });

      return {
        success: code === 200,
        code,
        data: {
          job_id: jobId,
          result: decoded.data.output ?? '',
          // The legacy API reports no metrics.
          metrics: { duration_ms: 0, cpu_usage: 0 }
        },
        created_at: createdAt,
        completed_at: decoded.data.timestamp || this.now().toISOString()
      };
    } catch (error) {
      this.log('error', 'Unexpected error while running job', {
        adapter: this.name,
        error: describeError(error)
      });
      return this.safeAct(job, describeError(error), createdAt);
    }
  }

  private prepareJob(job: unknown): ValidationResult<PreparedJob> {
    if (!isPlainObject(job)) {
      return { ok: false, error: new ValidationError('job must be an object') };
    }

    const keys = requireKeys(job, REQUIRED_JOB_KEYS, 'job');
    if (!keys.ok) return keys;

    const jobId = normalizeJobId(job.id);
    if (!jobId.ok) return jobId;

    const action = coerceAction(job.type);
    if (!action.ok) return action;

    const priority = coercePriority(job.priority);
    if (!priority.ok) return priority;

    const payload = normalizePayload(job.payload);
    if (!payload.ok) return payload;

    return {
      ok: true,
      value: {
        jobId: jobId.value,
        params: { action: action.value, priority: priority.value, data: payload.value }
      }
    };
  }

  // The logger is a collaborator too: a failing sink must not cross the adapter boundary.
  private log(level: LogMethod, message: string, meta?: Record<string, unknown>): void {
    try {
      this.logger[level](message, meta);
    } catch {
      this.metrics.logFailures++;
    }
  }

  private statusError(
    code: number,
    jobId: string,
    message: string,
    createdAt: string
  ): ModernResponse<StatusResultData> {
    return {
      success: false,
      code,
      data: { job_id: jobId, status: 'UNKNOWN', error: message },
      created_at: createdAt,
      completed_at: this.now().toISOString()
    };
  }
}
