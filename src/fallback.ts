// Fallback responder: always yields a well-formed modern error response

import { isPlainObject } from './validation';
import type { JobInput, JobResultData, ModernResponse } from './types';

export const UNKNOWN_JOB_ID = 'unknown';

export function classifyJobInput(value: unknown): JobInput {
  if (isPlainObject(value)) {
    return { kind: 'job', job: value };
  }
  return { kind: 'opaque', value };
}

function readJobId(job: Record<string, unknown>): string {
  const id = job.id;
  if (typeof id === 'string') {
    return id.trim() || UNKNOWN_JOB_ID;
  }
  if (typeof id === 'number' && Number.isFinite(id) && id !== 0) {
    return String(id);
  }
  return UNKNOWN_JOB_ID;
}

export function extractJobId(input: JobInput): string {
  switch (input.kind) {
    case 'job':
      return readJobId(input.job);
    case 'opaque':
      return UNKNOWN_JOB_ID;
  }
}

export function safeAct(
  job: unknown,
  errorMsg: string,
  createdAt?: string,
  now: () => Date = () => new Date()
): ModernResponse<JobResultData> {
  // A throwing getter or revoked proxy must not escape the fallback path.
  let jobId: string;
  try {
    jobId = extractJobId(classifyJobInput(job));
  } catch {
    jobId = UNKNOWN_JOB_ID;
  }

  return {
    success: false,
    code: 500,
    data: {
      job_id: jobId,
      result: `Error: ${errorMsg}`,
      metrics: { duration_ms: 0, cpu_usage: 0 }
    },
    created_at: createdAt || now().toISOString(),
    completed_at: now().toISOString()
  };
}
