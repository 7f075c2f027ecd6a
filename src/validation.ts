// Field validators and coercers for modern jobs

import { z } from 'zod';
import { ValidationError } from './errors';
import type { ValidationResult } from './types';

export const ACTION_TABLE: Readonly<Record<string, string>> = {
  data_processing: 'process_data',
  classification: 'classify',
  summarization: 'summarize',
  ingestion: 'ingest'
};

export const MIN_PRIORITY = 1;
export const MAX_PRIORITY = 5;

const INTEGER_PATTERN = /^[+-]?\d+$/;

const PayloadObjectSchema = z.record(z.unknown());

function ok<T>(value: T): ValidationResult<T> {
  return { ok: true, value };
}

function fail<T>(message: string, fields: string[] = []): ValidationResult<T> {
  return { ok: false, error: new ValidationError(message, fields) };
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Checks that every key is present, reporting all missing keys at once.
 */
export function requireKeys(
  mapping: Record<string, unknown>,
  keys: readonly string[],
  context: string
): ValidationResult<Record<string, unknown>> {
  const missing = keys.filter(key => !Object.prototype.hasOwnProperty.call(mapping, key));
  if (missing.length > 0) {
    return fail(`Missing required keys in ${context}: ${missing.join(', ')}`, missing);
  }
  return ok(mapping);
}

export function normalizeJobId(value: unknown): ValidationResult<string> {
  let id = '';
  if (typeof value === 'string') {
    id = value.trim();
  } else if (typeof value === 'number' && Number.isFinite(value)) {
    id = String(value);
  }
  if (!id) {
    return fail('job.id must be a non-empty string', ['id']);
  }
  return ok(id);
}

/**
 * Coerces an integer or integer-like string to a priority, saturating at 1..5.
 * Booleans are rejected even though they are integer-like.
 */
export function coercePriority(value: unknown): ValidationResult<number> {
  if (typeof value === 'boolean') {
    return fail('Priority must be an integer 1..5, not boolean', ['priority']);
  }

  let parsed: number;
  if (typeof value === 'number' && Number.isFinite(value)) {
    parsed = Math.trunc(value);
  } else if (typeof value === 'string' && INTEGER_PATTERN.test(value.trim())) {
    parsed = Number.parseInt(value.trim(), 10);
  } else {
    return fail('Priority must be an integer 1..5', ['priority']);
  }

  return ok(Math.max(MIN_PRIORITY, Math.min(MAX_PRIORITY, parsed)));
}

/**
 * Maps a modern job type to a legacy action. Unknown types pass through as-is.
 */
export function coerceAction(jobType: unknown): ValidationResult<string> {
  if (typeof jobType !== 'string' || !jobType.trim()) {
    return fail('job.type must be a non-empty string', ['type']);
  }
  const action = Object.prototype.hasOwnProperty.call(ACTION_TABLE, jobType)
    ? ACTION_TABLE[jobType]
    : jobType;
  return ok(action);
}

export function normalizePayload(payload: unknown): ValidationResult<Record<string, unknown>> {
  if (payload === null || payload === undefined) {
    return ok({});
  }
  if (isPlainObject(payload)) {
    return ok(payload);
  }
  if (typeof payload !== 'string') {
    return fail('payload must be an object or JSON string', ['payload']);
  }

  const text = payload.trim();
  if (!text) {
    return ok({});
  }

  let decoded: unknown;
  try {
    decoded = JSON.parse(text);
  } catch {
    return fail('payload string must be valid JSON object', ['payload']);
  }

  const parsed = PayloadObjectSchema.safeParse(decoded);
  if (!parsed.success) {
    return fail('payload JSON must decode to an object', ['payload']);
  }
  return ok(parsed.data);
}
