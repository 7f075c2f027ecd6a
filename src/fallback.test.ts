import { describe, expect, it } from 'vitest';
import { classifyJobInput, extractJobId, safeAct } from './fallback';

const fixedNow = () => new Date('2026-03-01T10:00:00.000Z');

describe('safeAct', () => {
  it('builds a standardized error response', () => {
    const response = safeAct({ id: ' job7 ' }, 'boom', '2026-03-01T09:59:59.000Z', fixedNow);
    expect(response).toEqual({
      success: false,
      code: 500,
      data: {
        job_id: 'job7',
        result: 'Error: boom',
        metrics: { duration_ms: 0, cpu_usage: 0 }
      },
      created_at: '2026-03-01T09:59:59.000Z',
      completed_at: '2026-03-01T10:00:00.000Z'
    });
  });

  it('uses the current time when no created_at is supplied', () => {
    const response = safeAct({}, 'missing', undefined, fixedNow);
    expect(response.created_at).toBe('2026-03-01T10:00:00.000Z');
    expect(response.data.job_id).toBe('unknown');
  });

  it.each([[null], [undefined], ['job1'], [42], [['job1']], [{ id: '' }], [{ id: '   ' }], [{ id: 0 }], [{ id: {} }]])(
    'falls back to an unknown job id for %p',
    (job) => {
      expect(safeAct(job, 'bad', undefined, fixedNow).data.job_id).toBe('unknown');
    }
  );

  it('stringifies numeric ids', () => {
    expect(safeAct({ id: 17 }, 'bad', undefined, fixedNow).data.job_id).toBe('17');
  });

  it('survives a job whose id getter throws', () => {
    const hostile = Object.defineProperty({}, 'id', {
      enumerable: true,
      get() {
        throw new Error('no access');
      }
    });
    const response = safeAct(hostile, 'bad', undefined, fixedNow);
    expect(response.success).toBe(false);
    expect(response.data.job_id).toBe('unknown');
  });

  it('survives a revoked proxy', () => {
    const { proxy, revoke } = Proxy.revocable({ id: 'job1' }, {});
    revoke();
    expect(safeAct(proxy, 'bad', undefined, fixedNow).data.job_id).toBe('unknown');
  });
});

describe('classifyJobInput', () => {
  it('separates job-shaped mappings from opaque values', () => {
    expect(classifyJobInput({ id: 'x' })).toEqual({ kind: 'job', job: { id: 'x' } });
    expect(classifyJobInput([1])).toEqual({ kind: 'opaque', value: [1] });
    expect(extractJobId({ kind: 'opaque', value: { id: 'x' } })).toBe('unknown');
  });
});
