import { describe, expect, it } from 'vitest';
import { createLogger, type LogSink } from './logger';

const fixedNow = () => new Date('2026-03-01T10:00:00.000Z');

function capture() {
  const lines: Array<[string, string]> = [];
  const sink: LogSink = (level, line) => {
    lines.push([level, line]);
  };
  return { lines, sink };
}

describe('createLogger', () => {
  it('writes text lines with level, component and metadata', () => {
    const { lines, sink } = capture();
    const logger = createLogger({ component: 'adapter-test', sink, now: fixedNow });

    logger.info('hello', { a: 1 });
    logger.error('failed');

    expect(lines).toEqual([
      ['info', '[2026-03-01T10:00:00.000Z] [INFO ] [adapter-test] hello {"a":1}'],
      ['error', '[2026-03-01T10:00:00.000Z] [ERROR] [adapter-test] failed']
    ]);
  });

  it('drops entries below the minimum level', () => {
    const { lines, sink } = capture();
    const logger = createLogger({ level: 'warn', sink, now: fixedNow });

    logger.debug('d');
    logger.info('i');
    logger.warn('w');

    expect(lines).toEqual([['warn', '[2026-03-01T10:00:00.000Z] [WARN ] [agent-api-adapter] w']]);
  });

  it('writes one JSON object per line in json mode', () => {
    const { lines, sink } = capture();
    const logger = createLogger({ component: 'c', json: true, sink, now: fixedNow });

    logger.error('bad', { code: 500 });

    expect(lines).toEqual([
      ['error', '{"ts":"2026-03-01T10:00:00.000Z","level":"error","component":"c","msg":"bad","meta":{"code":500}}']
    ]);
  });

  it('emits nothing when silent', () => {
    const { lines, sink } = capture();
    const logger = createLogger({ level: 'silent', sink });

    logger.error('ignored');

    expect(lines).toEqual([]);
  });
});
