import type { JobStatus } from './types';

// Highest precedence first; input order never matters.
const STATUS_PRECEDENCE: readonly JobStatus[] = ['COMPLETED', 'RUNNING', 'FAILED'];

export function parseStatusTokens(statusString: string): string[] {
  return statusString
    .split('|')
    .map(token => token.trim())
    .filter(token => token.length > 0);
}

export function resolveStatus(tokens: readonly string[]): JobStatus {
  return STATUS_PRECEDENCE.find(candidate => tokens.includes(candidate)) ?? 'UNKNOWN';
}

export function statusCode(status: JobStatus): number {
  switch (status) {
    case 'COMPLETED':
      return 200;
    case 'RUNNING':
    case 'UNKNOWN':
      return 206;
    default:
      return 500;
  }
}
