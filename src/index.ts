// Agent API Adapter - Main Entry Point

export * from './types';
export * from './errors';
export { AgentApiAdapter, REQUIRED_JOB_KEYS } from './engine';
export type { AgentApiAdapterOptions } from './engine';
export { safeAct, classifyJobInput, extractJobId, UNKNOWN_JOB_ID } from './fallback';
export {
  ACTION_TABLE,
  coerceAction,
  coercePriority,
  normalizeJobId,
  normalizePayload,
  requireKeys
} from './validation';
export { parseStatusTokens, resolveStatus, statusCode } from './status';
export { SimulatedLegacyApi, DEFAULT_STATUS_STRING } from './legacy/simulated';
export type { SimulatedLegacyOptions, SimulatedCall } from './legacy/simulated';
export { HttpLegacyApi, DEFAULT_RETRY_POLICY } from './legacy/http';
export type { HttpLegacyConfig } from './legacy/http';
export { loadAdapterConfig, createLegacyCollaborator, createAgentApiAdapter } from './config';
export { createLogger, defaultLogger } from './logger';
export type { LoggerOptions, LogSink } from './logger';
