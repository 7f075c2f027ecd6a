import { z } from 'zod';
import { AgentApiAdapter, type AgentApiAdapterOptions } from './engine';
import { ConfigError } from './errors';
import { DEFAULT_RETRY_POLICY, HttpLegacyApi } from './legacy/http';
import { SimulatedLegacyApi } from './legacy/simulated';
import { createLogger } from './logger';
import type { AdapterConfig, LegacyCollaborator, Logger } from './types';

const EnvSchema = z.object({
  LEGACY_ADAPTER_NAME: z.string().min(1).default('legacy-agent-api'),
  LEGACY_API_ENDPOINT: z.string().url().optional(),
  LEGACY_API_KEY: z.string().min(1).optional(),
  LEGACY_API_FORMAT: z.enum(['json', 'xml']).default('json'),
  LEGACY_API_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  LEGACY_API_MAX_RETRIES: z.coerce.number().int().min(0).default(DEFAULT_RETRY_POLICY.maxRetries),
  LEGACY_API_RETRY_DELAY_MS: z.coerce.number().int().min(0).default(DEFAULT_RETRY_POLICY.initialDelayMs),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
  LOG_JSON: z.enum(['true', 'false', '1', '0']).default('false')
});

/**
 * Read adapter settings from the environment. Blank variables count as unset.
 */
export function loadAdapterConfig(env: NodeJS.ProcessEnv = process.env): AdapterConfig {
  const present: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      present[key] = value.trim();
    }
  }

  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid adapter configuration: ${issues.join('; ')}`, issues);
  }

  const vars = parsed.data;
  return {
    name: vars.LEGACY_ADAPTER_NAME,
    endpoint: vars.LEGACY_API_ENDPOINT,
    apiKey: vars.LEGACY_API_KEY,
    format: vars.LEGACY_API_FORMAT,
    timeout: vars.LEGACY_API_TIMEOUT_MS,
    retryPolicy: {
      ...DEFAULT_RETRY_POLICY,
      maxRetries: vars.LEGACY_API_MAX_RETRIES,
      initialDelayMs: vars.LEGACY_API_RETRY_DELAY_MS
    },
    logLevel: vars.LOG_LEVEL,
    logJson: vars.LOG_JSON === 'true' || vars.LOG_JSON === '1'
  };
}

export function createLegacyCollaborator(config: AdapterConfig, logger: Logger): LegacyCollaborator {
  if (config.endpoint) {
    logger.info(`Using HTTP legacy API at ${config.endpoint}`, { format: config.format });
    return new HttpLegacyApi(
      {
        endpoint: config.endpoint,
        apiKey: config.apiKey,
        format: config.format,
        timeout: config.timeout,
        retryPolicy: config.retryPolicy
      },
      logger
    );
  }

  logger.info('No legacy endpoint configured, using simulated legacy API');
  return new SimulatedLegacyApi();
}

export function createAgentApiAdapter(
  config: AdapterConfig = loadAdapterConfig(),
  options: AgentApiAdapterOptions = {}
): AgentApiAdapter {
  const logger =
    options.logger ??
    createLogger({ component: config.name, level: config.logLevel, json: config.logJson });

  return new AgentApiAdapter(createLegacyCollaborator(config, logger), {
    ...options,
    logger,
    name: options.name ?? config.name
  });
}
