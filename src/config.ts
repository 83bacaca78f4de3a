/**
 * Environment configuration loader with Zod validation
 */

import { z } from 'zod';
import { LogLevelSchema } from './observability/logger.js';

/**
 * Configuration schema with validation rules
 */
export const ConfigSchema = z.object({
  agentName: z.string().min(1).default('architect'),
  host: z.string().min(1).default('localhost'),
  /** Overrides the preset port; required for agents that are not presets */
  port: z.number().int().min(1).max(65535).optional(),
  /** Defaults to the preset's model, or the agent name */
  model: z.string().min(1).optional(),
  apiKey: z.string().optional(),
  requestTimeoutMs: z.number().int().min(1).default(300000),
  maxIterations: z.number().int().min(1).default(5),
  maxRetries: z.number().int().min(1).default(3),
  retryBaseMs: z.number().int().min(0).default(1000),
  temperature: z.number().min(0).max(2).default(0.7),
  maxTokens: z.number().int().min(1).default(2048),
  stream: z.boolean().default(false),
  toolsDir: z.string().min(1).default('tools'),
  logLevel: LogLevelSchema.default('info'),
});

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Parse a boolean from environment variable string
 */
function parseBoolean(value: string | undefined, defaultValue: boolean): boolean {
  if (value === undefined || value === '') {
    return defaultValue;
  }
  return value.toLowerCase() === 'true' || value === '1';
}

/**
 * Parse an integer from environment variable string
 */
function parseInteger(value: string | undefined): number | undefined {
  if (value === undefined || value === '') {
    return undefined;
  }
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? undefined : parsed;
}

function parseNumber(value: string | undefined): number | undefined {
  if (value === undefined || value === '') {
    return undefined;
  }
  const parsed = parseFloat(value);
  return isNaN(parsed) ? undefined : parsed;
}

/**
 * Load configuration from environment variables
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const rawConfig: Record<string, unknown> = {
    agentName: env['AGENT_NAME'] || undefined,
    host: env['AGENT_HOST'] || undefined,
    port: parseInteger(env['AGENT_PORT']),
    model: env['AGENT_MODEL'] || undefined,
    apiKey: env['AGENT_API_KEY'] || undefined,
    requestTimeoutMs: parseInteger(env['AGENT_REQUEST_TIMEOUT_MS']),
    maxIterations: parseInteger(env['AGENT_MAX_ITERATIONS']),
    maxRetries: parseInteger(env['AGENT_MAX_RETRIES']),
    retryBaseMs: parseInteger(env['AGENT_RETRY_BASE_MS']),
    temperature: parseNumber(env['AGENT_TEMPERATURE']),
    maxTokens: parseInteger(env['AGENT_MAX_TOKENS']),
    stream: parseBoolean(env['AGENT_STREAM'], false),
    toolsDir: env['AGENT_TOOLS_DIR'] || undefined,
    logLevel: env['AGENT_LOG_LEVEL'] || undefined,
  };

  // Drop undefined values so schema defaults apply
  const configInput = Object.fromEntries(
    Object.entries(rawConfig).filter(([, v]) => v !== undefined)
  );

  return ConfigSchema.parse(configInput);
}

/**
 * Singleton config instance
 */
let config: Config | null = null;

/**
 * Get the current configuration (singleton)
 * Loads from environment on first call
 */
export function getConfig(): Config {
  if (!config) {
    config = loadConfig();
  }
  return config;
}

/**
 * Force reload configuration from environment
 */
export function reloadConfig(): Config {
  config = loadConfig();
  return config;
}

/**
 * Reset config singleton (for testing)
 */
export function resetConfig(): void {
  config = null;
}
