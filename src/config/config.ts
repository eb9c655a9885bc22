/**
 * Config Loader
 *
 * Loads config/minutes.json with {env:VAR} resolution.
 * Supports MINUTES_CONFIG env var to override config path.
 */

import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { type Config, configSchema } from './schema';

const DEFAULT_CONFIG_PATH = 'config/minutes.json';

/**
 * Resolve {env:VAR} patterns in text.
 * Returns empty string if env var is not set.
 */
export function resolveEnvVars(text: string, env: NodeJS.ProcessEnv = process.env): string {
  return text.replace(/\{env:([A-Z_][A-Z0-9_]*)\}/g, (_, varName: string) => {
    return env[varName] ?? '';
  });
}

export type ConfigParseResult =
  | { success: true; config: Config }
  | { success: false; errors: string[] };

/**
 * Parse raw config text (env vars already resolved or not) into a validated Config.
 * Issues are rendered as `path: message`.
 */
export function parseConfig(text: string, env: NodeJS.ProcessEnv = process.env): ConfigParseResult {
  let data: unknown;
  try {
    data = JSON.parse(resolveEnvVars(text, env));
  } catch {
    return { success: false, errors: ['Invalid JSON'] };
  }

  const result = configSchema.safeParse(data);
  if (!result.success) {
    return {
      success: false,
      errors: result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    };
  }

  return { success: true, config: result.data };
}

/**
 * Load and validate config from file.
 */
function loadConfig(configPath: string): Config {
  let text: string;
  try {
    text = readFileSync(configPath, 'utf-8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      console.error(`Config file not found: ${configPath}`);
      console.error('Copy config/minutes.example.json to config/minutes.json and configure it.');
      process.exit(1);
    }
    throw err;
  }

  const result = parseConfig(text);
  if (!result.success) {
    console.error(`Invalid config: ${configPath}`);
    for (const error of result.errors) {
      console.error(`  ${error}`);
    }
    process.exit(1);
  }

  return result.config;
}

// Lazy load and cache
let cachedConfig: Config | null = null;

export function getConfig(): Config {
  if (!cachedConfig) {
    const configPath = process.env['MINUTES_CONFIG'] ?? resolve(process.cwd(), DEFAULT_CONFIG_PATH);
    cachedConfig = loadConfig(configPath);
  }
  return cachedConfig;
}

/**
 * Get display name for the LLM provider.
 * For openai-compatible providers, returns the configured providerName.
 */
export function getLLMDisplayName(config: Config): string | null {
  if (!config.llm) return null;
  if (config.llm.provider === 'openai-compatible') {
    return config.llm.providerName ?? 'OpenAI-compatible';
  }
  return config.llm.provider.charAt(0).toUpperCase() + config.llm.provider.slice(1);
}
