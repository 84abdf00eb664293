/**
 * Configuration Management
 *
 * Loads and manages application configuration from multiple sources:
 * built-in defaults, then `config/app.json`, then environment variables.
 */

import { readFile } from 'node:fs/promises';
import type { LogFormat, LogLevel } from '../telemetry/logger.ts';
import { isLogLevel } from '../telemetry/logger.ts';

export interface ConfigOptions {
  port?: number;
  host?: string;
  env?: string;
  logLevel?: LogLevel;
  logFormat?: LogFormat;
  telemetry?: {
    enabled?: boolean;
    serviceName?: string;
    exporter?: 'console' | 'none';
  };
  tasks?: {
    drainTimeout?: number;
  };
  [key: string]: unknown;
}

const DEFAULT_CONFIG: ConfigOptions = {
  port: 8000,
  host: '0.0.0.0',
  env: 'development',
  telemetry: {
    enabled: false,
    serviceName: 'background-tasks-demo',
    exporter: 'console',
  },
  tasks: {
    drainTimeout: 15000,
  },
};

const DEFAULT_CONFIG_PATH = './config/app.json';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Configuration manager
 */
export class Config {
  private config: Record<string, unknown>;

  constructor(options: ConfigOptions = {}) {
    this.config = this.mergeConfig(DEFAULT_CONFIG, options);
  }

  /**
   * Deep-merge values over the current configuration
   */
  merge(values: Record<string, unknown>): this {
    this.config = this.mergeConfig(this.config, values);
    return this;
  }

  /**
   * Get a configuration value by dotted path
   */
  get(key: string): unknown {
    return this.getNestedValue(this.config, key);
  }

  /**
   * Get a number, falling back when the value is missing or not a number
   */
  getNumber(key: string, defaultValue: number): number {
    const value = this.get(key);
    return typeof value === 'number' && Number.isFinite(value) ? value : defaultValue;
  }

  /**
   * Get a string, falling back when the value is missing or not a string
   */
  getString(key: string, defaultValue: string): string {
    const value = this.get(key);
    return typeof value === 'string' ? value : defaultValue;
  }

  /**
   * Get a boolean, falling back when the value is missing or not a boolean
   */
  getBoolean(key: string, defaultValue: boolean): boolean {
    const value = this.get(key);
    return typeof value === 'boolean' ? value : defaultValue;
  }

  /**
   * Set a configuration value
   */
  set(key: string, value: unknown): void {
    this.setNestedValue(this.config, key, value);
  }

  /**
   * Check if a configuration key exists
   */
  has(key: string): boolean {
    return this.getNestedValue(this.config, key) !== undefined;
  }

  /**
   * Get all configuration
   */
  all(): Record<string, unknown> {
    return { ...this.config };
  }

  /**
   * Merge configurations
   */
  private mergeConfig(
    base: Record<string, unknown>,
    override: Record<string, unknown>
  ): Record<string, unknown> {
    const result: Record<string, unknown> = { ...base };

    for (const [key, value] of Object.entries(override)) {
      if (value === undefined) continue;

      const existing = base[key];
      if (isRecord(value)) {
        result[key] = this.mergeConfig(isRecord(existing) ? existing : {}, value);
      } else {
        result[key] = value;
      }
    }

    return result;
  }

  /**
   * Get nested value by path
   */
  private getNestedValue(obj: Record<string, unknown>, path: string): unknown {
    return path.split('.').reduce<unknown>((current, key) => {
      return isRecord(current) ? current[key] : undefined;
    }, obj);
  }

  /**
   * Set nested value by path
   */
  private setNestedValue(obj: Record<string, unknown>, path: string, value: unknown): void {
    const parts = path.split('.');
    const last = parts.pop();
    if (last === undefined) return;

    let current = obj;
    for (const part of parts) {
      const next = current[part];
      if (isRecord(next)) {
        current = next;
      } else {
        const created: Record<string, unknown> = {};
        current[part] = created;
        current = created;
      }
    }

    current[last] = value;
  }
}

function parseInteger(name: string, value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new Error(`Environment variable ${name} must be an integer, got "${value}"`);
  }
  return parsed;
}

/**
 * Read environment overrides
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): ConfigOptions {
  const overrides: ConfigOptions = {};

  if (env.PORT) overrides.port = parseInteger('PORT', env.PORT);
  if (env.HOST) overrides.host = env.HOST;
  if (env.NODE_ENV) overrides.env = env.NODE_ENV;
  if (isLogLevel(env.LOG_LEVEL)) overrides.logLevel = env.LOG_LEVEL;
  if (env.LOG_FORMAT === 'json' || env.LOG_FORMAT === 'pretty') overrides.logFormat = env.LOG_FORMAT;

  const telemetry: NonNullable<ConfigOptions['telemetry']> = {};
  if (env.OTEL_ENABLED) telemetry.enabled = env.OTEL_ENABLED === 'true';
  if (env.OTEL_SERVICE_NAME) telemetry.serviceName = env.OTEL_SERVICE_NAME;
  if (Object.keys(telemetry).length > 0) overrides.telemetry = telemetry;

  if (env.TASK_DRAIN_TIMEOUT) {
    overrides.tasks = { drainTimeout: parseInteger('TASK_DRAIN_TIMEOUT', env.TASK_DRAIN_TIMEOUT) };
  }

  return overrides;
}

/**
 * Load configuration from a JSON file and the environment.
 * A missing file falls back to defaults; a file that is not valid JSON is an error.
 */
export async function loadConfig(
  configPath: string = DEFAULT_CONFIG_PATH,
  env: NodeJS.ProcessEnv = process.env,
): Promise<Config> {
  const config = new Config();

  let content: string | null = null;
  try {
    content = await readFile(configPath, 'utf8');
  } catch (error) {
    if (!(error instanceof Error && 'code' in error && error.code === 'ENOENT')) {
      throw error;
    }
  }

  if (content !== null) {
    const parsed: unknown = JSON.parse(content);
    if (!isRecord(parsed)) {
      throw new Error(`Config file ${configPath} must contain a JSON object`);
    }
    config.merge(parsed);
  }

  return config.merge(configFromEnv(env));
}
