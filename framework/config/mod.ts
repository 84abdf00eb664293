/**
 * Configuration & Environment Management
 *
 * Separates configuration from code: defaults, a JSON file,
 * then environment variables, later sources winning.
 */

export { Config, type ConfigOptions, loadConfig, configFromEnv } from './config.ts';
