/**
 * @file config/index.ts
 * @brief Runtime configuration read from the environment
 *
 * Variables:
 *   FHE_REF_LOG_LEVEL  debug | info | warn | error | silent   (default: warn)
 *   FHE_REF_FORMAT     text | json                            (default: text)
 *
 * Command-line flags take precedence over these values.
 */

import { isLogLevel, type LogLevel } from '../telemetry/logger';

export type OutputFormat = 'text' | 'json';

export interface ReferenceConfig {
  logLevel: LogLevel;
  outputFormat: OutputFormat;
}

export interface ConfigLoadResult {
  config: ReferenceConfig;
  /** Values that were present but rejected; defaults were used instead */
  warnings: string[];
}

export const DEFAULT_CONFIG: Readonly<ReferenceConfig> = Object.freeze({
  logLevel: 'warn',
  outputFormat: 'text',
});

export function isOutputFormat(value: string): value is OutputFormat {
  return value === 'text' || value === 'json';
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ConfigLoadResult {
  const config: ReferenceConfig = { ...DEFAULT_CONFIG };
  const warnings: string[] = [];

  const level = env['FHE_REF_LOG_LEVEL']?.trim().toLowerCase();
  if (level !== undefined && level !== '') {
    if (isLogLevel(level)) {
      config.logLevel = level;
    } else {
      warnings.push(`Ignoring FHE_REF_LOG_LEVEL=${level} (expected debug, info, warn, error or silent)`);
    }
  }

  const format = env['FHE_REF_FORMAT']?.trim().toLowerCase();
  if (format !== undefined && format !== '') {
    if (isOutputFormat(format)) {
      config.outputFormat = format;
    } else {
      warnings.push(`Ignoring FHE_REF_FORMAT=${format} (expected text or json)`);
    }
  }

  return { config, warnings };
}
