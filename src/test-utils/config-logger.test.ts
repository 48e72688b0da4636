/**
 * Tests for environment configuration and the leveled logger
 */

import { describe, it, expect } from 'vitest';
import { DEFAULT_CONFIG, loadConfig } from '../config';
import { createLogger, isLogLevel, silentLogger, type LogLevel } from '../telemetry/logger';

describe('Configuration', () => {
  it('should use defaults when nothing is set', () => {
    expect(loadConfig({})).toEqual({ config: DEFAULT_CONFIG, warnings: [] });
    expect(DEFAULT_CONFIG).toEqual({ logLevel: 'warn', outputFormat: 'text' });
  });

  it('should read and normalize environment values', () => {
    const { config, warnings } = loadConfig({ FHE_REF_LOG_LEVEL: ' DEBUG ', FHE_REF_FORMAT: 'json' });
    expect(config).toEqual({ logLevel: 'debug', outputFormat: 'json' });
    expect(warnings).toEqual([]);
  });

  it('should fall back to defaults with a warning for invalid values', () => {
    const { config, warnings } = loadConfig({ FHE_REF_LOG_LEVEL: 'loud', FHE_REF_FORMAT: 'xml' });
    expect(config).toEqual(DEFAULT_CONFIG);
    expect(warnings).toEqual([
      'Ignoring FHE_REF_LOG_LEVEL=loud (expected debug, info, warn, error or silent)',
      'Ignoring FHE_REF_FORMAT=xml (expected text or json)',
    ]);
  });

  it('should treat empty values as unset', () => {
    expect(loadConfig({ FHE_REF_LOG_LEVEL: '', FHE_REF_FORMAT: '  ' }).warnings).toEqual([]);
  });
});

describe('Logger', () => {
  function capture(level: LogLevel): { lines: [string, string][]; log: ReturnType<typeof createLogger> } {
    const lines: [string, string][] = [];
    const log = createLogger(level, (at, line) => {
      lines.push([at, line]);
    });
    return { lines, log };
  }

  it('should drop messages below its level', () => {
    const { lines, log } = capture('warn');
    log.debug('hidden');
    log.info('hidden');
    log.warn('shown');
    log.error('also shown');
    expect(lines).toEqual([
      ['warn', '[fhe-ref] warn: shown'],
      ['error', '[fhe-ref] error: also shown'],
    ]);
  });

  it('should emit everything at debug', () => {
    const { lines, log } = capture('debug');
    log.debug('a');
    log.info('b');
    expect(lines.map(([at]) => at)).toEqual(['debug', 'info']);
  });

  it('should emit nothing when silent', () => {
    const { lines, log } = capture('silent');
    log.error('nothing');
    expect(lines).toEqual([]);
    expect(silentLogger.level).toBe('silent');
  });

  it('should recognize log levels', () => {
    expect(isLogLevel('info')).toBe(true);
    expect(isLogLevel('trace')).toBe(false);
  });
});
