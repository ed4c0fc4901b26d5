/**
 * @fileoverview Logger Tests
 */
import { describe, it, expect, afterEach, vi } from 'vitest';
import {
  TrellisLogger,
  configureLogging,
  createLogger,
  getLogger,
  isLogLevel,
  resetLogger,
} from '../../src/logging/logger.js';

describe('TrellisLogger', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    resetLogger();
  });

  it('should use the level it is given', () => {
    const logger = new TrellisLogger({ level: 'debug' });

    expect(logger.level).toBe('debug');
    expect(logger.isLevelEnabled('debug')).toBe(true);
    expect(logger.isLevelEnabled('trace')).toBe(false);
  });

  it('should default to warn', () => {
    vi.stubEnv('LOG_LEVEL', '');

    expect(new TrellisLogger().level).toBe('warn');
  });

  it('should read LOG_LEVEL', () => {
    vi.stubEnv('LOG_LEVEL', 'error');

    expect(new TrellisLogger().level).toBe('error');
  });

  it('should accumulate child context', () => {
    const logger = new TrellisLogger({ level: 'silent' }).child({ component: 'parser' }).child({ input: 'foo' });

    expect(logger.getContext()).toEqual({ component: 'parser', input: 'foo' });
  });

  it('should return the value of a timed task', async () => {
    const logger = new TrellisLogger({ level: 'silent' });

    await expect(logger.timed('task', () => Promise.resolve(7))).resolves.toBe(7);
  });

  it('should rethrow the failure of a timed task', async () => {
    const logger = new TrellisLogger({ level: 'silent' });

    await expect(logger.timed('task', () => Promise.reject(new Error('nope')))).rejects.toThrow('nope');
  });

  describe('singleton', () => {
    it('should share the default logger', () => {
      expect(getLogger()).toBe(getLogger());
    });

    it('should replace the default logger when configured', () => {
      const before = getLogger();
      const after = configureLogging({ level: 'info' });

      expect(after).not.toBe(before);
      expect(getLogger().level).toBe('info');
    });

    it('should tag component loggers', () => {
      configureLogging({ level: 'silent' });

      expect(createLogger('dispatcher').getContext()).toEqual({ component: 'dispatcher' });
    });
  });

  it('should recognise log levels', () => {
    expect(isLogLevel('fatal')).toBe(true);
    expect(isLogLevel('loud')).toBe(false);
  });
});
