import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { ConsoleLogger, DEFAULT_LOG_LEVEL } from '@/infrastructure/logger/ConsoleLogger';

describe('ConsoleLogger', () => {
  let logger: ConsoleLogger;

  beforeEach(() => {
    logger = new ConsoleLogger();
    vi.spyOn(console, 'debug').mockImplementation(() => {});
    vi.spyOn(console, 'info').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should start at the default level', () => {
    expect(logger.getLevel()).toBe(DEFAULT_LOG_LEVEL);
    expect(DEFAULT_LOG_LEVEL).toBe('warn');
  });

  it('should prefix messages and append context as JSON', () => {
    logger.warn('Something odd', { handler: 'onNotify', count: 2 });

    expect(console.warn).toHaveBeenCalledWith('[LOG] Something odd {"handler":"onNotify","count":2}');
  });

  it('should omit an empty context', () => {
    logger.error('Failed', {});

    expect(console.error).toHaveBeenCalledWith('[LOG] Failed');
  });

  it('should drop messages below the current level', () => {
    logger.debug('hidden');
    logger.info('hidden');
    logger.warn('shown');

    expect(console.debug).not.toHaveBeenCalled();
    expect(console.info).not.toHaveBeenCalled();
    expect(console.warn).toHaveBeenCalledWith('[LOG] shown');
  });

  it('should write debug messages once the level is lowered', () => {
    logger.setLevel('debug');

    logger.debug('visible');

    expect(console.debug).toHaveBeenCalledWith('[LOG] visible');
  });

  it('should write nothing when silent', () => {
    logger.setLevel('silent');

    logger.error('hidden');

    expect(console.error).not.toHaveBeenCalled();
  });
});
