import { describe, it, expect } from 'vitest';
import { EnvConfigRepository } from '@/infrastructure/repositories/EnvConfigRepository';
import { createMockLogger } from '../test-helpers';

describe('EnvConfigRepository', () => {
  it('should leave unset variables undefined', async () => {
    const repository = new EnvConfigRepository(createMockLogger(), {});

    await expect(repository.getAppConfig()).resolves.toEqual({
      logLevel: undefined,
      demos: undefined,
    });
  });

  it('should normalize the log level and split the demo list', async () => {
    const repository = new EnvConfigRepository(createMockLogger(), {
      DELEGATES_LOG_LEVEL: ' INFO ',
      DELEGATES_DEMOS: 'events, delegates,,',
    });

    await expect(repository.getAppConfig()).resolves.toEqual({
      logLevel: 'info',
      demos: ['events', 'delegates'],
    });
  });

  it('should treat blank variables as unset', async () => {
    const repository = new EnvConfigRepository(createMockLogger(), {
      DELEGATES_LOG_LEVEL: '   ',
      DELEGATES_DEMOS: '',
    });

    await expect(repository.getAppConfig()).resolves.toEqual({
      logLevel: undefined,
      demos: undefined,
    });
  });
});
