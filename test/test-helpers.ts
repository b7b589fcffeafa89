import { vi } from 'vitest';
import type { ILogger } from '@/infrastructure/interfaces/ILogger';

export function createMockLogger(): ILogger {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}
