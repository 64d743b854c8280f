import { vi, type Mock } from 'vitest';

export interface MockLogger {
  info: Mock;
  error: Mock;
  warn: Mock;
  debug: Mock;
  child: Mock;
  log: Mock;
}

export function createMockLogger(): MockLogger {
  const logger: MockLogger = {
    info: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    debug: vi.fn(),
    child: vi.fn(() => logger),
    log: vi.fn(),
  };
  return logger;
}
