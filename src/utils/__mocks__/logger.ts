// Manual mock picked up by `jest.mock('../../src/utils/logger')`.
// `child()` hands back the same mock, so assertions on the default export also see
// entries written through a connection-scoped child logger.
import { jest } from '@jest/globals';

type LogFn = (message: string | object, meta?: Record<string, unknown>) => void;
type MockLogMethod = jest.Mock<LogFn>;

interface MockLogger {
  error: MockLogMethod;
  warn: MockLogMethod;
  info: MockLogMethod;
  http: MockLogMethod;
  verbose: MockLogMethod;
  debug: MockLogMethod;
  silly: MockLogMethod;
  success: MockLogMethod;
  child: jest.Mock<(metadata: Record<string, unknown>) => MockLogger>;
  close: jest.Mock<() => Promise<void>>;
}

const mockLogger: MockLogger = {
  error: jest.fn<LogFn>(),
  warn: jest.fn<LogFn>(),
  info: jest.fn<LogFn>(),
  http: jest.fn<LogFn>(),
  verbose: jest.fn<LogFn>(),
  debug: jest.fn<LogFn>(),
  silly: jest.fn<LogFn>(),
  success: jest.fn<LogFn>(),
  child: jest.fn<(metadata: Record<string, unknown>) => MockLogger>(() => mockLogger),
  close: jest.fn<() => Promise<void>>(() => Promise.resolve()),
};

export const standardLevels = {
  error: 0,
  warn: 1,
  info: 2,
  http: 3,
  verbose: 4,
  debug: 5,
  silly: 6,
};

export default mockLogger;
