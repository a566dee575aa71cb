import { config } from '../../src/config';
import { resetWarnings } from '../../src/utils/logger';

// Console filtering: keep test output quiet unless explicitly requested.
const originalLog = console.log;
const originalWarn = console.warn;
const originalError = console.error;

const ALLOW_ALL = process.env.JEST_ALLOW_ALL_LOGS === '1';

console.log = (...args: unknown[]) => {
  if (ALLOW_ALL) originalLog(...args);
};
console.warn = (...args: unknown[]) => {
  if (ALLOW_ALL) originalWarn(...args);
};
console.error = (...args: unknown[]) => {
  if (ALLOW_ALL) originalError(...args);
};

// The configuration is a mutable singleton; give every test the defaults.
const defaultConfig = { ...config };

beforeEach(() => {
  resetWarnings();
});

afterEach(() => {
  Object.assign(config, defaultConfig);
  jest.restoreAllMocks();
});

// Restore original console methods after tests
afterAll(() => {
  console.log = originalLog;
  console.warn = originalWarn;
  console.error = originalError;
});
