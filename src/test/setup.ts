// Network retries in tests use injected no-op sleeps; this only guards slow file I/O.
jest.setTimeout(10000);

// Run logs are noisy; tests that check output spy on these.
global.console = {
  ...console,
  log: jest.fn(),
  debug: jest.fn(),
  info: jest.fn(),
  warn: jest.fn(),
  error: jest.fn(),
};
