/**
 * Jest setup file, runs before each test file.
 *
 * Console output is replaced with mocks: the logging helpers write through console, and
 * tests assert on those calls instead of printing them.
 */

import { jest, afterEach } from '@jest/globals';

global.console = {
  ...console,
  error: jest.fn(),
  warn: jest.fn(),
  log: jest.fn(),
  info: jest.fn(),
  debug: jest.fn(),
};

afterEach(() => {
  jest.clearAllMocks();
});
