/**
 * Jest test setup file
 *
 * Runs before each test file to configure the test environment.
 */

import { resetLogging } from '../src/logging/index.js';

jest.setTimeout(10000);

// Mock console.warn to reduce noise in tests (but allow errors)
beforeAll(() => {
  jest.spyOn(console, 'warn').mockImplementation(() => {});
});

afterAll(() => {
  resetLogging();
  jest.restoreAllMocks();
});
