/**
 * Jest test setup file
 * Sets up environment variables and global mocks for testing
 */

import { beforeAll, afterAll, jest } from '@jest/globals';

// Set up test environment variables before the suites load
process.env.WHATSAPP_ACCESS_TOKEN = 'test-access-token';
process.env.WHATSAPP_PHONE_NUMBER_ID = '123456789012345';
process.env.VERIFY_TOKEN = 'test-verify-token';
process.env.AI_API_KEY = 'test-ai-key';
process.env.DATABASE_PATH = ':memory:';
process.env.SESSION_DATABASE_PATH = ':memory:';
process.env.LOG_LEVEL = 'error';

// Suppress console output during tests
const originalConsoleError = console.error;
beforeAll(() => {
  console.error = jest.fn();
});

afterAll(() => {
  console.error = originalConsoleError;
});
