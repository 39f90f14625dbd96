/**
 * Global test setup for Vitest.
 *
 * This file runs before all tests. It configures the test environment
 * and sets up mock cleanup between tests.
 */

import { beforeEach, vi } from 'vitest';

// Set test environment variables before any imports
process.env.NODE_ENV = 'test';
process.env.ANTHROPIC_API_KEY = 'test-api-key';
process.env.EMAIL_ADDRESS = 'triage@example.com';
process.env.GOOGLE_CLIENT_ID = 'test-client-id';
process.env.GOOGLE_CLIENT_SECRET = 'test-client-secret';
process.env.GOOGLE_REFRESH_TOKEN = 'test-refresh-token';
process.env.SMTP_PASSWORD = 'test-smtp-password';
process.env.APP_LOG_FILE = 'off';
process.env.APP_LOG_STDOUT = 'false';

// Import mocks
import { clearMockState } from './mocks/anthropic.js';
import { clearGmailMockState } from './mocks/gmail.js';

// Reset mocks before each test
beforeEach(() => {
  vi.clearAllMocks();
  clearMockState();
  clearGmailMockState();
});
