/**
 * Vitest Global Setup
 *
 * Runs before each test file. Sets up mocks and test utilities.
 */

import { vi, beforeEach, afterAll } from 'vitest';

// Keep debug log lines out of test output
process.env.NODE_ENV = 'test';

// Reset all mocks before each test
beforeEach(() => {
    vi.clearAllMocks();
});

// Clean up after all tests
afterAll(() => {
    vi.restoreAllMocks();
});
