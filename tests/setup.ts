/**
 * Vitest Global Test Setup
 * @module tests/setup
 *
 * Runs before every test file. Environment variables are set before the
 * modules under test create their loggers.
 */

import { afterEach, vi } from 'vitest';

// ============================================================================
// Environment Setup
// ============================================================================

process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = 'silent';
delete process.env.LOG_PRETTY;

// ============================================================================
// Global Hooks
// ============================================================================

afterEach(() => {
  vi.useRealTimers();
});
