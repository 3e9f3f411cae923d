/**
 * Test Setup
 * Global test configuration and utilities
 */

import { vi } from 'vitest';
import pino from 'pino';
import { setLogger } from '../src/core/logger.js';

// Logs go nowhere during tests
setLogger(pino({ level: 'silent' }));

// Mock nanoid for unique, readable IDs in tests
vi.mock('nanoid', () => {
  let counter = 0;
  return {
    nanoid: (size?: number) => {
      counter++;
      return `t${String(counter).padStart((size ?? 21) - 1, '0')}`;
    },
  };
});
