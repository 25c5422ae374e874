/**
 * Global vitest setup: silences the logger across all tests.
 *
 * Tests that need to assert on logger calls import the mocked default export
 * and inspect it; tests that need the real module use vi.importActual().
 */
import { vi } from 'vitest'

vi.mock('../L1-infra/logger/configLogger.js', () => {
  const mockLogger = {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
    level: 'info',
  }
  return {
    default: mockLogger,
    sanitizeForLog: vi.fn((v: unknown) => String(v)),
    setVerbose: vi.fn(),
  }
})
