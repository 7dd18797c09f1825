import { vi } from 'vitest'

// Default logger mock: every getLogger()/withContext() call returns the same spy-able instance.
// Tests that exercise the real logger load it through vi.importActual.
vi.mock('@/infrastructure/logging/logger', () => {
  const logger = {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    withContext: vi.fn((): unknown => logger),
  }
  return {
    getLogger: vi.fn(() => logger),
  }
})
