// ============================================
// Shared Test Setup
// Runs before each test file via vitest setupFiles
// ============================================

import { vi } from 'vitest';

// Mock the logger to prevent pino transports and log files
vi.mock('../logger', () => ({
  logger: { info: vi.fn(), error: vi.fn(), warn: vi.fn(), debug: vi.fn() },
  perfLogger: { info: vi.fn(), warn: vi.fn() },
  logServerStarted: vi.fn(),
  logClientConnected: vi.fn(),
  logClientDisconnected: vi.fn(),
  logCommandsQueued: vi.fn(),
  logModeCompleted: vi.fn(),
  logHistorySummary: vi.fn(),
}));
