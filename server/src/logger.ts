import pino from 'pino';
import type { MotionModeType } from '#shared';

// ============================================
// Logger Configuration
// ============================================

const LOG_DIR = process.env.LOG_DIR || 'logs';
const LOG_LEVEL = process.env.LOG_LEVEL || 'info';
const IS_DEV = process.env.NODE_ENV !== 'production';

/**
 * Create a logger with console + rotating file output
 * pino-roll is used as a Pino transport for file rotation
 * @param filename - Log file name (e.g., 'server.log')
 * @param component - Component name for filtering (e.g., 'server', 'perf')
 */
function createLogger(filename: string, component: string) {
  const targets: pino.TransportTargetOptions[] = [];

  // Console stream with pretty printing (development only)
  if (IS_DEV) {
    targets.push({
      level: LOG_LEVEL,
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'HH:MM:ss.l',
        ignore: 'pid,hostname',
      },
    });
  }

  // Rotating file stream with JSON (always enabled)
  targets.push({
    level: 'info',
    target: 'pino-roll',
    options: {
      file: `${LOG_DIR}/${filename}`,
      size: '10m',
      limit: { count: 5 },
      mkdir: true,
    },
  });

  return pino(
    {
      level: LOG_LEVEL,
      base: { component },
    },
    pino.transport({ targets })
  );
}

// ============================================
// Logger Instances
// ============================================

// Commands, mode changes, connections, history
export const logger = createLogger('server.log', 'server');

// Tick timing and loop health
export const perfLogger = createLogger('performance.log', 'perf');

// ============================================
// Convenience Methods for Server Events
// ============================================

export function logServerStarted(port: number, tickRate: number) {
  logger.info({ port, tickRate, event: 'server_started' }, `Motion server running on port ${port} at ${tickRate} Hz`);
}

export function logClientConnected(socketId: string) {
  logger.info({ socketId, event: 'client_connected' }, 'Client connected');
}

export function logClientDisconnected(socketId: string, reason: string) {
  logger.info({ socketId, reason, event: 'client_disconnected' }, 'Client disconnected');
}

/**
 * Log commands accepted from the network (before the tick parses them)
 */
export function logCommandsQueued(origin: string, commands: string[]) {
  logger.debug({ origin, commands, event: 'commands_queued' }, `Queued ${commands.length} command(s) from ${origin}`);
}

/**
 * Log a mode that ran to completion (not pre-empted)
 */
export function logModeCompleted(mode: MotionModeType, simTimeSeconds: number) {
  logger.info({ mode, simTimeSeconds, event: 'mode_completed' }, `Mode ${mode} complete`);
}

// ============================================
// History Logging
// ============================================

/**
 * Periodic history summary (per-tag counts and latest entry)
 */
export function logHistorySummary(summary: {
  total: number;
  byTag: Array<{ tag: string; count: number; latest: string }>;
}) {
  const breakdown = summary.byTag.map((t) => `${t.tag}:${t.count} (latest ${t.latest})`).join(', ');
  logger.info(
    { ...summary, event: 'history_summary' },
    summary.total === 0 ? 'History: (empty)' : `History: ${summary.total} record(s) | ${breakdown}`
  );
}
