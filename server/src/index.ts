import { createServer } from 'node:http';
import { Server } from 'socket.io';
import { SERVER_CONFIG } from '#shared';
import { loadConfig } from './config';
import { logger, perfLogger, logServerStarted, logHistorySummary } from './logger';
import { createSimulationContext, createSimulationRunner } from './systems';
import { registerSocketHandlers } from './network/socketHandlers';
import { createHttpHandler } from './network/commandHttp';
import { TickStats } from './telemetry';

// ============================================
// Server Configuration
// ============================================

const config = loadConfig();
const TICK_INTERVAL = 1000 / config.tickRate;
const PERF_LOG_INTERVAL_MS = 10000; // Log performance stats every 10 seconds

// ============================================
// Simulation State
// ============================================

const ctx = createSimulationContext({
  motion: { COMMAND_TIMEOUT: config.commandTimeout },
  historyMaxSize: config.historyMaxSize,
  historyCooldown: config.historyCooldown,
});
const systemRunner = createSimulationRunner(config.telemetryRate);

logger.info({ systems: systemRunner.getSchedule(), event: 'systems_registered' }, 'Simulation systems registered');

// ============================================
// HTTP + Socket.io Server Setup
// ============================================

const httpServer = createServer(createHttpHandler(ctx));

const io = new Server(httpServer, {
  cors: {
    origin: '*', // Interpreter and tools connect from anywhere in development
  },
});

io.on('connection', (socket) => {
  registerSocketHandlers(socket, ctx);
});

httpServer.listen(config.port, () => {
  logServerStarted(config.port, config.tickRate);
});

// ============================================
// Simulation Loop
// ============================================

const tickStats = new TickStats(TICK_INTERVAL);
let lastTickTime = performance.now();
let lastPerfLogTime = lastTickTime;

const tickTimer = setInterval(() => {
  const now = performance.now();
  const actualDelta = now - lastTickTime;
  lastTickTime = now;

  // Fixed step: simulated time advances by exactly one interval per tick
  const deltaTime = TICK_INTERVAL / 1000;

  const tickProcessingStart = performance.now();
  systemRunner.update(ctx, deltaTime, io);
  const tickProcessingMs = performance.now() - tickProcessingStart;
  tickStats.record(tickProcessingMs);

  // Event loop was blocked (GC, slow handler) or the tick itself overran
  if (actualDelta > TICK_INTERVAL * 1.5) {
    perfLogger.info(
      {
        event: 'tick_variance',
        tickNum: ctx.clock.tickCount,
        actualDeltaMs: actualDelta.toFixed(1),
        tickProcessingMs: tickProcessingMs.toFixed(1),
        expectedMs: TICK_INTERVAL.toFixed(1),
        ratio: (actualDelta / TICK_INTERVAL).toFixed(2),
      },
      `Tick variance: ${actualDelta.toFixed(1)}ms (processing: ${tickProcessingMs.toFixed(1)}ms)`
    );
  }

  if (now - lastPerfLogTime >= PERF_LOG_INTERVAL_MS) {
    const stats = tickStats.flush();
    if (stats) {
      perfLogger.info(
        {
          event: 'tick_stats',
          intervalSec: ((now - lastPerfLogTime) / 1000).toFixed(1),
          tickCount: stats.tickCount,
          avgMs: stats.avgMs.toFixed(2),
          minMs: stats.minMs.toFixed(2),
          maxMs: stats.maxMs.toFixed(2),
          p50Ms: stats.p50Ms.toFixed(2),
          p95Ms: stats.p95Ms.toFixed(2),
          p99Ms: stats.p99Ms.toFixed(2),
          budgetMs: TICK_INTERVAL.toFixed(1),
          budgetUsedPct: stats.budgetUsedPct.toFixed(1),
          queuedCommands: ctx.commands.getTotalEnqueued(),
          historySize: ctx.history.size(),
        },
        `Tick stats: avg=${stats.avgMs.toFixed(2)}ms p95=${stats.p95Ms.toFixed(2)}ms (${stats.budgetUsedPct.toFixed(0)}% budget)`
      );
    }
    lastPerfLogTime = now;
  }
}, TICK_INTERVAL);

// ============================================
// Periodic Logging
// ============================================

const intervals: NodeJS.Timeout[] = [tickTimer];

// Helper to wrap interval callbacks in try-catch
const safeInterval = (name: string, callback: () => void, interval: number) => {
  intervals.push(
    setInterval(() => {
      try {
        callback();
      } catch (error) {
        logger.error(
          {
            event: 'interval_error',
            intervalName: name,
            error: error instanceof Error ? error.message : String(error),
            stack: error instanceof Error ? error.stack : undefined,
          },
          `Interval ${name} threw an error`
        );
      }
    }, interval)
  );
};

// What the vehicle has seen, per tag
safeInterval(
  'history_summary',
  () => {
    logHistorySummary(ctx.history.summarize());
  },
  SERVER_CONFIG.HISTORY_SUMMARY_INTERVAL_MS
);

// ============================================
// Graceful Shutdown
// ============================================

/**
 * Handle graceful shutdown on SIGINT (Ctrl-C) or SIGTERM.
 * Stops the loop, closes Socket.io and the HTTP server.
 */
function shutdown(signal: string) {
  logger.info({ event: 'shutdown_initiated', signal }, `Received ${signal}, shutting down...`);

  for (const timer of intervals) {
    clearInterval(timer);
  }

  // Closes every client connection and the underlying HTTP server
  io.close((err) => {
    if (err) {
      logger.error({ event: 'shutdown_error', error: err.message }, 'Error closing server');
    } else {
      logger.info({ event: 'shutdown_complete' }, 'Server shut down cleanly');
    }
    process.exit(0);
  });

  // Force exit if graceful shutdown hangs
  setTimeout(() => {
    logger.warn({ event: 'shutdown_forced' }, 'Forced shutdown after timeout');
    process.exit(1);
  }, SERVER_CONFIG.SHUTDOWN_TIMEOUT_MS).unref(); // .unref() ensures this timer doesn't keep process alive
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
