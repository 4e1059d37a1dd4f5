// ============================================
// Socket Handlers
// Per-connection event wiring. Handlers only enqueue or read.
// ============================================

import type { Socket } from 'socket.io';
import type { HistoryQueryResult } from '#shared';
import type { SimulationContext } from '../systems';
import { queryHistory } from '../history/historyQuery';
import { logger, logClientConnected, logClientDisconnected, logCommandsQueued } from '../logger';
import { readCommandList, readManualInput, readObservation } from './payloads';

// ============================================
// Socket Handler Error Wrapper
// ============================================

/**
 * Wraps a socket event handler in try-catch so one bad message can't take
 * the process down. Logs with socket context and keeps serving.
 */
export function safeHandler<A extends unknown[]>(
  socket: Socket,
  eventName: string,
  handler: (...args: A) => void
): (...args: A) => void {
  return (...args: A) => {
    try {
      handler(...args);
    } catch (error) {
      logger.error(
        {
          event: 'socket_handler_error',
          socketId: socket.id,
          eventName,
          error: error instanceof Error ? error.message : String(error),
          stack: error instanceof Error ? error.stack : undefined,
        },
        `Socket handler ${eventName} threw an error`
      );
    }
  };
}

/**
 * Wire every client event for one connection
 */
export function registerSocketHandlers(socket: Socket, ctx: SimulationContext): void {
  logClientConnected(socket.id);

  // ============================================
  // Commands (interpreter)
  // ============================================

  socket.on(
    'command',
    safeHandler(socket, 'command', (payload: unknown) => {
      const commands = readCommandList(payload);
      if (!commands) {
        logger.warn({ socketId: socket.id, event: 'invalid_command_payload' }, 'Ignoring command message without a command');
        return;
      }
      for (const command of commands) {
        ctx.commands.enqueue({ command, replyTo: socket.id });
      }
      logCommandsQueued(socket.id, commands);
    })
  );

  // ============================================
  // Manual Input
  // ============================================

  socket.on(
    'manualInput',
    safeHandler(socket, 'manualInput', (payload: unknown) => {
      const axes = readManualInput(payload);
      if (!axes) {
        logger.warn({ socketId: socket.id, event: 'invalid_manual_input' }, 'Ignoring malformed manual input');
        return;
      }
      // Manual axes are read by the next tick; last write wins
      ctx.machine.setManualInput(axes);
      ctx.manualInputOwner = socket.id;
    })
  );

  // ============================================
  // Observations (history producer)
  // ============================================

  socket.on(
    'observation',
    safeHandler(socket, 'observation', (payload: unknown) => {
      const observation = readObservation(payload);
      if (!observation) {
        logger.warn({ socketId: socket.id, event: 'invalid_observation' }, 'Ignoring malformed observation');
        return;
      }
      ctx.observations.enqueue(observation);
    })
  );

  // ============================================
  // History Queries (read-only, answered immediately)
  // ============================================

  socket.on(
    'historyQuery',
    safeHandler(socket, 'historyQuery', (payload: unknown, ack?: (result: HistoryQueryResult) => void) => {
      if (typeof ack !== 'function') return;
      ack(queryHistory(ctx.history, payload));
    })
  );

  socket.on(
    'historyTags',
    safeHandler(socket, 'historyTags', (ack?: (tags: string[]) => void) => {
      if (typeof ack !== 'function') return;
      ack(ctx.history.allTags());
    })
  );

  socket.on(
    'disconnect',
    safeHandler(socket, 'disconnect', (reason: string) => {
      logClientDisconnected(socket.id, reason);
      // Held axes don't decay, so a dropped driver must not leave them latched
      if (ctx.manualInputOwner === socket.id) {
        ctx.machine.setManualInput({});
        ctx.manualInputOwner = null;
        logger.info({ socketId: socket.id, event: 'manual_input_released' }, 'Released manual input of disconnected client');
      }
    })
  );
}
