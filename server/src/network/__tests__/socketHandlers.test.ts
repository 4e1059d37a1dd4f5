// ============================================
// Socket Handler Tests
// ============================================

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { registerSocketHandlers } from '../socketHandlers';
import { createSimulationContext } from '../../systems';
import type { SimulationContext } from '../../systems';
import { createMockSocket } from '../../__tests__/testUtils';
import type { MockSocket } from '../../__tests__/testUtils';
import { logger, logClientConnected, logClientDisconnected, logCommandsQueued } from '../../logger';

describe('socket handlers', () => {
  let ctx: SimulationContext;
  let socket: MockSocket;

  beforeEach(() => {
    vi.clearAllMocks();
    ctx = createSimulationContext();
    socket = createMockSocket('socket-1');
    registerSocketHandlers(socket, ctx);
  });

  it('logs the connection', () => {
    expect(logClientConnected).toHaveBeenCalledWith('socket-1');
  });

  describe('command', () => {
    it('enqueues each command with the socket as reply target', () => {
      socket.trigger('command', { command: 'move_forward, turn_left' });

      expect(ctx.commands.drainAll()).toEqual([
        { command: 'move_forward', replyTo: 'socket-1' },
        { command: 'turn_left', replyTo: 'socket-1' },
      ]);
      expect(logCommandsQueued).toHaveBeenCalledWith('socket-1', ['move_forward', 'turn_left']);
    });

    it('does not parse on the network side', () => {
      socket.trigger('command', { command: ['not_a_command'] });

      expect(ctx.commands.size()).toBe(1);
      expect(ctx.machine.getMode().type).toBe('idle');
    });

    it('ignores a payload without commands', () => {
      socket.trigger('command', 42);

      expect(ctx.commands.size()).toBe(0);
      expect(logger.warn).toHaveBeenCalledTimes(1);
    });
  });

  describe('manualInput', () => {
    it('sets clamped manual axes', () => {
      socket.trigger('manualInput', { forward: 2, yaw: -0.5 });

      expect(ctx.machine.getControlAxes()).toEqual({ forward: 1, lateral: 0, vertical: 0, yaw: -0.5 });
    });

    it('logs and survives a throwing handler', () => {
      vi.spyOn(ctx.machine, 'setManualInput').mockImplementation(() => {
        throw new Error('bad input');
      });

      expect(() => socket.trigger('manualInput', { forward: 1 })).not.toThrow();
      expect(logger.error).toHaveBeenCalledWith(
        expect.objectContaining({ event: 'socket_handler_error', socketId: 'socket-1', eventName: 'manualInput' }),
        'Socket handler manualInput threw an error'
      );
    });
  });

  describe('observation', () => {
    it('queues valid observations for the tick', () => {
      socket.trigger('observation', { name: 'Tree1', tag: 'Nature', position: { x: 1, y: 0, z: 1 } });

      expect(ctx.observations.drainAll()).toEqual([{ name: 'Tree1', tag: 'Nature', position: { x: 1, y: 0, z: 1 } }]);
      // Written by the tick, not the handler
      expect(ctx.history.size()).toBe(0);
    });

    it('drops malformed observations', () => {
      socket.trigger('observation', { name: 'Tree1', tag: 'Nature' });

      expect(ctx.observations.size()).toBe(0);
      expect(logger.warn).toHaveBeenCalledTimes(1);
    });
  });

  describe('history', () => {
    beforeEach(() => {
      ctx.history.add({ name: 'Tree1', tag: 'Nature', position: { x: 1, y: 0, z: 1 } }, 0);
      ctx.history.add({ name: 'Rock1', tag: 'Stone', position: { x: 2, y: 0, z: 2 } }, 1);
    });

    it('answers queries through the ack', () => {
      const ack = vi.fn();
      socket.trigger('historyQuery', { tag: 'stone' }, ack);

      expect(ack).toHaveBeenCalledWith({
        found: true,
        records: [
          {
            name: 'Rock1',
            tag: 'Stone',
            position: { x: 2, y: 0, z: 2 },
            orientation: { x: 0, y: 0, z: 0, w: 1 },
            timestampSeconds: 1,
            distanceMeters: 0,
          },
        ],
      });
    });

    it('lists tags through the ack', () => {
      const ack = vi.fn();
      socket.trigger('historyTags', ack);

      expect(ack).toHaveBeenCalledWith(['Nature', 'Stone']);
    });

    it('ignores a query without an ack', () => {
      expect(() => socket.trigger('historyQuery', { tag: 'stone' })).not.toThrow();
    });
  });

  describe('disconnect', () => {
    it('logs disconnects', () => {
      socket.trigger('disconnect', 'transport close');
      expect(logClientDisconnected).toHaveBeenCalledWith('socket-1', 'transport close');
    });

    it('releases manual input held by the disconnecting client', () => {
      socket.trigger('manualInput', { forward: 1, yaw: 0.5 });
      expect(ctx.manualInputOwner).toBe('socket-1');

      socket.trigger('disconnect', 'transport close');

      expect(ctx.machine.getControlAxes()).toEqual({ forward: 0, lateral: 0, vertical: 0, yaw: 0 });
      expect(ctx.manualInputOwner).toBeNull();
      expect(logger.info).toHaveBeenCalledWith(
        { socketId: 'socket-1', event: 'manual_input_released' },
        'Released manual input of disconnected client'
      );
    });

    it("leaves another client's manual input alone", () => {
      const driver = createMockSocket('socket-2');
      registerSocketHandlers(driver, ctx);
      driver.trigger('manualInput', { lateral: -0.5 });

      socket.trigger('disconnect', 'ping timeout');

      expect(ctx.machine.getControlAxes()).toEqual({ forward: 0, lateral: -0.5, vertical: 0, yaw: 0 });
      expect(ctx.manualInputOwner).toBe('socket-2');
    });
  });
});
