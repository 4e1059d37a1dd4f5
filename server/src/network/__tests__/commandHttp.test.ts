// ============================================
// HTTP Route Tests
// ============================================

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { handleCommandBody, handleHistoryRequest } from '../commandHttp';
import { createSimulationContext } from '../../systems';
import type { SimulationContext } from '../../systems';

describe('HTTP routes', () => {
  let ctx: SimulationContext;

  beforeEach(() => {
    vi.clearAllMocks();
    ctx = createSimulationContext();
  });

  describe('POST /command', () => {
    it('queues a single command', () => {
      expect(handleCommandBody(ctx, '{"command":"move_forward"}')).toEqual({
        statusCode: 200,
        body: { status: 'ok', queued: 1 },
      });
      expect(ctx.commands.drainAll()).toEqual([{ command: 'move_forward', replyTo: null }]);
    });

    it('queues a list of commands in order', () => {
      const response = handleCommandBody(ctx, JSON.stringify({ command: ['turn_90_left', 'move_to_coordinates:5,0,5'] }));

      expect(response).toEqual({ statusCode: 200, body: { status: 'ok', queued: 2 } });
      expect(ctx.commands.drainAll().map((c) => c.command)).toEqual(['turn_90_left', 'move_to_coordinates:5,0,5']);
    });

    it('rejects invalid JSON', () => {
      const response = handleCommandBody(ctx, '{command:');

      expect(response.statusCode).toBe(400);
      expect(response.body).toMatchObject({ status: 'error' });
      expect(ctx.commands.size()).toBe(0);
    });

    it('rejects a body without a command', () => {
      expect(handleCommandBody(ctx, '{"cmd":"stop"}')).toEqual({
        statusCode: 400,
        body: { status: 'error', error: 'Missing "command" field' },
      });
    });
  });

  describe('GET /history', () => {
    beforeEach(() => {
      ctx.history.add({ name: 'Tree1', tag: 'Nature', position: { x: 1, y: 0, z: 1 } }, 0);
      ctx.history.add({ name: 'Tree2', tag: 'Nature', position: { x: 2, y: 0, z: 2 } }, 1);
    });

    it('returns tag matches up to count', () => {
      const response = handleHistoryRequest(ctx, new URLSearchParams('tag=nature&count=2'));

      expect(response.statusCode).toBe(200);
      expect(response.body).toMatchObject({
        found: true,
        records: [{ name: 'Tree2' }, { name: 'Tree1' }],
      });
    });

    it('returns recent records without parameters', () => {
      const response = handleHistoryRequest(ctx, new URLSearchParams(''));
      expect(response.body).toMatchObject({ found: true, records: [{ name: 'Tree2' }, { name: 'Tree1' }] });
    });

    it('treats a bad count as not found', () => {
      const response = handleHistoryRequest(ctx, new URLSearchParams('count=lots'));
      expect(response.body).toEqual({ found: false, records: [] });
    });
  });
});
