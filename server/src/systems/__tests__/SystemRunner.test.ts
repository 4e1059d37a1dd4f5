// ============================================
// SystemRunner Unit Tests
// ============================================

import { describe, it, expect, beforeEach, vi } from 'vitest';
import type { Server } from 'socket.io';
import { SystemRunner } from '../SystemRunner';
import type { System } from '../types';
import type { SimulationContext } from '../SimulationContext';
import { createSimulationContext } from '../SimulationContext';
import { createMockIO } from '../../__tests__/testUtils';
import { logger } from '../../logger';

function recordingSystem(name: string, calls: string[]): System {
  return {
    name,
    update: (_ctx: SimulationContext, _dt: number, _io: Server) => {
      calls.push(name);
    },
  };
}

describe('SystemRunner', () => {
  let runner: SystemRunner;
  let ctx: SimulationContext;

  beforeEach(() => {
    vi.clearAllMocks();
    runner = new SystemRunner();
    ctx = createSimulationContext();
  });

  it('runs systems in priority order regardless of registration order', () => {
    const calls: string[] = [];
    runner.register(recordingSystem('late', calls), 300);
    runner.register(recordingSystem('early', calls), 100);
    runner.register(recordingSystem('middle', calls), 200);

    runner.update(ctx, 1 / 60, createMockIO());

    expect(calls).toEqual(['early', 'middle', 'late']);
    expect(runner.getSchedule()).toEqual([
      { name: 'early', priority: 100 },
      { name: 'middle', priority: 200 },
      { name: 'late', priority: 300 },
    ]);
  });

  it('rejects a second system with the same name', () => {
    runner.register(recordingSystem('motion', []), 300);

    expect(() => runner.register(recordingSystem('motion', []), 400)).toThrow('System motion is already registered');
    expect(runner.getSchedule()).toEqual([{ name: 'motion', priority: 300 }]);
  });

  it('keeps running after a system throws', () => {
    const calls: string[] = [];
    runner.register(
      {
        name: 'broken',
        update: () => {
          throw new Error('boom');
        },
      },
      100
    );
    runner.register(recordingSystem('after', calls), 200);

    runner.update(ctx, 1 / 60, createMockIO());

    expect(calls).toEqual(['after']);
    expect(logger.error).toHaveBeenCalledTimes(1);
    expect(logger.error).toHaveBeenCalledWith(
      expect.objectContaining({ event: 'system_error', system: 'broken', tick: 0, error: 'boom' }),
      'System broken threw an error'
    );
  });
});
