// ============================================
// Simulation System Runner
// Runs the tick stages in a fixed order: intake before motion,
// motion before integration, telemetry last
// ============================================

import type { Server } from 'socket.io';
import type { System } from './types';
import type { SimulationContext } from './SimulationContext';
import { logger, perfLogger } from '../logger';

// Tick budget before a per-stage breakdown is logged
const SLOW_TICK_MS = 10;

export interface ScheduledSystem {
  name: string;
  priority: number;
}

interface StageTiming {
  name: string;
  ms: number;
}

interface RegisteredSystem {
  system: System;
  priority: number;
}

/**
 * Owns the tick schedule. Lower priorities run first; equal priorities
 * keep registration order. A stage that throws is logged and skipped for
 * that tick so the remaining stages still see a consistent clock.
 */
export class SystemRunner {
  private systems: RegisteredSystem[] = [];

  register(system: System, priority: number): void {
    if (this.systems.some((entry) => entry.system.name === system.name)) {
      throw new Error(`System ${system.name} is already registered`);
    }
    this.systems.push({ system, priority });
    this.systems.sort((a, b) => a.priority - b.priority);
  }

  update(ctx: SimulationContext, deltaTime: number, io: Server): void {
    const tickStart = performance.now();
    const timings: StageTiming[] = [];

    for (const { system } of this.systems) {
      const systemStart = performance.now();
      try {
        system.update(ctx, deltaTime, io);
      } catch (error) {
        logger.error({
          event: 'system_error',
          system: system.name,
          tick: ctx.clock.tickCount,
          error: error instanceof Error ? error.message : String(error),
          stack: error instanceof Error ? error.stack : undefined,
        }, `System ${system.name} threw an error`);
      }
      timings.push({ name: system.name, ms: performance.now() - systemStart });
    }

    const totalMs = performance.now() - tickStart;
    if (totalMs > SLOW_TICK_MS) {
      const slowest = [...timings].sort((a, b) => b.ms - a.ms)[0];
      perfLogger.info({
        event: 'slow_tick_breakdown',
        tick: ctx.clock.tickCount,
        simTimeSeconds: ctx.clock.now,
        totalMs: parseFloat(totalMs.toFixed(2)),
        stages: timings.map((t) => ({ name: t.name, ms: parseFloat(t.ms.toFixed(2)) })),
      }, `Slow tick ${totalMs.toFixed(1)}ms, slowest stage ${slowest?.name ?? 'none'}`);
    }
  }

  /**
   * Stage order as it will run, for the startup log
   */
  getSchedule(): ScheduledSystem[] {
    return this.systems.map(({ system, priority }) => ({ name: system.name, priority }));
  }
}
