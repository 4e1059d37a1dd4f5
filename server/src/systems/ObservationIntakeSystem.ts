// ============================================
// Observation Intake System
// Moves queued observations into the history log
// ============================================

import type { Server } from 'socket.io';
import type { System } from './types';
import type { SimulationContext } from './SimulationContext';

/**
 * ObservationIntakeSystem - The history log's only writer
 *
 * Network handlers enqueue observations; this drains them once per tick so
 * history writes never interleave with command resolution.
 */
export class ObservationIntakeSystem implements System {
  readonly name = 'ObservationIntakeSystem';

  update(ctx: SimulationContext, _deltaTime: number, _io: Server): void {
    const now = ctx.clock.now;
    for (const observation of ctx.observations.drainAll()) {
      ctx.history.add(observation, now);
    }
  }
}
