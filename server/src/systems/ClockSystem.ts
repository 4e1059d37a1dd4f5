// ============================================
// Clock System
// Advances simulated time at the start of every tick
// ============================================

import type { Server } from 'socket.io';
import type { System } from './types';
import type { SimulationContext } from './SimulationContext';

export class ClockSystem implements System {
  readonly name = 'ClockSystem';

  update(ctx: SimulationContext, deltaTime: number, _io: Server): void {
    ctx.clock.advance(deltaTime);
  }
}
