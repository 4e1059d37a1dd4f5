// ============================================
// Motion System
// Runs the motion state machine for one tick
// ============================================

import type { Server } from 'socket.io';
import type { System } from './types';
import type { SimulationContext } from './SimulationContext';

export class MotionSystem implements System {
  readonly name = 'MotionSystem';

  update(ctx: SimulationContext, deltaTime: number, _io: Server): void {
    ctx.lastOutput = ctx.machine.tick(deltaTime);
  }
}
