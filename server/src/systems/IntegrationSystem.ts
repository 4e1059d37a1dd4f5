// ============================================
// Integration System
// Applies this tick's motion output to the vehicle
// ============================================

import type { Server } from 'socket.io';
import type { System } from './types';
import type { SimulationContext } from './SimulationContext';

/**
 * IntegrationSystem - Kinematic stand-in for a physics engine
 *
 * Velocity is taken as-is (no mass, drag or collisions).
 */
export class IntegrationSystem implements System {
  readonly name = 'IntegrationSystem';

  update(ctx: SimulationContext, deltaTime: number, _io: Server): void {
    ctx.body.apply(ctx.lastOutput, deltaTime);
  }
}
