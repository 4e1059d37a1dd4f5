// ============================================
// Command Intake System
// Expires stale axis commands, then applies queued commands in order
// ============================================

import type { Server } from 'socket.io';
import type { CommandResultMessage } from '#shared';
import type { System } from './types';
import type { SimulationContext } from './SimulationContext';
import { logger } from '../logger';

/**
 * CommandIntakeSystem - Feeds the motion state machine
 *
 * Decay runs before the drain so a command refreshed this tick survives it.
 * Each outcome goes back to the socket that issued the command.
 */
export class CommandIntakeSystem implements System {
  readonly name = 'CommandIntakeSystem';

  update(ctx: SimulationContext, _deltaTime: number, io: Server): void {
    const expired = ctx.decay.tick(ctx.clock.now);
    if (expired.length > 0) {
      logger.debug(
        { expired, simTimeSeconds: ctx.clock.now, event: 'commands_expired' },
        `Expired ${expired.join(', ')}`
      );
    }

    for (const { command, replyTo } of ctx.commands.drainAll()) {
      const outcome = ctx.machine.process(command);
      if (replyTo === null) continue;

      const message: CommandResultMessage = { type: 'commandResult', command, outcome };
      io.to(replyTo).emit('commandResult', message);
    }
  }
}
