// ============================================
// Simulation System Types
// ============================================

import type { Server } from 'socket.io';
import type { SimulationContext } from './SimulationContext';

/**
 * Base System interface
 * Every per-tick stage of the simulation implements this interface
 */
export interface System {
  /** System name for debugging/logging */
  readonly name: string;

  /**
   * Called every simulation tick
   * @param ctx Shared simulation state (clock, queues, controller, vehicle)
   * @param deltaTime Time since last tick in seconds
   * @param io Socket.io server for network replies and broadcasts
   */
  update(ctx: SimulationContext, deltaTime: number, io: Server): void;
}

/**
 * System priority - determines update order
 * Lower numbers run first
 *
 * 1. Clock (advance simulated time)
 * 2. Observation intake (history writes happen on the tick)
 * 3. Command intake (decay expiry, then queued commands in FIFO order)
 * 4. Motion (state machine output for this tick)
 * 5. Integration (apply output to the vehicle pose)
 * 6. Telemetry (broadcast state)
 */
export const SystemPriority = {
  CLOCK: 0,
  OBSERVATION_INTAKE: 100,
  COMMAND_INTAKE: 200,
  MOTION: 300,
  INTEGRATION: 400,

  // Network - runs last so clients see this tick's pose
  TELEMETRY: 900,
} as const;
