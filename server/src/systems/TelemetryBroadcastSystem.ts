// ============================================
// Telemetry Broadcast System
// Sends vehicle state to every client at the telemetry rate
// ============================================

import type { Server } from 'socket.io';
import { SERVER_CONFIG, yawFromQuat } from '#shared';
import type { VehicleStateMessage } from '#shared';
import type { System } from './types';
import type { SimulationContext } from './SimulationContext';

export function buildVehicleState(ctx: SimulationContext): VehicleStateMessage {
  const { position, orientation } = ctx.body.getPose();
  const snapshot = ctx.machine.snapshot();
  return {
    type: 'vehicleState',
    simTimeSeconds: ctx.clock.now,
    position,
    orientation,
    headingDegrees: yawFromQuat(orientation),
    velocity: ctx.body.getVelocity(),
    mode: snapshot.mode.type,
    axes: snapshot.axes,
    speedMultiplier: snapshot.speedMultiplier,
    hover: snapshot.hover,
  };
}

export class TelemetryBroadcastSystem implements System {
  readonly name = 'TelemetryBroadcastSystem';
  private readonly interval: number;

  constructor(rateHz: number = SERVER_CONFIG.TELEMETRY_RATE) {
    this.interval = 1 / rateHz;
  }

  update(ctx: SimulationContext, deltaTime: number, io: Server): void {
    ctx.telemetryAccumulator += deltaTime;
    if (ctx.telemetryAccumulator < this.interval) return;

    ctx.telemetryAccumulator %= this.interval;
    io.emit('vehicleState', buildVehicleState(ctx));
  }
}
