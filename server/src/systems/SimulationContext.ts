// ============================================
// Simulation Context
// Everything the tick systems share, created once at startup
// ============================================

import { HISTORY_CONFIG, MOTION_CONFIG, ZERO_VECTOR } from '#shared';
import type { AxisVerb, MotionConfig, MotionOutput, ObservationInput, VehiclePose } from '#shared';
import { HistoryLog } from '../history/HistoryLog';
import { CommandDecayRegistry } from '../motion/CommandDecayRegistry';
import { CommandIngress } from '../motion/CommandIngress';
import { MotionStateMachine } from '../motion/MotionStateMachine';
import { SimulationClock } from '../motion/SimulationClock';
import { VehicleBody } from '../motion/integrator';

/**
 * A command waiting for the tick. replyTo is the socket that sent it,
 * or null when nobody is listening for the outcome (HTTP, scripts).
 */
export interface QueuedCommand {
  command: string;
  replyTo: string | null;
}

export interface SimulationContext {
  clock: SimulationClock;
  commands: CommandIngress<QueuedCommand>;
  observations: CommandIngress<ObservationInput>;
  decay: CommandDecayRegistry<AxisVerb>;
  history: HistoryLog;
  body: VehicleBody;
  machine: MotionStateMachine;

  // Written by MotionSystem, read by IntegrationSystem
  lastOutput: MotionOutput;

  // Seconds since the last vehicleState broadcast
  telemetryAccumulator: number;

  // Socket whose manual axes are currently latched
  manualInputOwner: string | null;
}

export interface SimulationOptions {
  motion?: Partial<MotionConfig>;
  historyMaxSize?: number;
  historyCooldown?: number;
  initialPose?: Partial<VehiclePose>;
}

export function createSimulationContext(options: SimulationOptions = {}): SimulationContext {
  const clock = new SimulationClock();
  const decay = new CommandDecayRegistry<AxisVerb>();
  const history = new HistoryLog({
    maxSize: options.historyMaxSize ?? HISTORY_CONFIG.MAX_SIZE,
    duplicateCooldown: options.historyCooldown ?? HISTORY_CONFIG.DUPLICATE_COOLDOWN,
  });
  const body = new VehicleBody(options.initialPose);
  const machine = new MotionStateMachine({
    history,
    decay,
    pose: body,
    clock,
    config: { ...MOTION_CONFIG, ...options.motion },
  });

  return {
    clock,
    commands: new CommandIngress<QueuedCommand>(),
    observations: new CommandIngress<ObservationInput>(),
    decay,
    history,
    body,
    machine,
    lastOutput: { velocity: { ...ZERO_VECTOR }, rotation: { type: 'hold' } },
    telemetryAccumulator: 0,
    manualInputOwner: null,
  };
}
