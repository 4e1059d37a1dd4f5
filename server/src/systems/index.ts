// ============================================
// Simulation Systems
// ============================================

import { SERVER_CONFIG } from '#shared';
import { SystemRunner } from './SystemRunner';
import { SystemPriority } from './types';
import { ClockSystem } from './ClockSystem';
import { ObservationIntakeSystem } from './ObservationIntakeSystem';
import { CommandIntakeSystem } from './CommandIntakeSystem';
import { MotionSystem } from './MotionSystem';
import { IntegrationSystem } from './IntegrationSystem';
import { TelemetryBroadcastSystem } from './TelemetryBroadcastSystem';

export { SystemRunner } from './SystemRunner';
export { SystemPriority } from './types';
export type { System } from './types';
export { createSimulationContext } from './SimulationContext';
export type { SimulationContext, SimulationOptions, QueuedCommand } from './SimulationContext';
export { buildVehicleState } from './TelemetryBroadcastSystem';

/**
 * Runner with every simulation system registered in tick order
 */
export function createSimulationRunner(telemetryRateHz: number = SERVER_CONFIG.TELEMETRY_RATE): SystemRunner {
  const runner = new SystemRunner();
  runner.register(new ClockSystem(), SystemPriority.CLOCK);
  runner.register(new ObservationIntakeSystem(), SystemPriority.OBSERVATION_INTAKE);
  runner.register(new CommandIntakeSystem(), SystemPriority.COMMAND_INTAKE);
  runner.register(new MotionSystem(), SystemPriority.MOTION);
  runner.register(new IntegrationSystem(), SystemPriority.INTEGRATION);
  runner.register(new TelemetryBroadcastSystem(telemetryRateHz), SystemPriority.TELEMETRY);
  return runner;
}
