// ============================================
// Simulation Clock
// Seconds of simulated time, advanced once per tick
// ============================================

/**
 * Monotonic simulation time. Command expiry and history timestamps use this,
 * not wall-clock time, so a paused or slowed loop decays commands in step
 * with the motion it produces.
 */
export class SimulationClock {
  private seconds: number;
  private ticks = 0;

  constructor(startSeconds = 0) {
    this.seconds = startSeconds;
  }

  get now(): number {
    return this.seconds;
  }

  get tickCount(): number {
    return this.ticks;
  }

  advance(deltaSeconds: number): number {
    if (deltaSeconds > 0) {
      this.seconds += deltaSeconds;
    }
    this.ticks++;
    return this.seconds;
  }
}
