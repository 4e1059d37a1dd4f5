// ============================================
// Motion State Machine
// Command arbitration, mode control and per-tick motion output
// ============================================

import {
  MOTION_CONFIG,
  FORWARD,
  RIGHT,
  UP,
  ZERO_VECTOR,
  add,
  angleBetweenQuats,
  clamp,
  deltaAngle,
  headingToward,
  horizontalDistance,
  magnitude,
  normalizeDegrees,
  quatFromYaw,
  rotateTowardsQuat,
  rotateVector,
  scale,
  slerpQuat,
  subtract,
  yawFromQuat,
} from '#shared';
import type {
  AxisVerb,
  CommandOutcome,
  ControlAxes,
  ControlAxis,
  MotionConfig,
  MotionMode,
  MotionOutput,
  ObservedEntityRecord,
  Quat,
  Vec3,
  VehiclePose,
} from '#shared';
import { logger, logModeCompleted } from '../logger';
import type { HistoryLog } from '../history/HistoryLog';
import type { CommandDecayRegistry } from './CommandDecayRegistry';
import type { SimulationClock } from './SimulationClock';
import { describeTarget, parseCommand } from './commands';
import type { Command, TargetRef } from './commands';

/**
 * Source of the vehicle's current pose (owned by the physics integrator)
 */
export interface PoseProvider {
  getPose(): VehiclePose;
}

export interface MotionStateMachineDeps {
  history: HistoryLog;
  decay: CommandDecayRegistry<AxisVerb>;
  pose: PoseProvider;
  clock: SimulationClock;
  config?: Partial<MotionConfig>;
}

export interface MotionSnapshot {
  mode: MotionMode;
  axes: ControlAxes;
  commandAxes: ControlAxes;
  manual: ControlAxes;
  speedMultiplier: number;
  hover: boolean;
  activeCommands: AxisVerb[];
}

// Axis and sign each continuous verb drives
const AXIS_CONTRIBUTIONS: Record<AxisVerb, { axis: ControlAxis; value: number }> = {
  move_forward: { axis: 'forward', value: 1 },
  move_backward: { axis: 'forward', value: -1 },
  move_left: { axis: 'lateral', value: -1 },
  move_right: { axis: 'lateral', value: 1 },
  ascend: { axis: 'vertical', value: 1 },
  descend: { axis: 'vertical', value: -1 },
  turn_left: { axis: 'yaw', value: -1 },
  turn_right: { axis: 'yaw', value: 1 },
};

const YAW_VERBS: readonly AxisVerb[] = ['turn_left', 'turn_right'];

const IDLE: MotionMode = { type: 'idle' };

function zeroAxes(): ControlAxes {
  return { forward: 0, lateral: 0, vertical: 0, yaw: 0 };
}

function clampAxis(value: number): number {
  return clamp(value, -1, 1);
}

function hold(velocity: Vec3): MotionOutput {
  return { velocity, rotation: { type: 'hold' } };
}

/**
 * MotionStateMachine - Turns symbolic commands into vehicle motion
 *
 * Owns the current mode, the manual input, the command speed multiplier
 * and the hover policy. Continuous verbs live in the decay registry and are
 * summed into command axes every tick; mode-setting commands replace the
 * current mode outright (the newest one wins, the old one is dropped
 * without completion).
 *
 * Called only from the simulation tick: process() for each drained command,
 * then tick() once.
 */
export class MotionStateMachine {
  private readonly config: MotionConfig;
  private readonly history: HistoryLog;
  private readonly decay: CommandDecayRegistry<AxisVerb>;
  private readonly pose: PoseProvider;
  private readonly clock: SimulationClock;

  private mode: MotionMode = IDLE;
  private manual: ControlAxes = zeroAxes();
  private speedMultiplier = 1;
  private hover: boolean;

  constructor(deps: MotionStateMachineDeps) {
    this.config = { ...MOTION_CONFIG, ...deps.config };
    this.history = deps.history;
    this.decay = deps.decay;
    this.pose = deps.pose;
    this.clock = deps.clock;
    this.hover = this.config.HOVER_WHILE_TURNING;
  }

  // ============================================
  // Command Processing
  // ============================================

  /**
   * Parse and apply one command string. Never throws: malformed and unknown
   * commands are logged once and leave all state untouched.
   */
  process(raw: string): CommandOutcome {
    const parsed = parseCommand(raw);
    if (!parsed.ok) {
      logger.warn(
        { raw, reason: parsed.reason, detail: parsed.detail, event: 'command_rejected' },
        `Rejected ${parsed.reason} command: ${parsed.detail}`
      );
      return { status: 'rejected', reason: parsed.reason, detail: parsed.detail };
    }
    return this.apply(parsed.command);
  }

  private apply(command: Command): CommandOutcome {
    switch (command.kind) {
      case 'degreeTurn': {
        const heading = yawFromQuat(this.pose.getPose().orientation);
        const signed = command.direction === 'left' ? -command.degrees : command.degrees;
        const targetYawDegrees = normalizeDegrees(heading + signed);
        for (const verb of YAW_VERBS) {
          this.decay.remove(verb);
        }
        this.enterMode({ type: 'preciseTurn', targetYawDegrees });
        break;
      }

      case 'speed':
        this.speedMultiplier = command.percent / 100;
        logger.info(
          { percent: command.percent, multiplier: this.speedMultiplier, event: 'speed_changed' },
          `Command speed multiplier set to ${this.speedMultiplier.toFixed(2)}`
        );
        break;

      case 'navigateToPosition':
        this.enterMode({
          type: 'navigateTo',
          targetPosition: command.target,
          lookAtPosition: command.lookAt,
          phase: 'travel',
        });
        break;

      case 'moveToCoordinates':
        this.enterMode({
          type: 'navigateTo',
          targetPosition: command.target,
          lookAtPosition: null,
          phase: 'travel',
        });
        break;

      case 'rotateTo':
        this.enterMode({ type: 'orientTo', targetOrientation: command.orientation });
        break;

      case 'axis':
        this.decay.refresh(command.verb, this.clock.now, this.config.COMMAND_TIMEOUT);
        logger.debug(
          { verb: command.verb, expiresAt: this.clock.now + this.config.COMMAND_TIMEOUT, event: 'axis_refreshed' },
          `Axis command ${command.verb}`
        );
        break;

      case 'stop':
        // Latched manual axes stop too, not just command-origin ones
        this.decay.clear();
        this.manual = zeroAxes();
        this.enterMode(IDLE);
        logger.info({ simTimeSeconds: this.clock.now, event: 'stop' }, 'All motion stopped');
        break;

      case 'goTo': {
        const record = this.resolve(command.target);
        if (!record) return this.unresolved(command.target);
        const { position } = this.pose.getPose();
        this.enterMode({
          type: 'navigateTo',
          targetPosition: this.approachPoint(position, record.position),
          lookAtPosition: { ...record.position },
          phase: 'travel',
        });
        break;
      }

      case 'face': {
        const record = this.resolve(command.target);
        if (!record) return this.unresolved(command.target);
        const { position, orientation } = this.pose.getPose();
        const heading = headingToward(position, record.position) ?? yawFromQuat(orientation);
        this.enterMode({ type: 'orientTo', targetOrientation: quatFromYaw(heading) });
        break;
      }

      case 'hover':
        this.hover = command.enabled;
        logger.info({ hover: this.hover, event: 'hover_changed' }, `Hover while turning ${this.hover ? 'enabled' : 'disabled'}`);
        break;

      default: {
        const unreachable: never = command;
        return unreachable;
      }
    }

    return { status: 'applied', kind: command.kind, mode: this.mode.type };
  }

  private resolve(target: TargetRef): ObservedEntityRecord | undefined {
    switch (target.by) {
      case 'tag':
        return this.history.lastByTag(target.value);
      case 'name':
        return this.history.byName(target.value);
      case 'tagOrName':
        return this.history.lastByTag(target.value) ?? this.history.byName(target.value);
      case 'latest':
        return this.history.last();
    }
  }

  private unresolved(target: TargetRef): CommandOutcome {
    const label = describeTarget(target);
    logger.warn({ target: label, event: 'target_unresolved' }, `No history record for ${label}`);
    return { status: 'unresolved', target: label };
  }

  /**
   * Stand-off point APPROACH_DISTANCE short of `subject`, on the horizontal
   * line from the subject back toward the vehicle. The vehicle's own
   * position when it is already that close.
   */
  private approachPoint(vehicle: Vec3, subject: Readonly<Vec3>): Vec3 {
    const standOff = this.config.APPROACH_DISTANCE;
    const horizontal = horizontalDistance(vehicle, subject);
    if (horizontal <= standOff) {
      return { ...vehicle };
    }
    const k = standOff / horizontal;
    return {
      x: subject.x + (vehicle.x - subject.x) * k,
      y: subject.y,
      z: subject.z + (vehicle.z - subject.z) * k,
    };
  }

  private enterMode(next: MotionMode): void {
    const previous = this.mode;
    this.mode = next;
    if (previous.type === 'idle' && next.type === 'idle') return;
    logger.info(
      {
        from: previous.type,
        to: next.type,
        preempted: previous.type !== 'idle',
        mode: next,
        event: 'mode_changed',
      },
      `Mode ${previous.type} -> ${next.type}`
    );
  }

  /**
   * Goal reached: back to Idle with every command-origin axis cleared
   */
  private complete(): void {
    logModeCompleted(this.mode.type, this.clock.now);
    this.mode = IDLE;
    this.decay.clear();
  }

  // ============================================
  // Manual Input & Accessors
  // ============================================

  setManualInput(input: Partial<ControlAxes>): void {
    this.manual = {
      forward: clampAxis(input.forward ?? 0),
      lateral: clampAxis(input.lateral ?? 0),
      vertical: clampAxis(input.vertical ?? 0),
      yaw: clampAxis(input.yaw ?? 0),
    };
  }

  getMode(): MotionMode {
    return this.mode;
  }

  getSpeedMultiplier(): number {
    return this.speedMultiplier;
  }

  isHoverEnabled(): boolean {
    return this.hover;
  }

  /**
   * Clamped sum of every live continuous command
   */
  getCommandAxes(): ControlAxes {
    const axes = zeroAxes();
    for (const verb of this.decay.activeKeys()) {
      const { axis, value } = AXIS_CONTRIBUTIONS[verb];
      axes[axis] += value;
    }
    return {
      forward: clampAxis(axes.forward),
      lateral: clampAxis(axes.lateral),
      vertical: clampAxis(axes.vertical),
      yaw: clampAxis(axes.yaw),
    };
  }

  /**
   * Manual input blended with command axes scaled by the speed multiplier
   */
  getControlAxes(): ControlAxes {
    const command = this.getCommandAxes();
    const k = this.speedMultiplier;
    return {
      forward: clampAxis(this.manual.forward + command.forward * k),
      lateral: clampAxis(this.manual.lateral + command.lateral * k),
      vertical: clampAxis(this.manual.vertical + command.vertical * k),
      yaw: clampAxis(this.manual.yaw + command.yaw * k),
    };
  }

  snapshot(): MotionSnapshot {
    return {
      mode: this.mode,
      axes: this.getControlAxes(),
      commandAxes: this.getCommandAxes(),
      manual: { ...this.manual },
      speedMultiplier: this.speedMultiplier,
      hover: this.hover,
      activeCommands: this.decay.activeKeys(),
    };
  }

  // ============================================
  // Per-Tick Motion
  // ============================================

  /**
   * Velocity and orientation change for this tick, from the current mode
   */
  tick(deltaTime: number): MotionOutput {
    const pose = this.pose.getPose();
    const mode = this.mode;
    switch (mode.type) {
      case 'idle':
        return this.tickIdle(pose, deltaTime);
      case 'preciseTurn':
        return this.tickPreciseTurn(pose, mode.targetYawDegrees, deltaTime);
      case 'orientTo':
        return this.tickOrientTo(pose, mode.targetOrientation, deltaTime);
      case 'navigateTo':
        return this.tickNavigate(pose, mode, deltaTime);
    }
  }

  /**
   * Body-frame translation from the forward/lateral/vertical axes
   */
  private axisVelocity(orientation: Quat, axes: ControlAxes): Vec3 {
    const forward = rotateVector(orientation, FORWARD);
    const right = rotateVector(orientation, RIGHT);
    const planar = add(
      scale(forward, axes.forward * this.config.MOVE_SPEED),
      scale(right, axes.lateral * this.config.MOVE_SPEED)
    );
    return add(planar, scale(UP, axes.vertical * this.config.ASCEND_SPEED));
  }

  private tickIdle(pose: VehiclePose, deltaTime: number): MotionOutput {
    const axes = this.getControlAxes();
    const velocity = this.axisVelocity(pose.orientation, axes);
    if (Math.abs(axes.yaw) <= this.config.YAW_DEADZONE) {
      return hold(velocity);
    }
    return {
      velocity,
      rotation: { type: 'yaw', degrees: axes.yaw * this.config.YAW_RATE * deltaTime },
    };
  }

  private tickPreciseTurn(pose: VehiclePose, targetYaw: number, deltaTime: number): MotionOutput {
    // Hover policy: no translation while turning to a heading
    const velocity = this.hover
      ? { ...ZERO_VECTOR }
      : this.axisVelocity(pose.orientation, this.getControlAxes());

    const delta = deltaAngle(yawFromQuat(pose.orientation), targetYaw);
    if (Math.abs(delta) <= this.config.TURN_TOLERANCE) {
      logger.info({ targetYaw, event: 'turn_complete' }, `Reached target heading ${targetYaw.toFixed(1)}°`);
      this.complete();
      return { velocity, rotation: { type: 'yaw', degrees: delta } };
    }

    const step = Math.min(Math.abs(delta), this.config.TURN_RATE * deltaTime);
    return { velocity, rotation: { type: 'yaw', degrees: Math.sign(delta) * step } };
  }

  private tickOrientTo(pose: VehiclePose, target: Quat, deltaTime: number): MotionOutput {
    // OrientTo leaves translation to the axes
    const velocity = this.axisVelocity(pose.orientation, this.getControlAxes());

    if (angleBetweenQuats(pose.orientation, target) <= this.config.ORIENT_TOLERANCE) {
      this.complete();
      return { velocity, rotation: { type: 'set', orientation: { ...target } } };
    }

    return {
      velocity,
      rotation: {
        type: 'set',
        orientation: rotateTowardsQuat(pose.orientation, target, this.config.ORIENT_RATE * deltaTime),
      },
    };
  }

  private tickNavigate(
    pose: VehiclePose,
    mode: Extract<MotionMode, { type: 'navigateTo' }>,
    deltaTime: number
  ): MotionOutput {
    if (mode.phase === 'travel') {
      const toTarget = subtract(mode.targetPosition, pose.position);
      const distance = magnitude(toTarget);

      if (distance > this.config.ARRIVAL_TOLERANCE) {
        // Don't overshoot the target on the last step
        const speed = Math.min(this.config.NAVIGATION_SPEED, distance / deltaTime);
        const velocity = scale(toTarget, speed / distance);

        const facingPoint = mode.lookAtPosition ?? mode.targetPosition;
        const heading = headingToward(pose.position, facingPoint);
        if (heading === null) {
          return hold(velocity);
        }
        const t = Math.min(1, this.config.NAVIGATION_TURN_LERP * deltaTime);
        return {
          velocity,
          rotation: { type: 'set', orientation: slerpQuat(pose.orientation, quatFromYaw(heading), t) },
        };
      }

      if (!mode.lookAtPosition) {
        this.complete();
        return hold({ ...ZERO_VECTOR });
      }

      // Arrived with a look-at point: stop translating, keep rotating
      this.mode = { ...mode, phase: 'face' };
      logger.info(
        { target: mode.targetPosition, lookAt: mode.lookAtPosition, event: 'navigation_arrived' },
        'Arrived, turning to look-at point'
      );
    }

    const lookAt = mode.lookAtPosition;
    const heading = lookAt ? headingToward(pose.position, lookAt) : null;
    if (heading === null) {
      this.complete();
      return hold({ ...ZERO_VECTOR });
    }

    const facing = quatFromYaw(heading);
    if (angleBetweenQuats(pose.orientation, facing) <= this.config.LOOK_AT_TOLERANCE) {
      this.complete();
      return { velocity: { ...ZERO_VECTOR }, rotation: { type: 'set', orientation: facing } };
    }

    return {
      velocity: { ...ZERO_VECTOR },
      rotation: {
        type: 'set',
        orientation: rotateTowardsQuat(pose.orientation, facing, this.config.ORIENT_RATE * deltaTime),
      },
    };
  }
}
