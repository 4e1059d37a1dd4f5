// ============================================
// Shared Types & Interfaces
// Vehicle pose, control axes, motion modes and observed entities
// ============================================

// World-space vector. y is up, z is the vehicle's forward at zero yaw.
export interface Vec3 {
  x: number;
  y: number;
  z: number;
}

// Unit quaternion (x, y, z = vector part, w = scalar part)
export interface Quat {
  x: number;
  y: number;
  z: number;
  w: number;
}

// Vehicle pose as seen by the motion controller
export interface VehiclePose {
  position: Vec3;
  orientation: Quat;
}

// ============================================
// Control Axes
// ============================================

// Four control axes, each in [-1, 1]
// forward: +1 forward / -1 back
// lateral: +1 right / -1 left
// vertical: +1 up / -1 down
// yaw: +1 turn right / -1 turn left
export interface ControlAxes {
  forward: number;
  lateral: number;
  vertical: number;
  yaw: number;
}

export type ControlAxis = keyof ControlAxes;

// Continuous verbs that drive a single axis while their decay entry is live.
// go_up / go_down are aliases and share the ascend / descend keys.
export type AxisVerb =
  | 'move_forward'
  | 'move_backward'
  | 'move_left'
  | 'move_right'
  | 'ascend'
  | 'descend'
  | 'turn_left'
  | 'turn_right';

// ============================================
// Motion Modes
// ============================================

// Exactly one mode is active at a time
export type MotionMode =
  | { type: 'idle' }
  | { type: 'preciseTurn'; targetYawDegrees: number }
  | { type: 'orientTo'; targetOrientation: Quat }
  | {
      type: 'navigateTo';
      targetPosition: Vec3;
      lookAtPosition: Vec3 | null;
      phase: 'travel' | 'face';
    };

export type MotionModeType = MotionMode['type'];

// Orientation change requested for a tick
export type RotationOutput =
  | { type: 'hold' }
  | { type: 'yaw'; degrees: number } // Relative, about world up; positive turns right
  | { type: 'set'; orientation: Quat }; // Absolute orientation for this tick

// Output of one motion tick, handed to the physics integrator
export interface MotionOutput {
  velocity: Vec3;
  rotation: RotationOutput;
}

// ============================================
// Interaction History
// ============================================

// Observation handed to the history log by the observation producer
export interface ObservationInput {
  name: string;
  tag: string;
  position: Vec3;
  orientation?: Quat;
  distance?: number;
}

// Immutable record owned by the history log
export interface ObservedEntityRecord {
  readonly name: string;
  readonly tag: string;
  readonly position: Readonly<Vec3>;
  readonly orientation: Readonly<Quat>;
  readonly timestampSeconds: number;
  readonly distanceMeters: number;
}
