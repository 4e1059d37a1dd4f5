// ============================================
// Network Messages
// Interpreter / client ↔ server communication types
// ============================================

import type { ControlAxes, MotionModeType, Quat, Vec3 } from './types';

// ============================================
// Command Outcomes
// ============================================

// Kinds of parsed command (closed set, see server/src/motion/commands.ts)
export type CommandKind =
  | 'degreeTurn'
  | 'speed'
  | 'navigateToPosition'
  | 'moveToCoordinates'
  | 'rotateTo'
  | 'axis'
  | 'stop'
  | 'goTo'
  | 'face'
  | 'hover';

export type RejectionReason = 'malformed' | 'unknown';

// What processing a single command string did to the vehicle
export type CommandOutcome =
  | { status: 'applied'; kind: CommandKind; mode: MotionModeType }
  | { status: 'rejected'; reason: RejectionReason; detail: string }
  | { status: 'unresolved'; target: string }; // Symbolic target not in history

// ============================================
// Network Messages (Client → Server)
// ============================================

// One command, a comma-separated list, or an array of commands
export interface CommandMessage {
  command: string | string[];
}

// Manual stick/keyboard input. Missing axes count as 0, values are clamped to [-1, 1].
export interface ManualInputMessage {
  forward?: number;
  lateral?: number;
  vertical?: number;
  yaw?: number;
}

// An entity the observation producer saw
export interface ObservationMessage {
  name: string;
  tag: string;
  position: Vec3;
  orientation?: Quat;
  distance?: number;
}

// Read-only history lookup
export interface HistoryQuery {
  tag?: string;
  name?: string;
  count?: number;
}

// ============================================
// Network Messages (Server → Client)
// ============================================

export interface HistoryRecordWire {
  name: string;
  tag: string;
  position: Vec3;
  orientation: Quat;
  timestampSeconds: number;
  distanceMeters: number;
}

export interface HistoryQueryResult {
  found: boolean;
  records: HistoryRecordWire[];
}

// Sent to the connection that issued a command once the tick processed it
export interface CommandResultMessage {
  type: 'commandResult';
  command: string;
  outcome: CommandOutcome;
}

// Periodic vehicle telemetry
export interface VehicleStateMessage {
  type: 'vehicleState';
  simTimeSeconds: number;
  position: Vec3;
  orientation: Quat;
  headingDegrees: number;
  velocity: Vec3;
  mode: MotionModeType;
  axes: ControlAxes;
  speedMultiplier: number;
  hover: boolean;
}

// Reply body for HTTP POST /command
export type CommandHttpResponse =
  | { status: 'ok'; queued: number }
  | { status: 'error'; error: string };

// ============================================
// Union Types
// ============================================

export type ServerMessage = CommandResultMessage | VehicleStateMessage;
