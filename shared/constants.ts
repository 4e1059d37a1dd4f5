// ============================================
// Motion Constants & Configuration
// Defaults for the motion controller, history log and server loop
// ============================================

// ============================================
// Motion Controller
// ============================================

export const MOTION_CONFIG = {
  // Axis-driven (Idle) motion
  MOVE_SPEED: 10, // Units per second at full forward/lateral axis
  ASCEND_SPEED: 6, // Units per second at full vertical axis
  YAW_RATE: 120, // Degrees per second at full yaw axis
  YAW_DEADZONE: 0.01, // Combined yaw below this is ignored

  // Continuous command decay
  COMMAND_TIMEOUT: 2.0, // Seconds a move/turn/ascend verb stays live without refresh

  // Speed multiplier for command-origin axes (speed_<percent>)
  SPEED_PERCENT_MIN: 10,
  SPEED_PERCENT_MAX: 200,

  // PreciseTurn (turn_<degrees>[_left|_right])
  TURN_RATE: 90, // Degrees per second
  TURN_TOLERANCE: 2, // Degrees

  // OrientTo (rotate_to / face)
  ORIENT_RATE: 90, // Degrees per second
  ORIENT_TOLERANCE: 5, // Degrees

  // NavigateTo (navigate_to_position / move_to_coordinates / go_to)
  NAVIGATION_SPEED: 5, // Units per second
  NAVIGATION_TURN_LERP: 2, // Slerp factor per second while travelling
  ARRIVAL_TOLERANCE: 1, // Units
  LOOK_AT_TOLERANCE: 5, // Degrees
  APPROACH_DISTANCE: 3, // Stand-off from a symbolic target, horizontal units

  // Hover-while-turning: PreciseTurn suppresses translation
  HOVER_WHILE_TURNING: true,
};

export type MotionConfig = typeof MOTION_CONFIG;

// ============================================
// Interaction History
// ============================================

export const HISTORY_CONFIG = {
  MAX_SIZE: 50, // Oldest records are evicted beyond this
  DUPLICATE_COOLDOWN: 0.1, // Seconds before the same name+tag may be recorded again
  DEFAULT_RECENT_COUNT: 30, // Records returned by an empty history query
};

export type HistoryConfig = typeof HISTORY_CONFIG;

// ============================================
// Server Loop
// ============================================

export const SERVER_CONFIG = {
  PORT: 3000,
  TICK_RATE: 60, // Simulation ticks per second
  TELEMETRY_RATE: 10, // vehicleState broadcasts per second
  HISTORY_SUMMARY_INTERVAL_MS: 60_000, // Periodic history summary log
  SHUTDOWN_TIMEOUT_MS: 3000,
};

// Keys that may be overridden from the environment (see server/src/config.ts)
export const ENV_TUNABLE_CONFIGS = [
  'PORT',
  'TICK_RATE',
  'TELEMETRY_RATE',
  'COMMAND_TIMEOUT',
  'HISTORY_MAX_SIZE',
  'HISTORY_COOLDOWN',
] as const;

export type TunableConfigKey = (typeof ENV_TUNABLE_CONFIGS)[number];
