// ============================================
// Shared Types & Constants
// Used by the motion core, the server shell and scripts
// ============================================

// Vector and quaternion math
export * from './math';

// Motion and history constants (MOTION_CONFIG, HISTORY_CONFIG, SERVER_CONFIG)
export * from './constants';

// Type definitions (Vec3, Quat, MotionMode, ObservedEntityRecord, ...)
export * from './types';

// Network message types (Client ↔ Server)
export * from './messages';
