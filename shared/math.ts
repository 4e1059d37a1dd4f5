// ============================================
// Shared Math Helpers
// Vector and quaternion functions for vehicle motion
// Used by both the motion core and the server shell
// ============================================

import type { Quat, Vec3 } from './types';

// Body-frame basis vectors (y-up, z-forward, x-right)
export const FORWARD: Readonly<Vec3> = { x: 0, y: 0, z: 1 };
export const RIGHT: Readonly<Vec3> = { x: 1, y: 0, z: 0 };
export const UP: Readonly<Vec3> = { x: 0, y: 1, z: 0 };

export const ZERO_VECTOR: Readonly<Vec3> = { x: 0, y: 0, z: 0 };
export const IDENTITY_QUAT: Readonly<Quat> = { x: 0, y: 0, z: 0, w: 1 };

// Below this length a direction is treated as undefined
const DIRECTION_EPSILON = 1e-6;

// ============================================
// Scalars & Angles
// ============================================

export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

export function degToRad(degrees: number): number {
  return (degrees * Math.PI) / 180;
}

export function radToDeg(radians: number): number {
  return (radians * 180) / Math.PI;
}

/**
 * Wrap an angle into [0, 360)
 */
export function normalizeDegrees(degrees: number): number {
  const wrapped = degrees % 360;
  return wrapped < 0 ? wrapped + 360 : wrapped;
}

/**
 * Signed shortest rotation from `current` to `target`, in (-180, 180].
 * Positive means turning right (clockwise seen from above).
 */
export function deltaAngle(current: number, target: number): number {
  const delta = normalizeDegrees(target - current);
  return delta > 180 ? delta - 360 : delta;
}

// ============================================
// Vectors
// ============================================

export function vec3(x: number, y: number, z: number): Vec3 {
  return { x, y, z };
}

export function add(a: Vec3, b: Vec3): Vec3 {
  return { x: a.x + b.x, y: a.y + b.y, z: a.z + b.z };
}

export function subtract(a: Vec3, b: Vec3): Vec3 {
  return { x: a.x - b.x, y: a.y - b.y, z: a.z - b.z };
}

export function scale(v: Vec3, factor: number): Vec3 {
  return { x: v.x * factor, y: v.y * factor, z: v.z * factor };
}

export function dot(a: Vec3, b: Vec3): number {
  return a.x * b.x + a.y * b.y + a.z * b.z;
}

/**
 * Length of a 3D vector
 */
export function magnitude(v: Vec3): number {
  return Math.sqrt(v.x * v.x + v.y * v.y + v.z * v.z);
}

/**
 * Euclidean distance between two points
 */
export function distance3D(a: Vec3, b: Vec3): number {
  return magnitude(subtract(a, b));
}

/**
 * Normalize to unit length. The zero vector stays zero.
 */
export function normalize(v: Vec3): Vec3 {
  const mag = magnitude(v);
  if (mag === 0) {
    return { x: 0, y: 0, z: 0 };
  }
  return { x: v.x / mag, y: v.y / mag, z: v.z / mag };
}

// ============================================
// Quaternions
// ============================================

export function quat(x: number, y: number, z: number, w: number): Quat {
  return { x, y, z, w };
}

/**
 * Normalize a quaternion. Returns null for a zero-length (or non-finite) input.
 */
export function normalizeQuat(q: Quat): Quat | null {
  const mag = Math.sqrt(q.x * q.x + q.y * q.y + q.z * q.z + q.w * q.w);
  if (!Number.isFinite(mag) || mag < DIRECTION_EPSILON) {
    return null;
  }
  return { x: q.x / mag, y: q.y / mag, z: q.z / mag, w: q.w / mag };
}

/**
 * Rotation of `degrees` about world up. Positive turns forward toward +x.
 */
export function quatFromYaw(degrees: number): Quat {
  const half = degToRad(degrees) / 2;
  return { x: 0, y: Math.sin(half), z: 0, w: Math.cos(half) };
}

/**
 * Hamilton product a * b (apply b first, then a)
 */
export function multiplyQuat(a: Quat, b: Quat): Quat {
  return {
    x: a.w * b.x + a.x * b.w + a.y * b.z - a.z * b.y,
    y: a.w * b.y - a.x * b.z + a.y * b.w + a.z * b.x,
    z: a.w * b.z + a.x * b.y - a.y * b.x + a.z * b.w,
    w: a.w * b.w - a.x * b.x - a.y * b.y - a.z * b.z,
  };
}

/**
 * Rotate a vector by a unit quaternion
 */
export function rotateVector(q: Quat, v: Vec3): Vec3 {
  // t = 2 * cross(q.xyz, v)
  const tx = 2 * (q.y * v.z - q.z * v.y);
  const ty = 2 * (q.z * v.x - q.x * v.z);
  const tz = 2 * (q.x * v.y - q.y * v.x);
  // v' = v + w * t + cross(q.xyz, t)
  return {
    x: v.x + q.w * tx + (q.y * tz - q.z * ty),
    y: v.y + q.w * ty + (q.z * tx - q.x * tz),
    z: v.z + q.w * tz + (q.x * ty - q.y * tx),
  };
}

export function quatDot(a: Quat, b: Quat): number {
  return a.x * b.x + a.y * b.y + a.z * b.z + a.w * b.w;
}

/**
 * Smallest rotation angle between two orientations, in degrees [0, 180]
 */
export function angleBetweenQuats(a: Quat, b: Quat): number {
  const d = Math.min(Math.abs(quatDot(a, b)), 1);
  return radToDeg(2 * Math.acos(d));
}

/**
 * Spherical interpolation along the shortest arc. t is clamped to [0, 1].
 */
export function slerpQuat(a: Quat, b: Quat, t: number): Quat {
  const u = clamp(t, 0, 1);
  let bx = b.x;
  let by = b.y;
  let bz = b.z;
  let bw = b.w;
  let cos = quatDot(a, b);

  // Take the short way round
  if (cos < 0) {
    cos = -cos;
    bx = -bx;
    by = -by;
    bz = -bz;
    bw = -bw;
  }

  let wa: number;
  let wb: number;
  if (cos > 0.9995) {
    // Nearly parallel - linear blend avoids dividing by ~0
    wa = 1 - u;
    wb = u;
  } else {
    const theta = Math.acos(cos);
    const sin = Math.sin(theta);
    wa = Math.sin((1 - u) * theta) / sin;
    wb = Math.sin(u * theta) / sin;
  }

  const blended = {
    x: wa * a.x + wb * bx,
    y: wa * a.y + wb * by,
    z: wa * a.z + wb * bz,
    w: wa * a.w + wb * bw,
  };
  return normalizeQuat(blended) ?? { ...b };
}

/**
 * Rotate `from` toward `to` by at most `maxDegrees`. Lands exactly on `to`
 * when the remaining angle fits in the step.
 */
export function rotateTowardsQuat(from: Quat, to: Quat, maxDegrees: number): Quat {
  const angle = angleBetweenQuats(from, to);
  if (angle <= maxDegrees || angle === 0) {
    return { ...to };
  }
  return slerpQuat(from, to, maxDegrees / angle);
}

// ============================================
// Heading
// ============================================

/**
 * Heading of the body forward vector in [0, 360). 0 faces +z, 90 faces +x.
 */
export function yawFromQuat(q: Quat): number {
  const f = rotateVector(q, FORWARD);
  return normalizeDegrees(radToDeg(Math.atan2(f.x, f.z)));
}

/**
 * Heading that faces `to` from `from` on the horizontal plane.
 * Returns null when the points are (horizontally) on top of each other.
 */
export function headingToward(from: Vec3, to: Vec3): number | null {
  const dx = to.x - from.x;
  const dz = to.z - from.z;
  if (Math.sqrt(dx * dx + dz * dz) < DIRECTION_EPSILON) {
    return null;
  }
  return normalizeDegrees(radToDeg(Math.atan2(dx, dz)));
}

/**
 * Horizontal distance between two points (ignores y)
 */
export function horizontalDistance(a: Vec3, b: Vec3): number {
  const dx = a.x - b.x;
  const dz = a.z - b.z;
  return Math.sqrt(dx * dx + dz * dz);
}
