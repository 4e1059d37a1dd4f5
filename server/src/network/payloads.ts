// ============================================
// Payload Validation
// Untrusted socket / HTTP payloads -> typed values
// ============================================

import { normalizeQuat } from '#shared';
import type { ControlAxes, ObservationInput, Quat, Vec3 } from '#shared';
import { parseNumber, takesNumericArguments } from '../motion/commands';

function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

function readVec3(value: unknown): Vec3 | null {
  if (typeof value !== 'object' || value === null) return null;
  const x = 'x' in value ? value.x : undefined;
  const y = 'y' in value ? value.y : undefined;
  const z = 'z' in value ? value.z : undefined;
  if (!isFiniteNumber(x) || !isFiniteNumber(y) || !isFiniteNumber(z)) return null;
  return { x, y, z };
}

function readQuat(value: unknown): Quat | null {
  if (typeof value !== 'object' || value === null) return null;
  const x = 'x' in value ? value.x : undefined;
  const y = 'y' in value ? value.y : undefined;
  const z = 'z' in value ? value.z : undefined;
  const w = 'w' in value ? value.w : undefined;
  if (!isFiniteNumber(x) || !isFiniteNumber(y) || !isFiniteNumber(z) || !isFiniteNumber(w)) return null;
  return normalizeQuat({ x, y, z, w });
}

/**
 * Split a command payload into individual command strings.
 *
 * Accepts a string, an array of strings, or `{command: string | string[]}`.
 * Strings are split as comma-separated lists and empty entries dropped. Returns null when the payload has no command field of the right type.
 */
export function readCommandList(payload: unknown): string[] | null {
  let raw: unknown = payload;
  if (typeof payload === 'object' && payload !== null && !Array.isArray(payload)) {
    raw = 'command' in payload ? payload.command : undefined;
  }

  if (typeof raw === 'string') {
    return splitCommandString(raw);
  }
  if (Array.isArray(raw)) {
    const commands: string[] = [];
    for (const entry of raw) {
      if (typeof entry !== 'string') return null;
      commands.push(...splitCommandString(entry));
    }
    return commands;
  }
  return null;
}

/**
 * "move_forward, turn_left" -> ["move_forward", "turn_left"]
 * Numeric parts after a parameterized command are its arguments:
 * "stop, move_to_coordinates:1,2,3" -> ["stop", "move_to_coordinates:1,2,3"]
 * Empty parts are dropped, except inside a numeric argument list:
 * "navigate_to_position:1,,2" keeps its empty slot and is rejected later.
 */
export function splitCommandString(text: string): string[] {
  const commands: string[] = [];
  for (const rawPart of text.split(',')) {
    const part = rawPart.trim();
    const previous = commands.length - 1;
    if (previous >= 0 && commands[previous].includes(':') && parseNumber(part) !== null) {
      commands[previous] = `${commands[previous]},${part}`;
      continue;
    }
    // An empty argument stays put so the parser sees the real arity
    if (part === '' && previous >= 0 && takesNumericArguments(commands[previous])) {
      commands[previous] = `${commands[previous]},`;
      continue;
    }
    if (part !== '') commands.push(part);
  }
  return commands;
}

/**
 * Manual axes; anything missing or non-numeric counts as 0.
 * Returns null when the payload isn't an object.
 */
export function readManualInput(payload: unknown): Partial<ControlAxes> | null {
  if (typeof payload !== 'object' || payload === null) return null;
  const axes: Partial<ControlAxes> = {};
  const forward = 'forward' in payload ? payload.forward : undefined;
  const lateral = 'lateral' in payload ? payload.lateral : undefined;
  const vertical = 'vertical' in payload ? payload.vertical : undefined;
  const yaw = 'yaw' in payload ? payload.yaw : undefined;
  if (isFiniteNumber(forward)) axes.forward = forward;
  if (isFiniteNumber(lateral)) axes.lateral = lateral;
  if (isFiniteNumber(vertical)) axes.vertical = vertical;
  if (isFiniteNumber(yaw)) axes.yaw = yaw;
  return axes;
}

/**
 * Observation from the producer. Name, tag and position are required;
 * a bad orientation or distance rejects the whole observation.
 */
export function readObservation(payload: unknown): ObservationInput | null {
  if (typeof payload !== 'object' || payload === null) return null;

  const name = 'name' in payload ? payload.name : undefined;
  const tag = 'tag' in payload ? payload.tag : undefined;
  if (typeof name !== 'string' || name.trim() === '') return null;
  if (typeof tag !== 'string' || tag.trim() === '') return null;

  const position = readVec3('position' in payload ? payload.position : undefined);
  if (!position) return null;

  const observation: ObservationInput = { name: name.trim(), tag: tag.trim(), position };

  if ('orientation' in payload && payload.orientation !== undefined) {
    const orientation = readQuat(payload.orientation);
    if (!orientation) return null;
    observation.orientation = orientation;
  }

  if ('distance' in payload && payload.distance !== undefined) {
    const distance = payload.distance;
    if (!isFiniteNumber(distance) || distance < 0) return null;
    observation.distance = distance;
  }

  return observation;
}
