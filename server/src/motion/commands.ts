// ============================================
// Command Parsing
// Turns raw command strings into a closed Command union
// ============================================

import { MOTION_CONFIG, clamp, normalizeQuat } from '#shared';
import type { AxisVerb, Quat, RejectionReason, Vec3 } from '#shared';

// ============================================
// Command Types
// ============================================

// How a symbolic target is looked up in the history log
export type TargetRef =
  | { by: 'tagOrName'; value: string } // go_to:<x> - tag first, then name
  | { by: 'tag'; value: string }
  | { by: 'name'; value: string }
  | { by: 'latest' }; // Most recent record of any kind

export type TurnDirection = 'left' | 'right';

export type Command =
  | { kind: 'degreeTurn'; degrees: number; direction: TurnDirection | null }
  | { kind: 'speed'; percent: number }
  | { kind: 'navigateToPosition'; target: Vec3; lookAt: Vec3 }
  | { kind: 'moveToCoordinates'; target: Vec3 }
  | { kind: 'rotateTo'; orientation: Quat }
  | { kind: 'axis'; verb: AxisVerb }
  | { kind: 'stop' }
  | { kind: 'goTo'; target: TargetRef }
  | { kind: 'face'; target: TargetRef }
  | { kind: 'hover'; enabled: boolean };

export type ParseResult =
  | { ok: true; command: Command }
  | { ok: false; reason: RejectionReason; detail: string };

// A parser returns null when the token is not its verb, so the next one can try
type CommandParser = (token: string) => ParseResult | null;

// Simple verbs and the decay key each one drives
const AXIS_VERBS = new Map<string, AxisVerb>([
  ['move_forward', 'move_forward'],
  ['move_backward', 'move_backward'],
  ['move_left', 'move_left'],
  ['move_right', 'move_right'],
  ['ascend', 'ascend'],
  ['go_up', 'ascend'],
  ['descend', 'descend'],
  ['go_down', 'descend'],
  ['turn_left', 'turn_left'],
  ['turn_right', 'turn_right'],
]);

// Parameterized verbs whose arguments are all numbers
const NUMERIC_VERBS: ReadonlySet<string> = new Set(['navigate_to_position', 'move_to_coordinates', 'rotate_to']);

// ============================================
// Helpers
// ============================================

const NUMBER_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Strict float parse: rejects empty strings, hex, "Infinity" and trailing junk
 */
export function parseNumber(text: string): number | null {
  const trimmed = text.trim();
  if (!NUMBER_PATTERN.test(trimmed)) return null;
  const value = Number(trimmed);
  return Number.isFinite(value) ? value : null;
}

/**
 * True for "navigate_to_position:..." style tokens, whatever their arguments
 */
export function takesNumericArguments(raw: string): boolean {
  const colon = raw.indexOf(':');
  return colon !== -1 && NUMERIC_VERBS.has(normalizeToken(raw.slice(0, colon)));
}

function ok(command: Command): ParseResult {
  return { ok: true, command };
}

function malformed(detail: string): ParseResult {
  return { ok: false, reason: 'malformed', detail };
}

/**
 * Split "verb:a,b,c" into its verb and argument list.
 * Returns null when the token has no ':'.
 */
function splitParameterized(token: string): { verb: string; args: string[] } | null {
  const colon = token.indexOf(':');
  if (colon === -1) return null;
  const verb = token.slice(0, colon).trim();
  const rest = token.slice(colon + 1);
  const args = rest.trim() === '' ? [] : rest.split(',').map((arg) => arg.trim());
  return { verb, args };
}

/**
 * Parse exactly `count` floats from a parameterized verb
 */
function parseFloats(verb: string, args: string[], count: number): number[] | string {
  if (args.length !== count) {
    return `${verb} expects ${count} numbers, got ${args.length}`;
  }
  const values: number[] = [];
  for (const arg of args) {
    const value = parseNumber(arg);
    if (value === null) {
      return `${verb} argument "${arg}" is not a number`;
    }
    values.push(value);
  }
  return values;
}

// ============================================
// Parsers (in precedence order)
// ============================================

// turn_<degrees>[_left|_right]
const parseDegreeTurn: CommandParser = (token) => {
  const match = /^turn_([^_]+)(?:_(.*))?$/.exec(token);
  if (!match) return null;
  const degrees = parseNumber(match[1]);
  // turn_left / turn_right are simple verbs, not degree turns
  if (degrees === null) return null;

  const suffix = match[2];
  if (suffix === undefined) {
    return ok({ kind: 'degreeTurn', degrees, direction: null });
  }
  if (suffix === 'left' || suffix === 'right') {
    return ok({ kind: 'degreeTurn', degrees, direction: suffix });
  }
  return malformed(`unknown turn direction "${suffix}"`);
};

// speed_<percent>
const parseSpeed: CommandParser = (token) => {
  if (!token.startsWith('speed_')) return null;
  const percent = parseNumber(token.slice('speed_'.length));
  if (percent === null) {
    return malformed(`speed value "${token.slice('speed_'.length)}" is not a number`);
  }
  return ok({
    kind: 'speed',
    percent: clamp(percent, MOTION_CONFIG.SPEED_PERCENT_MIN, MOTION_CONFIG.SPEED_PERCENT_MAX),
  });
};

// navigate_to_position:x,y,z,lookAtX,lookAtY,lookAtZ
const parseNavigateToPosition: CommandParser = (token) => {
  const verb = 'navigate_to_position';
  if (token === verb) return malformed(`${verb} requires 6 numbers`);
  const parts = splitParameterized(token);
  if (!parts || parts.verb !== verb) return null;
  const values = parseFloats(verb, parts.args, 6);
  if (typeof values === 'string') return malformed(values);
  const [x, y, z, lx, ly, lz] = values;
  return ok({
    kind: 'navigateToPosition',
    target: { x, y, z },
    lookAt: { x: lx, y: ly, z: lz },
  });
};

// move_to_coordinates:x,y,z
const parseMoveToCoordinates: CommandParser = (token) => {
  const verb = 'move_to_coordinates';
  if (token === verb) return malformed(`${verb} requires 3 numbers`);
  const parts = splitParameterized(token);
  if (!parts || parts.verb !== verb) return null;
  const values = parseFloats(verb, parts.args, 3);
  if (typeof values === 'string') return malformed(values);
  const [x, y, z] = values;
  return ok({ kind: 'moveToCoordinates', target: { x, y, z } });
};

// rotate_to:x,y,z,w
const parseRotateTo: CommandParser = (token) => {
  const verb = 'rotate_to';
  if (token === verb) return malformed(`${verb} requires 4 numbers`);
  const parts = splitParameterized(token);
  if (!parts || parts.verb !== verb) return null;
  const values = parseFloats(verb, parts.args, 4);
  if (typeof values === 'string') return malformed(values);
  const [x, y, z, w] = values;
  const orientation = normalizeQuat({ x, y, z, w });
  if (!orientation) return malformed(`${verb} quaternion has zero length`);
  return ok({ kind: 'rotateTo', orientation });
};

const parseAxisVerb: CommandParser = (token) => {
  const verb = AXIS_VERBS.get(token);
  return verb ? ok({ kind: 'axis', verb }) : null;
};

const parseStop: CommandParser = (token) => (token === 'stop' ? ok({ kind: 'stop' }) : null);

// go_to:<ref>, go_to_tag:<tag>, go_to_name:<name>, go_to_last, face:<ref>, look_at:<ref>
const SYMBOLIC_VERBS = new Map<string, { kind: 'goTo' | 'face'; by: 'tagOrName' | 'tag' | 'name' }>([
  ['go_to', { kind: 'goTo', by: 'tagOrName' }],
  ['go_to_tag', { kind: 'goTo', by: 'tag' }],
  ['go_to_name', { kind: 'goTo', by: 'name' }],
  ['face', { kind: 'face', by: 'tagOrName' }],
  ['look_at', { kind: 'face', by: 'tagOrName' }],
]);

const parseSymbolicTarget: CommandParser = (token) => {
  if (token === 'go_to_last') {
    return ok({ kind: 'goTo', target: { by: 'latest' } });
  }
  if (SYMBOLIC_VERBS.has(token)) {
    return malformed(`${token} requires a target`);
  }
  const colon = token.indexOf(':');
  if (colon === -1) return null;
  const verb = SYMBOLIC_VERBS.get(token.slice(0, colon).trim());
  if (!verb) return null;
  const value = token.slice(colon + 1).trim();
  if (value === '') {
    return malformed(`${token.slice(0, colon).trim()} requires a target`);
  }
  return ok({ kind: verb.kind, target: { by: verb.by, value } });
};

const parseHover: CommandParser = (token) => {
  if (token === 'hover') return ok({ kind: 'hover', enabled: true });
  if (token === 'no_hover') return ok({ kind: 'hover', enabled: false });
  return null;
};

const PARSERS: readonly CommandParser[] = [
  parseDegreeTurn,
  parseSpeed,
  parseNavigateToPosition,
  parseMoveToCoordinates,
  parseRotateTo,
  parseAxisVerb,
  parseStop,
  parseSymbolicTarget,
  parseHover,
];

/**
 * Case-insensitive, whitespace-trimmed form used for every comparison
 */
export function normalizeToken(raw: string): string {
  return raw.trim().toLowerCase();
}

/**
 * Parse a raw command string. The first parser that claims the token wins.
 */
export function parseCommand(raw: string): ParseResult {
  const token = normalizeToken(raw);
  if (token === '') {
    return { ok: false, reason: 'unknown', detail: 'empty command' };
  }
  for (const parser of PARSERS) {
    const result = parser(token);
    if (result) return result;
  }
  return { ok: false, reason: 'unknown', detail: `unknown command "${token}"` };
}

/**
 * Human-readable label for a target reference (logs and outcomes)
 */
export function describeTarget(target: TargetRef): string {
  return target.by === 'latest' ? 'latest' : `${target.by}:${target.value}`;
}
