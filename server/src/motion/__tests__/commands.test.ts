// ============================================
// Command Parser Unit Tests
// ============================================

import { describe, it, expect } from 'vitest';
import { describeTarget, normalizeToken, parseCommand, parseNumber } from '../commands';

describe('commands', () => {
  describe('parseNumber', () => {
    it('parses plain decimals', () => {
      expect(parseNumber('5')).toBe(5);
      expect(parseNumber(' -2.5 ')).toBe(-2.5);
      expect(parseNumber('.5')).toBe(0.5);
      expect(parseNumber('1e3')).toBe(1000);
    });

    it('rejects anything else', () => {
      expect(parseNumber('')).toBeNull();
      expect(parseNumber('0x10')).toBeNull();
      expect(parseNumber('Infinity')).toBeNull();
      expect(parseNumber('5m')).toBeNull();
    });
  });

  it('normalizes tokens by trimming and lowercasing', () => {
    expect(normalizeToken('  Move_Forward \n')).toBe('move_forward');
  });

  describe('degree turns', () => {
    it('parses turn_<n>_left', () => {
      expect(parseCommand('  TURN_90_LEFT ')).toEqual({
        ok: true,
        command: { kind: 'degreeTurn', degrees: 90, direction: 'left' },
      });
    });

    it('parses a turn without direction', () => {
      expect(parseCommand('turn_45')).toEqual({
        ok: true,
        command: { kind: 'degreeTurn', degrees: 45, direction: null },
      });
    });

    it('leaves turn_left to the axis verbs', () => {
      expect(parseCommand('turn_left')).toEqual({ ok: true, command: { kind: 'axis', verb: 'turn_left' } });
    });

    it('rejects an unknown direction as malformed', () => {
      const result = parseCommand('turn_90_up');
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.reason).toBe('malformed');
    });
  });

  describe('speed', () => {
    it('clamps the percentage to [10, 200]', () => {
      expect(parseCommand('speed_500')).toEqual({ ok: true, command: { kind: 'speed', percent: 200 } });
      expect(parseCommand('speed_5')).toEqual({ ok: true, command: { kind: 'speed', percent: 10 } });
      expect(parseCommand('speed_50')).toEqual({ ok: true, command: { kind: 'speed', percent: 50 } });
    });

    it('rejects a non-numeric speed', () => {
      expect(parseCommand('speed_fast')).toMatchObject({ ok: false, reason: 'malformed' });
    });
  });

  describe('parameterized commands', () => {
    it('parses navigate_to_position with six floats', () => {
      expect(parseCommand('navigate_to_position:1,2,3,4,5,6')).toEqual({
        ok: true,
        command: {
          kind: 'navigateToPosition',
          target: { x: 1, y: 2, z: 3 },
          lookAt: { x: 4, y: 5, z: 6 },
        },
      });
    });

    it('parses move_to_coordinates with spaces around arguments', () => {
      expect(parseCommand('move_to_coordinates: 5, 0 ,5')).toEqual({
        ok: true,
        command: { kind: 'moveToCoordinates', target: { x: 5, y: 0, z: 5 } },
      });
    });

    it('rejects the wrong argument count', () => {
      expect(parseCommand('move_to_coordinates:5,0')).toEqual({
        ok: false,
        reason: 'malformed',
        detail: 'move_to_coordinates expects 3 numbers, got 2',
      });
    });

    it('rejects non-numeric arguments', () => {
      expect(parseCommand('move_to_coordinates:a,0,5')).toEqual({
        ok: false,
        reason: 'malformed',
        detail: 'move_to_coordinates argument "a" is not a number',
      });
    });

    it('rejects a bare parameterized verb', () => {
      expect(parseCommand('navigate_to_position')).toMatchObject({ ok: false, reason: 'malformed' });
    });

    it('normalizes rotate_to quaternions', () => {
      expect(parseCommand('rotate_to:0,0,0,2')).toEqual({
        ok: true,
        command: { kind: 'rotateTo', orientation: { x: 0, y: 0, z: 0, w: 1 } },
      });
    });

    it('rejects a zero-length rotate_to quaternion', () => {
      expect(parseCommand('rotate_to:0,0,0,0')).toEqual({
        ok: false,
        reason: 'malformed',
        detail: 'rotate_to quaternion has zero length',
      });
    });
  });

  describe('simple verbs', () => {
    it('maps go_up and go_down onto ascend and descend', () => {
      expect(parseCommand('go_up')).toEqual({ ok: true, command: { kind: 'axis', verb: 'ascend' } });
      expect(parseCommand('GO_DOWN')).toEqual({ ok: true, command: { kind: 'axis', verb: 'descend' } });
    });

    it('parses stop, hover and no_hover', () => {
      expect(parseCommand('stop')).toEqual({ ok: true, command: { kind: 'stop' } });
      expect(parseCommand('hover')).toEqual({ ok: true, command: { kind: 'hover', enabled: true } });
      expect(parseCommand('no_hover')).toEqual({ ok: true, command: { kind: 'hover', enabled: false } });
    });
  });

  describe('symbolic targets', () => {
    it('resolves go_to by tag or name', () => {
      expect(parseCommand('go_to:Nature')).toEqual({
        ok: true,
        command: { kind: 'goTo', target: { by: 'tagOrName', value: 'nature' } },
      });
    });

    it('parses the explicit lookups', () => {
      expect(parseCommand('go_to_tag:rock')).toEqual({
        ok: true,
        command: { kind: 'goTo', target: { by: 'tag', value: 'rock' } },
      });
      expect(parseCommand('go_to_name:tree1')).toEqual({
        ok: true,
        command: { kind: 'goTo', target: { by: 'name', value: 'tree1' } },
      });
      expect(parseCommand('go_to_last')).toEqual({
        ok: true,
        command: { kind: 'goTo', target: { by: 'latest' } },
      });
    });

    it('treats look_at as face', () => {
      expect(parseCommand('look_at:tree1')).toEqual({
        ok: true,
        command: { kind: 'face', target: { by: 'tagOrName', value: 'tree1' } },
      });
    });

    it('rejects a missing target', () => {
      expect(parseCommand('go_to')).toMatchObject({ ok: false, reason: 'malformed' });
      expect(parseCommand('face:  ')).toMatchObject({ ok: false, reason: 'malformed' });
    });

    it('labels targets for logs', () => {
      expect(describeTarget({ by: 'tag', value: 'rock' })).toBe('tag:rock');
      expect(describeTarget({ by: 'latest' })).toBe('latest');
    });
  });

  describe('unknown tokens', () => {
    it('reports unknown verbs', () => {
      expect(parseCommand('fly_home')).toEqual({ ok: false, reason: 'unknown', detail: 'unknown command "fly_home"' });
    });

    it('reports an empty command', () => {
      expect(parseCommand('   ')).toEqual({ ok: false, reason: 'unknown', detail: 'empty command' });
    });
  });
});
