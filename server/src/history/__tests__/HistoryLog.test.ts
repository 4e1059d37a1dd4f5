// ============================================
// HistoryLog Unit Tests
// ============================================

import { describe, it, expect, beforeEach } from 'vitest';
import { HistoryLog } from '../HistoryLog';

const ORIGIN = { x: 0, y: 0, z: 0 };

describe('HistoryLog', () => {
  let log: HistoryLog;

  beforeEach(() => {
    log = new HistoryLog();
  });

  describe('add', () => {
    it('skips the same name and tag inside the cooldown', () => {
      expect(log.add({ name: 'Tree1', tag: 'Nature', position: ORIGIN }, 0)).toBe(true);
      expect(log.add({ name: 'Tree1', tag: 'Nature', position: ORIGIN }, 0.05)).toBe(false);
      expect(log.add({ name: 'Tree1', tag: 'Nature', position: ORIGIN }, 0.2)).toBe(true);

      expect(log.size()).toBe(2);
    });

    it('accepts a different tag inside the cooldown', () => {
      log.add({ name: 'Tree1', tag: 'Nature', position: ORIGIN }, 0);
      expect(log.add({ name: 'Tree1', tag: 'Landmark', position: ORIGIN }, 0.01)).toBe(true);
    });

    it('fills defaults and freezes records', () => {
      log.add({ name: 'Rock', tag: 'Stone', position: { x: 1, y: 2, z: 3 } }, 4);
      const record = log.last();

      expect(record).toEqual({
        name: 'Rock',
        tag: 'Stone',
        position: { x: 1, y: 2, z: 3 },
        orientation: { x: 0, y: 0, z: 0, w: 1 },
        timestampSeconds: 4,
        distanceMeters: 0,
      });
      expect(Object.isFrozen(record)).toBe(true);
      expect(Object.isFrozen(record?.position)).toBe(true);
    });

    it('copies the input position', () => {
      const position = { x: 1, y: 1, z: 1 };
      log.add({ name: 'Rock', tag: 'Stone', position }, 0);
      position.x = 50;

      expect(log.last()?.position.x).toBe(1);
    });

    it('evicts the oldest records beyond capacity', () => {
      log = new HistoryLog({ maxSize: 3 });
      for (let i = 0; i < 5; i++) {
        log.add({ name: `n${i}`, tag: 't', position: ORIGIN }, i);
      }

      expect(log.size()).toBe(3);
      expect(log.recent(10).map((r) => r.name)).toEqual(['n4', 'n3', 'n2']);
    });

    it('rejects invalid options', () => {
      expect(() => new HistoryLog({ maxSize: 0 })).toThrow(RangeError);
      expect(() => new HistoryLog({ duplicateCooldown: -1 })).toThrow(RangeError);
    });
  });

  describe('lookups', () => {
    beforeEach(() => {
      log.add({ name: 'Tree1', tag: 'Nature', position: { x: 1, y: 0, z: 0 } }, 0);
      log.add({ name: 'Rock1', tag: 'Stone', position: { x: 2, y: 0, z: 0 } }, 1);
      log.add({ name: 'Tree2', tag: 'Nature', position: { x: 3, y: 0, z: 0 } }, 2);
    });

    it('finds the latest record by tag, ignoring case', () => {
      expect(log.lastByTag('nature')?.name).toBe('Tree2');
      expect(log.lastByTag('castle')).toBeUndefined();
      expect(log.lastByTag('')).toBeUndefined();
    });

    it('finds a record by exact name, ignoring case', () => {
      expect(log.byName('ROCK1')?.position).toEqual({ x: 2, y: 0, z: 0 });
      expect(log.byName('Rock')).toBeUndefined();
    });

    it('lists every record with a tag, newest first', () => {
      expect(log.allByTag('Nature').map((r) => r.name)).toEqual(['Tree2', 'Tree1']);
    });

    it('returns recent records newest first', () => {
      expect(log.recent(2).map((r) => r.name)).toEqual(['Tree2', 'Rock1']);
      expect(log.recent(0)).toEqual([]);
    });

    it('lists distinct tags sorted', () => {
      expect(log.allTags()).toEqual(['Nature', 'Stone']);
    });

    it('summarizes per tag', () => {
      expect(log.summarize()).toEqual({
        total: 3,
        byTag: [
          { tag: 'Nature', count: 2, latest: 'Tree2' },
          { tag: 'Stone', count: 1, latest: 'Rock1' },
        ],
      });
    });

    it('clears everything', () => {
      log.clear();
      expect(log.size()).toBe(0);
      expect(log.last()).toBeUndefined();
    });
  });
});
