// ============================================
// History Query Contract Tests
// ============================================

import { describe, it, expect, beforeEach } from 'vitest';
import { HistoryLog } from '../HistoryLog';
import { queryHistory, readHistoryQuery } from '../historyQuery';

describe('historyQuery', () => {
  let log: HistoryLog;

  beforeEach(() => {
    log = new HistoryLog();
    log.add({ name: 'Tree1', tag: 'Nature', position: { x: 1, y: 0, z: 0 }, distance: 4 }, 0);
    log.add({ name: 'Rock1', tag: 'Stone', position: { x: 2, y: 0, z: 0 } }, 1);
    log.add({ name: 'Tree2', tag: 'Nature', position: { x: 3, y: 0, z: 0 } }, 2);
  });

  it('looks up by name first', () => {
    expect(queryHistory(log, { name: 'tree1', tag: 'Stone' })).toEqual({
      found: true,
      records: [
        {
          name: 'Tree1',
          tag: 'Nature',
          position: { x: 1, y: 0, z: 0 },
          orientation: { x: 0, y: 0, z: 0, w: 1 },
          timestampSeconds: 0,
          distanceMeters: 4,
        },
      ],
    });
  });

  it('returns the latest record for a tag', () => {
    const result = queryHistory(log, { tag: 'nature' });
    expect(result.records.map((r) => r.name)).toEqual(['Tree2']);
  });

  it('returns up to count records for a tag', () => {
    expect(queryHistory(log, { tag: 'Nature', count: 5 }).records.map((r) => r.name)).toEqual(['Tree2', 'Tree1']);
    expect(queryHistory(log, { tag: 'Nature', count: 1 }).records.map((r) => r.name)).toEqual(['Tree2']);
  });

  it('returns recent records without filters', () => {
    expect(queryHistory(log, {}).records.map((r) => r.name)).toEqual(['Tree2', 'Rock1', 'Tree1']);
    expect(queryHistory(log, undefined).records).toHaveLength(3);
    expect(queryHistory(log, { count: 1 }).records.map((r) => r.name)).toEqual(['Tree2']);
  });

  it('reports misses as not found', () => {
    expect(queryHistory(log, { name: 'Castle' })).toEqual({ found: false, records: [] });
  });

  it('treats invalid shapes as not found', () => {
    expect(queryHistory(log, { tag: 5 })).toEqual({ found: false, records: [] });
    expect(queryHistory(log, { count: 0 })).toEqual({ found: false, records: [] });
    expect(queryHistory(log, { count: 1.5 })).toEqual({ found: false, records: [] });
    expect(queryHistory(log, 'Nature')).toEqual({ found: false, records: [] });
  });

  it('validates payloads', () => {
    expect(readHistoryQuery(null)).toEqual({});
    expect(readHistoryQuery({ tag: 'a', count: 2 })).toEqual({ tag: 'a', name: undefined, count: 2 });
    expect(readHistoryQuery({ name: 7 })).toBeNull();
  });
});
