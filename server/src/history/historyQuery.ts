// ============================================
// History Query Contract
// Stable read path for the interpreter / UI layer
// ============================================

import { HISTORY_CONFIG } from '#shared';
import type { HistoryQuery, HistoryQueryResult, HistoryRecordWire, ObservedEntityRecord } from '#shared';
import type { HistoryLog } from './HistoryLog';

/**
 * Wire shape of a record (plain, mutable copy)
 */
export function toWireRecord(record: ObservedEntityRecord): HistoryRecordWire {
  return {
    name: record.name,
    tag: record.tag,
    position: { x: record.position.x, y: record.position.y, z: record.position.z },
    orientation: {
      x: record.orientation.x,
      y: record.orientation.y,
      z: record.orientation.z,
      w: record.orientation.w,
    },
    timestampSeconds: record.timestampSeconds,
    distanceMeters: record.distanceMeters,
  };
}

function isOptionalString(value: unknown): value is string | undefined {
  return value === undefined || typeof value === 'string';
}

/**
 * Validate an untrusted query payload. Returns null for a bad shape.
 */
export function readHistoryQuery(payload: unknown): HistoryQuery | null {
  if (payload === undefined || payload === null) return {};
  if (typeof payload !== 'object') return null;

  const tag = 'tag' in payload ? payload.tag : undefined;
  const name = 'name' in payload ? payload.name : undefined;
  const count = 'count' in payload ? payload.count : undefined;

  if (!isOptionalString(tag) || !isOptionalString(name)) return null;
  if (count !== undefined && (typeof count !== 'number' || !Number.isInteger(count) || count < 1)) {
    return null;
  }
  return { tag, name, count };
}

/**
 * {tag?, name?, count?} -> {found, records}
 *
 * - name: most recent record with that name
 * - tag + count: up to count records with that tag, newest first
 * - tag: most recent record with that tag
 * - neither: the `count` (default 30) most recent records
 */
export function queryHistory(log: HistoryLog, payload: unknown): HistoryQueryResult {
  const query = readHistoryQuery(payload);
  if (!query) return { found: false, records: [] };

  let records: ObservedEntityRecord[];
  if (query.name) {
    const record = log.byName(query.name);
    records = record ? [record] : [];
  } else if (query.tag && query.count !== undefined) {
    records = log.allByTag(query.tag).slice(0, query.count);
  } else if (query.tag) {
    const record = log.lastByTag(query.tag);
    records = record ? [record] : [];
  } else {
    records = log.recent(query.count ?? HISTORY_CONFIG.DEFAULT_RECENT_COUNT);
  }

  return { found: records.length > 0, records: records.map(toWireRecord) };
}
