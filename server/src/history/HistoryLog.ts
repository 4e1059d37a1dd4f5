// ============================================
// History Log
// Bounded, deduplicated record of observed entities
// ============================================

import { HISTORY_CONFIG, IDENTITY_QUAT } from '#shared';
import type { ObservationInput, ObservedEntityRecord } from '#shared';
import { logger } from '../logger';

export interface HistoryLogOptions {
  /** Oldest records are evicted beyond this many */
  maxSize?: number;
  /** Seconds before the same name+tag may be recorded again */
  duplicateCooldown?: number;
}

export interface HistorySummary {
  total: number;
  byTag: Array<{ tag: string; count: number; latest: string }>;
}

function sameText(a: string, b: string): boolean {
  return a.toLowerCase() === b.toLowerCase();
}

/**
 * HistoryLog - What the vehicle has seen, newest last
 *
 * Insertion order is recency. Writes come from exactly one place, the
 * observation intake system on the simulation tick; network handlers only
 * ever read through the query contract.
 *
 * Records are frozen on insertion, so handing them out needs no copy.
 */
export class HistoryLog {
  readonly maxSize: number;
  readonly duplicateCooldown: number;

  private records: ObservedEntityRecord[] = [];

  constructor(options: HistoryLogOptions = {}) {
    const maxSize = options.maxSize ?? HISTORY_CONFIG.MAX_SIZE;
    const cooldown = options.duplicateCooldown ?? HISTORY_CONFIG.DUPLICATE_COOLDOWN;
    if (!Number.isInteger(maxSize) || maxSize < 1) {
      throw new RangeError(`HistoryLog maxSize must be a positive integer, got ${maxSize}`);
    }
    if (!Number.isFinite(cooldown) || cooldown < 0) {
      throw new RangeError(`HistoryLog duplicateCooldown must be >= 0, got ${cooldown}`);
    }
    this.maxSize = maxSize;
    this.duplicateCooldown = cooldown;
  }

  /**
   * Record an observation at simulation time `now`.
   * Returns false (nothing stored) when the same name+tag was recorded less
   * than duplicateCooldown seconds ago.
   */
  add(input: ObservationInput, now: number): boolean {
    for (const existing of this.records) {
      if (existing.name === input.name && existing.tag === input.tag) {
        const sinceLastSeen = now - existing.timestampSeconds;
        if (sinceLastSeen < this.duplicateCooldown) {
          logger.debug(
            { name: input.name, tag: input.tag, sinceLastSeen, event: 'history_duplicate_skipped' },
            `Skipping duplicate: ${input.name} (tag: ${input.tag})`
          );
          return false;
        }
      }
    }

    const orientation = input.orientation ?? IDENTITY_QUAT;
    const record: ObservedEntityRecord = Object.freeze({
      name: input.name,
      tag: input.tag,
      position: Object.freeze({ x: input.position.x, y: input.position.y, z: input.position.z }),
      orientation: Object.freeze({ x: orientation.x, y: orientation.y, z: orientation.z, w: orientation.w }),
      timestampSeconds: now,
      distanceMeters: input.distance ?? 0,
    });

    this.records.push(record);
    if (this.records.length > this.maxSize) {
      this.records.shift();
    }

    logger.debug(
      { name: record.name, tag: record.tag, position: record.position, size: this.records.length, event: 'history_added' },
      `Added to history: ${record.name} (tag: ${record.tag})`
    );
    return true;
  }

  /**
   * Most recent record with this tag (case-insensitive)
   */
  lastByTag(tag: string): ObservedEntityRecord | undefined {
    if (!tag) return undefined;
    return this.findLast((record) => sameText(record.tag, tag));
  }

  /**
   * Most recent record with this name (case-insensitive exact match)
   */
  byName(name: string): ObservedEntityRecord | undefined {
    if (!name) return undefined;
    return this.findLast((record) => sameText(record.name, name));
  }

  /**
   * Every record with this tag, newest first
   */
  allByTag(tag: string): ObservedEntityRecord[] {
    if (!tag) return [];
    return this.records.filter((record) => sameText(record.tag, tag)).reverse();
  }

  /**
   * Up to `count` records, newest first
   */
  recent(count: number): ObservedEntityRecord[] {
    if (count <= 0) return [];
    return this.records.slice(-count).reverse();
  }

  /** The newest record of any kind */
  last(): ObservedEntityRecord | undefined {
    return this.records[this.records.length - 1];
  }

  /**
   * Distinct tags present in the log, sorted
   */
  allTags(): string[] {
    return [...new Set(this.records.map((record) => record.tag))].sort();
  }

  size(): number {
    return this.records.length;
  }

  clear(): void {
    const removed = this.records.length;
    this.records = [];
    logger.info({ removed, event: 'history_cleared' }, `Cleared history (${removed} records removed)`);
  }

  /**
   * Per-tag counts with the latest name, most populous tag first
   */
  summarize(): HistorySummary {
    const groups = new Map<string, { count: number; latest: string }>();
    for (const record of this.records) {
      const group = groups.get(record.tag);
      if (group) {
        group.count++;
        group.latest = record.name;
      } else {
        groups.set(record.tag, { count: 1, latest: record.name });
      }
    }
    const byTag = [...groups.entries()]
      .map(([tag, group]) => ({ tag, count: group.count, latest: group.latest }))
      .sort((a, b) => b.count - a.count || a.tag.localeCompare(b.tag));
    return { total: this.records.length, byTag };
  }

  private findLast(predicate: (record: ObservedEntityRecord) => boolean): ObservedEntityRecord | undefined {
    for (let i = this.records.length - 1; i >= 0; i--) {
      if (predicate(this.records[i])) {
        return this.records[i];
      }
    }
    return undefined;
  }
}
