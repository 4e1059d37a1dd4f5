// ============================================
// Command Decay Registry
// Expiry times for continuous (axis) commands
// ============================================

/**
 * CommandDecayRegistry - Makes every continuous command self-terminating
 *
 * A move/turn/ascend verb is live until `now + timeout`. A single dropped
 * or lone "move_forward" therefore produces bounded motion instead of
 * running until an explicit "stop" arrives.
 *
 * Times are simulation seconds.
 */
export class CommandDecayRegistry<K extends string = string> {
  private expiries: Map<K, number> = new Map();

  /**
   * Set (or overwrite) the expiry of a key to now + timeout
   */
  refresh(key: K, now: number, timeout: number): void {
    this.expiries.set(key, now + timeout);
  }

  /**
   * Remove and return every key whose expiry is <= now.
   * Keys come back in the order they were first registered.
   */
  tick(now: number): K[] {
    const expired: K[] = [];
    for (const [key, expiry] of this.expiries) {
      if (expiry <= now) {
        expired.push(key);
      }
    }
    for (const key of expired) {
      this.expiries.delete(key);
    }
    return expired;
  }

  remove(key: K): boolean {
    return this.expiries.delete(key);
  }

  clear(): void {
    this.expiries.clear();
  }

  has(key: K): boolean {
    return this.expiries.has(key);
  }

  getExpiry(key: K): number | undefined {
    return this.expiries.get(key);
  }

  activeKeys(): K[] {
    return [...this.expiries.keys()];
  }

  size(): number {
    return this.expiries.size;
  }
}
