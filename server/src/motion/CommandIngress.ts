// ============================================
// Command Ingress
// FIFO hand-off from network handlers to the simulation tick
// ============================================

/**
 * CommandIngress - Queue between the network side and the tick loop
 *
 * Network handlers call enqueue() as messages arrive; the tick calls
 * drainAll() once per tick. Both run on the Node event loop, so a plain
 * array is the whole synchronization story: a handler can never interleave
 * with a drain that is already running.
 *
 * The payload is opaque. Command strings are parsed (and rejected) by the
 * motion state machine, never here.
 */
export class CommandIngress<T = string> {
  private queue: T[] = [];
  private totalEnqueued = 0;

  /**
   * Append an item. Never blocks and never inspects the payload.
   */
  enqueue(item: T): void {
    this.queue.push(item);
    this.totalEnqueued++;
  }

  /**
   * Remove and return every queued item in arrival order.
   * Returns an empty array when nothing is pending.
   */
  drainAll(): T[] {
    if (this.queue.length === 0) return [];
    const drained = this.queue;
    this.queue = [];
    return drained;
  }

  /** Number of items waiting for the next drain */
  size(): number {
    return this.queue.length;
  }

  /** Items accepted since construction (for telemetry) */
  getTotalEnqueued(): number {
    return this.totalEnqueued;
  }
}
