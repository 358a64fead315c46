/**
 * InMemoryScratchpad - keeps per-collection cursors in memory.
 */

import type { Scratchpad, Timestamp } from "@histsync/core";

export class InMemoryScratchpad implements Scratchpad {
  private cursors: Map<string, Timestamp>;

  constructor(initial: { [collection: string]: Timestamp } = {}) {
    this.cursors = new Map(Object.entries(initial));
  }

  /**
   * Load the cursor for a collection; 0 when it has never been fetched.
   */
  async getLastFetched(collection: string): Promise<Timestamp> {
    return this.cursors.get(collection) ?? 0;
  }

  async setLastFetched(collection: string, timestamp: Timestamp): Promise<void> {
    this.cursors.set(collection, timestamp);
  }

  /**
   * Clear all cursors (useful for testing/debugging).
   */
  clear(): void {
    this.cursors.clear();
  }
}
