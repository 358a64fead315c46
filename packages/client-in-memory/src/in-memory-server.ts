/**
 * InMemoryCollectionServer - stands in for the remote storage service.
 * Assigns server timestamps, answers incremental fetches and enforces the
 * unmodified-since precondition on uploads.
 */

import {
  PreconditionFailedError,
  type BatchResult,
  type Envelope,
  type FetchResponse,
  type GUID,
  type Timestamp,
} from "@histsync/core";

/**
 * Configuration options for InMemoryCollectionServer.
 */
export interface InMemoryCollectionServerOptions {
  /**
   * Server clock. Each write gets a timestamp strictly greater than the
   * previous one even if the clock stands still.
   */
  now?: () => Timestamp;
  /**
   * Reject uploads larger than this many records.
   */
  maxBatchSize?: number;
}

interface StoredCollection {
  records: Map<GUID, Envelope<unknown>>;
  lastModified: Timestamp;
}

export class InMemoryCollectionServer {
  private collections: Map<string, StoredCollection>;
  private lastTimestamp: Timestamp;
  private readonly now: () => Timestamp;
  private readonly maxBatchSize: number;

  constructor(options: InMemoryCollectionServerOptions = {}) {
    this.collections = new Map();
    this.lastTimestamp = 0;
    this.now = options.now ?? Date.now;
    this.maxBatchSize = options.maxBatchSize ?? Number.POSITIVE_INFINITY;
  }

  /**
   * Records modified strictly after `since`, oldest first.
   */
  fetchSince(collection: string, since: Timestamp): FetchResponse {
    const stored = this.collection(collection);
    const records = Array.from(stored.records.values())
      .filter((record) => record.modified > since)
      .sort((a, b) => a.modified - b.modified)
      .map((record) => ({ ...record }));

    // Later writes must land strictly after this response.
    this.lastTimestamp = Math.max(this.now(), this.lastTimestamp);
    return {
      records,
      fetchTimestamp: this.lastTimestamp,
      lastModified: stored.records.size > 0 ? stored.lastModified : null,
    };
  }

  /**
   * Store a batch under one new timestamp. `lastTimestamp` of 0 skips the
   * precondition check.
   */
  upload(collection: string, batch: Envelope<unknown>[], lastTimestamp: Timestamp): BatchResult {
    const stored = this.collection(collection);

    if (lastTimestamp > 0 && stored.lastModified > lastTimestamp) {
      throw new PreconditionFailedError(lastTimestamp, stored.lastModified);
    }
    if (batch.length > this.maxBatchSize) {
      throw new Error(`Batch of ${batch.length} exceeds limit of ${this.maxBatchSize}`);
    }

    const timestamp = this.nextTimestamp();
    const success: GUID[] = [];
    for (const record of batch) {
      stored.records.set(record.id, { ...record, modified: timestamp });
      success.push(record.id);
    }
    stored.lastModified = timestamp;

    return { timestamp, success, failed: {} };
  }

  // --- Helper methods for testing/debugging ---

  /**
   * Write a record as another device would, with a fresh server timestamp.
   */
  putRecord(collection: string, record: Omit<Envelope<unknown>, "modified">): Timestamp {
    const stored = this.collection(collection);
    const timestamp = this.nextTimestamp();
    stored.records.set(record.id, { ...record, modified: timestamp });
    stored.lastModified = timestamp;
    return timestamp;
  }

  getRecord(collection: string, id: GUID): Envelope<unknown> | undefined {
    return this.collections.get(collection)?.records.get(id);
  }

  getAllRecords(collection: string): Envelope<unknown>[] {
    return Array.from(this.collections.get(collection)?.records.values() ?? []);
  }

  getLastModified(collection: string): Timestamp {
    return this.collections.get(collection)?.lastModified ?? 0;
  }

  /**
   * Clear all collections (useful for testing/debugging).
   */
  clear(): void {
    this.collections.clear();
    this.lastTimestamp = 0;
  }

  private collection(name: string): StoredCollection {
    let stored = this.collections.get(name);
    if (!stored) {
      stored = { records: new Map(), lastModified: 0 };
      this.collections.set(name, stored);
    }
    return stored;
  }

  private nextTimestamp(): Timestamp {
    this.lastTimestamp = Math.max(this.now(), this.lastTimestamp + 1);
    return this.lastTimestamp;
  }
}
