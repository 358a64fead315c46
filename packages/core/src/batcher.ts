/**
 * Outgoing batcher - slices dirty records into upload batches and chains the
 * server timestamps from one batch to the next.
 */

import type { Logger } from "./logger.js";
import { NetworkError, StorageError, SyncError } from "./errors.js";
import type {
  BatchResult,
  CollectionClient,
  Envelope,
  GUID,
  HistoryPayload,
  Place,
  PlaceWithVisits,
  RecordCodec,
  SyncableHistory,
  Timestamp,
  DecodedHistoryRecord,
} from "./types.js";

/**
 * Maximum records per upload batch, per kind.
 */
export interface BatchingConfig {
  deletions: number;
  modifications: number;
}

/**
 * Deletions are smaller on the wire, so more of them fit in one request.
 */
export const DEFAULT_BATCHING: BatchingConfig = {
  deletions: 100,
  modifications: 50,
};

/**
 * Called after a batch is accepted, with the acknowledged identifiers and the
 * server timestamp. Returns the timestamp the next batch starts from.
 */
export type OnBatchUploaded = (guids: GUID[], timestamp: Timestamp) => Promise<Timestamp>;

/**
 * Split `items` into consecutive slices of at most `size`.
 */
export function chunk<T>(items: T[], size: number): T[][] {
  if (!Number.isInteger(size) || size < 1) {
    throw new RangeError(`Batch size must be a positive integer, got ${size}`);
  }
  const batches: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    batches.push(items.slice(i, i + size));
  }
  return batches;
}

/**
 * Upload `records` in batches of `by`, strictly one after another.
 * Each batch is asserted against the previous batch's timestamp. An empty
 * list makes no call and returns `lastTimestamp`. Records the server rejects
 * are reported to `log` and left for the next pass.
 */
export async function uploadRecords<P>(
  records: Envelope<P>[],
  by: number,
  lastTimestamp: Timestamp,
  client: CollectionClient<P>,
  onUpload: OnBatchUploaded,
  log?: Logger
): Promise<Timestamp> {
  let timestamp = lastTimestamp;

  for (const batch of chunk(records, by)) {
    let result: BatchResult;
    try {
      result = await client.upload(batch, timestamp);
    } catch (error) {
      if (error instanceof SyncError) {
        throw error;
      }
      throw new NetworkError(`Upload of ${batch.length} records failed`, error);
    }

    for (const [guid, reason] of Object.entries(result.failed ?? {})) {
      log?.warn({ guid, reason }, "Server rejected record");
    }
    const acknowledged = result.success ?? batch.map((record) => record.id);
    timestamp = await onUpload(acknowledged, result.timestamp);
  }

  return timestamp;
}

export interface HistoryUploaderOptions {
  batching?: Partial<BatchingConfig>;
  log: Logger;
}

/**
 * Uploads locally deleted and locally modified places for one pass.
 */
export class HistoryUploader {
  private batching: BatchingConfig;
  private log: Logger;

  constructor(
    private storage: SyncableHistory,
    private client: CollectionClient<HistoryPayload>,
    private codec: RecordCodec<Place, HistoryPayload, DecodedHistoryRecord>,
    options: HistoryUploaderOptions
  ) {
    this.batching = { ...DEFAULT_BATCHING, ...options.batching };
    this.log = options.log;
  }

  /**
   * Upload tombstones for `guids`, then forget their pending deletions.
   */
  async uploadDeleted(guids: GUID[], startTimestamp: Timestamp): Promise<Timestamp> {
    const records = guids.map((guid) => this.codec.encodeDeleted(guid));
    return uploadRecords(
      records,
      this.batching.deletions,
      startTimestamp,
      this.client,
      async (acknowledged, timestamp) => {
        await this.storageCall(() => this.storage.markDeletedSynchronized(acknowledged));
        this.log.debug({ count: acknowledged.length, timestamp }, "Uploaded deletions");
        return timestamp;
      },
      this.log
    );
  }

  /**
   * Upload modified places, marking each acknowledged batch as synchronized.
   */
  async uploadModified(places: PlaceWithVisits[], startTimestamp: Timestamp): Promise<Timestamp> {
    const records = places.map(([place, visits]) => this.codec.encode(place, visits));
    return uploadRecords(
      records,
      this.batching.modifications,
      startTimestamp,
      this.client,
      async (acknowledged, timestamp) => {
        const next = await this.storageCall(() =>
          this.storage.markSynchronized(acknowledged, timestamp)
        );
        this.log.debug({ count: acknowledged.length, timestamp }, "Uploaded modified places");
        return next;
      },
      this.log
    );
  }

  /**
   * Read both dirty sets from storage and upload deletions, then modifications.
   */
  async uploadOutgoing(lastTimestamp: Timestamp): Promise<OutgoingResult> {
    const deleted = await this.storageCall(() => this.storage.getLocallyDeletedIdentifiers());
    const afterDeletions = await this.uploadDeleted(deleted, lastTimestamp);

    const modified = await this.storageCall(() => this.storage.getLocallyModifiedEntities());
    const timestamp = await this.uploadModified(modified, afterDeletions);

    return { timestamp, deleted: deleted.length, modified: modified.length };
  }

  private async storageCall<T>(call: () => Promise<T>): Promise<T> {
    try {
      return await call();
    } catch (error) {
      if (error instanceof SyncError) {
        throw error;
      }
      throw new StorageError(null, error);
    }
  }
}

export interface OutgoingResult {
  timestamp: Timestamp;
  deleted: number;
  modified: number;
}
