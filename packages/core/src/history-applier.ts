/**
 * Applies incoming history records to local storage.
 */

import type { Logger } from "./logger.js";
import { CodecError, StorageError, SyncError } from "./errors.js";
import type {
  DecodedHistoryRecord,
  Envelope,
  RecordCodec,
  SyncableHistory,
  Timestamp,
} from "./types.js";

/**
 * Outcome of applying one fetched page.
 */
export interface PageApplyResult {
  applied: number;
  skipped: CodecError[];
}

/**
 * Apply one decoded record.
 *
 * Deletions are applied immediately and throw away local visits that haven't
 * been uploaded yet. Live records are upserted and their visits merged; both
 * steps are idempotent, so re-downloading a record is harmless.
 *
 * @throws StorageError carrying the record's identifier
 */
export async function applyIncomingRecord(
  record: DecodedHistoryRecord,
  fetchedAt: Timestamp,
  storage: SyncableHistory
): Promise<void> {
  try {
    if (record.kind === "tombstone") {
      await storage.deleteByIdentifier(record.id, fetchedAt);
      return;
    }
    await storage.insertOrUpdateEntity(record.place, fetchedAt);
    await storage.mergeVisits(record.visits, record.id);
  } catch (error) {
    if (error instanceof SyncError) {
      throw error;
    }
    throw new StorageError(record.id, error);
  }
}

/**
 * Decode and apply a page of envelopes in server order.
 *
 * Malformed records are skipped and reported in the result. The first storage
 * failure stops the page; records applied before it stay applied unless the
 * storage runs the page inside `inTransaction`.
 */
export async function applyIncomingPage(
  envelopes: Envelope<unknown>[],
  fetchedAt: Timestamp,
  storage: SyncableHistory,
  codec: RecordCodec<unknown, unknown, DecodedHistoryRecord>,
  log: Logger
): Promise<PageApplyResult> {
  const walk = async (): Promise<PageApplyResult> => {
    const result: PageApplyResult = { applied: 0, skipped: [] };

    for (const envelope of envelopes) {
      let record: DecodedHistoryRecord;
      try {
        record = codec.decode(envelope);
      } catch (error) {
        if (!(error instanceof CodecError)) {
          throw error;
        }
        log.warn({ guid: envelope.id, err: error }, "Skipping malformed record");
        result.skipped.push(error);
        continue;
      }

      // Storage failures carry the record's identifier; the caller logs them.
      await applyIncomingRecord(record, fetchedAt, storage);
      result.applied++;
    }

    return result;
  };

  if (storage.inTransaction) {
    try {
      return await storage.inTransaction(walk);
    } catch (error) {
      if (error instanceof SyncError) {
        throw error;
      }
      throw new StorageError(null, error);
    }
  }
  return walk();
}
