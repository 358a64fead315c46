/**
 * Synchronizers - drive one pass for one collection:
 * gate, incremental fetch, apply, upload, cursor update.
 */

import { createLogger, type Logger } from "./logger.js";
import { applyIncomingPage, type PageApplyResult } from "./history-applier.js";
import { HistoryUploader, type BatchingConfig } from "./batcher.js";
import { HistoryCodec } from "./history-codec.js";
import { formatNotStartedReason } from "./gate.js";
import {
  ClientUnavailableError,
  NetworkError,
  StorageError,
  SyncError,
  SyncInProgressError,
  UnexpectedError,
  describeError,
} from "./errors.js";
import type {
  CollectionClient,
  FetchResponse,
  Scratchpad,
  StorageClient,
  SyncGate,
  SyncNotStartedReason,
  SyncableHistory,
  Timestamp,
} from "./types.js";

/**
 * Phases of a pass. `notStarted`, `completed` and `failed` are terminal.
 */
export type SyncState =
  | "idle"
  | "gating"
  | "fetching"
  | "applying"
  | "uploading"
  | "completed"
  | "notStarted"
  | "failed";

/**
 * Counters for a completed pass.
 */
export interface SyncStats {
  fetched: number;
  applied: number;
  skipped: number;
  deletionsUploaded: number;
  modificationsUploaded: number;
  lastFetched: Timestamp;
  uploadTimestamp: Timestamp;
}

/**
 * Caller-visible outcome of a pass. There is no partial success: a pass that
 * mutated local storage and then failed is reported as failed.
 */
export type SyncResult =
  | { status: "notStarted"; reason: SyncNotStartedReason }
  | { status: "completed"; stats: SyncStats }
  | { status: "failed"; phase: SyncState; error: SyncError };

export interface CollectionSynchronizerOptions {
  scratchpad: Scratchpad;
  gate: SyncGate;
  logger?: Logger;
}

/**
 * Shared plumbing for collections whose records are independent of each other.
 */
export abstract class CollectionSynchronizer {
  protected readonly scratchpad: Scratchpad;
  protected readonly gate: SyncGate;
  protected readonly log: Logger;
  private currentState: SyncState = "idle";
  private running = false;

  constructor(readonly collection: string, options: CollectionSynchronizerOptions) {
    this.scratchpad = options.scratchpad;
    this.gate = options.gate;
    this.log = (options.logger ?? createLogger("histsync")).child({ collection });
  }

  /**
   * Bumped whenever the record format changes incompatibly.
   */
  abstract get storageVersion(): number;

  get state(): SyncState {
    return this.currentState;
  }

  protected transition(next: SyncState): void {
    this.log.debug({ from: this.currentState, to: next }, "State change");
    this.currentState = next;
  }

  protected reasonToNotSync(): SyncNotStartedReason | null {
    return this.gate.reasonToNotSync(this.collection, this.storageVersion);
  }

  protected async lastFetched(): Promise<Timestamp> {
    try {
      return await this.scratchpad.getLastFetched(this.collection);
    } catch (error) {
      throw new StorageError(null, error);
    }
  }

  /**
   * Move the cursor forward. It never goes back.
   */
  protected async advanceLastFetched(since: Timestamp, fetched: Timestamp): Promise<Timestamp> {
    const next = Math.max(since, fetched);
    if (next !== since) {
      try {
        await this.scratchpad.setLastFetched(this.collection, next);
      } catch (error) {
        throw new StorageError(null, error);
      }
    }
    return next;
  }

  protected collectionClient(storageClient: StorageClient): CollectionClient {
    let client: CollectionClient | null;
    try {
      client = storageClient.clientForCollection(this.collection);
    } catch (error) {
      throw new ClientUnavailableError(this.collection, error);
    }
    if (client === null) {
      throw new ClientUnavailableError(this.collection);
    }
    return client;
  }

  protected async fetchSince(client: CollectionClient, since: Timestamp): Promise<FetchResponse> {
    try {
      return await client.fetchSince(since);
    } catch (error) {
      if (error instanceof SyncError) {
        throw error;
      }
      throw new NetworkError(`Fetching ${this.collection} since ${since} failed`, error);
    }
  }

  /**
   * Run `pass` with state bookkeeping: refuse overlapping passes, turn thrown
   * errors into a failed result.
   */
  protected async runPass(pass: () => Promise<SyncResult>): Promise<SyncResult> {
    if (this.running) {
      return { status: "failed", phase: this.currentState, error: new SyncInProgressError(this.collection) };
    }
    this.running = true;
    this.transition("idle");

    try {
      return await pass();
    } catch (error) {
      const phase = this.currentState;
      const syncError = error instanceof SyncError ? error : new UnexpectedError(error);
      this.log.error({ phase, err: syncError }, `Sync of ${this.collection} failed: ${describeError(syncError)}`);
      this.transition("failed");
      return { status: "failed", phase, error: syncError };
    } finally {
      this.running = false;
    }
  }
}

export interface HistorySynchronizerOptions extends CollectionSynchronizerOptions {
  batching?: Partial<BatchingConfig>;
  /** Timestamp the first upload batch is asserted against. Defaults to 0. */
  uploadBaseline?: Timestamp;
}

const HISTORY_STORAGE_VERSION = 1;

/**
 * HistorySynchronizer keeps local history in step with the remote
 * "history" collection.
 */
export class HistorySynchronizer extends CollectionSynchronizer {
  private readonly codec = new HistoryCodec();
  private readonly batching?: Partial<BatchingConfig>;
  private readonly uploadBaseline: Timestamp;

  constructor(options: HistorySynchronizerOptions) {
    super("history", options);
    this.batching = options.batching;
    this.uploadBaseline = options.uploadBaseline ?? 0;
  }

  get storageVersion(): number {
    return HISTORY_STORAGE_VERSION;
  }

  /**
   * Run one pass against `history`. Never throws for a phase failure; the
   * failure is the returned result and the caller retries the whole pass.
   */
  synchronizeLocalHistory(history: SyncableHistory, storageClient: StorageClient): Promise<SyncResult> {
    return this.runPass(async () => {
      this.transition("gating");
      const reason = this.reasonToNotSync();
      if (reason) {
        this.log.info({ reason }, `Not syncing ${this.collection}: ${formatNotStartedReason(reason)}`);
        this.transition("notStarted");
        return { status: "notStarted", reason };
      }

      this.transition("fetching");
      const client = this.collectionClient(storageClient);
      const since = await this.lastFetched();
      this.log.debug({ since }, `Synchronizing ${this.collection}`);
      const response = await this.fetchSince(client, since);

      this.transition("applying");
      const fetched = response.lastModified ?? response.fetchTimestamp;
      this.log.debug(
        { timestamp: response.fetchTimestamp, lastModified: response.lastModified, records: response.records.length },
        "Applying incoming history records"
      );
      const page: PageApplyResult = await applyIncomingPage(
        response.records,
        fetched,
        history,
        this.codec,
        this.log
      );
      const lastFetched = await this.advanceLastFetched(since, fetched);

      this.transition("uploading");
      const uploader = new HistoryUploader(history, client, this.codec, {
        batching: this.batching,
        log: this.log,
      });
      const outgoing = await uploader.uploadOutgoing(this.uploadBaseline);

      this.transition("completed");
      this.log.info(
        { applied: page.applied, skipped: page.skipped.length, deleted: outgoing.deleted, modified: outgoing.modified },
        "Done syncing"
      );
      return {
        status: "completed",
        stats: {
          fetched: response.records.length,
          applied: page.applied,
          skipped: page.skipped.length,
          deletionsUploaded: outgoing.deleted,
          modificationsUploaded: outgoing.modified,
          lastFetched,
          uploadTimestamp: outgoing.timestamp,
        },
      };
    });
  }
}
