/**
 * Core type definitions and contracts for histsync.
 * These interfaces define the protocol that storage, remote clients, scratchpads
 * and gates must implement.
 */

/**
 * Globally unique, stable record identifier.
 */
export type GUID = string;

/**
 * Server timestamp in milliseconds since the epoch.
 */
export type Timestamp = number;

/**
 * Visit time in microseconds since the epoch.
 */
export type MicrosecondTimestamp = number;

/**
 * Visit transition types as written on the wire.
 */
export const VisitType = {
  Link: 1,
  Typed: 2,
  Bookmark: 3,
  Embed: 4,
  RedirectPermanent: 5,
  RedirectTemporary: 6,
  Download: 7,
  FramedLink: 8,
  Reload: 9,
} as const;

export type VisitType = (typeof VisitType)[keyof typeof VisitType];

/**
 * A single visit to a place. Visits are append-only and identified by
 * their (date, type) pair.
 */
export interface Visit {
  date: MicrosecondTimestamp;
  type: number;
}

/**
 * A history entry: one URL with its title.
 */
export interface Place {
  guid: GUID;
  url: string;
  title: string;
}

/**
 * A locally modified place together with the visits to upload for it.
 */
export type PlaceWithVisits = [Place, Visit[]];

/**
 * Generic wire envelope around a collection payload.
 * `modified` is assigned by the server; on outgoing envelopes it is ignored.
 */
export interface Envelope<P = unknown> {
  id: GUID;
  modified: Timestamp;
  sortindex: number;
  ttl: number;
  payload: P;
}

/**
 * Wire body of a deleted history record.
 */
export interface HistoryTombstonePayload {
  id: GUID;
  deleted: true;
}

/**
 * Wire body of a live history record.
 */
export interface HistoryLivePayload {
  id: GUID;
  visits: Visit[];
  uri: string;
  title: string;
}

export type HistoryPayload = HistoryTombstonePayload | HistoryLivePayload;

/**
 * A record after decoding: either a tombstone or a live place with visits.
 */
export type DecodedHistoryRecord =
  | { kind: "tombstone"; id: GUID }
  | { kind: "live"; id: GUID; place: Place; visits: Visit[] };

/**
 * Converts between domain records and wire envelopes.
 */
export interface RecordCodec<Entity, Payload, Decoded> {
  encode(entity: Entity, visits: Visit[]): Envelope<Payload>;
  encodeDeleted(id: GUID): Envelope<Payload>;
  /**
   * @throws CodecError if the payload is malformed
   */
  decode(envelope: Envelope<unknown>): Decoded;
}

/**
 * Local history storage as seen by the synchronizer.
 * Each call is expected to be atomic on its own; nothing is assumed across calls.
 */
export interface SyncableHistory {
  /**
   * Remove a place and all of its visits, unsynced local changes included.
   */
  deleteByIdentifier(guid: GUID, deletedAt: Timestamp): Promise<void>;

  /**
   * Insert the place if absent, otherwise overwrite its attributes.
   */
  insertOrUpdateEntity(place: Place, modifiedAt: Timestamp): Promise<void>;

  /**
   * Add visits to an existing place. Visits already present are left alone;
   * local-only visits are never removed.
   */
  mergeVisits(visits: Visit[], forGUID: GUID): Promise<void>;

  /**
   * Identifiers deleted locally and not yet uploaded.
   */
  getLocallyDeletedIdentifiers(): Promise<GUID[]>;

  /**
   * Places changed locally and not yet uploaded, with their visits.
   */
  getLocallyModifiedEntities(): Promise<PlaceWithVisits[]>;

  /**
   * Clear the dirty flag of the given places as of `uploadedAt`.
   * @returns The timestamp to carry on to the next batch
   */
  markSynchronized(guids: GUID[], uploadedAt: Timestamp): Promise<Timestamp>;

  /**
   * Forget the pending deletions of the given identifiers.
   */
  markDeletedSynchronized(guids: GUID[]): Promise<void>;

  /**
   * Run `fn` atomically. Implementations that can offer it let the applier
   * wrap each fetched page in one transaction.
   */
  inTransaction?<T>(fn: () => Promise<T>): Promise<T>;
}

/**
 * Response of an incremental fetch.
 */
export interface FetchResponse<P = unknown> {
  records: Envelope<P>[];
  /** Server time at which the response was produced. */
  fetchTimestamp: Timestamp;
  /** Last-modified time of the whole collection, when the server sends it. */
  lastModified: Timestamp | null;
}

/**
 * Result of uploading one batch.
 */
export interface BatchResult {
  /** New high-water mark assigned by the server. */
  timestamp: Timestamp;
  /** Identifiers the server accepted. Absent means the whole batch. */
  success?: GUID[];
  /** Identifiers the server rejected, with the reason. */
  failed?: { [guid: string]: string };
}

/**
 * Client for one remote collection.
 */
export interface CollectionClient<P = unknown> {
  /**
   * Fetch every record whose `modified` is strictly greater than `since`,
   * in server order.
   */
  fetchSince(since: Timestamp): Promise<FetchResponse>;

  /**
   * Upload a batch. The server refuses it if the collection changed after
   * `lastTimestamp` (0 disables the check).
   */
  upload(batch: Envelope<P>[], lastTimestamp: Timestamp): Promise<BatchResult>;
}

/**
 * Hands out collection clients. Returns null when a client cannot be built
 * (missing keys, unknown collection).
 */
export interface StorageClient {
  clientForCollection(collection: string): CollectionClient | null;
}

/**
 * Keeps per-collection cursors between passes.
 */
export interface Scratchpad {
  getLastFetched(collection: string): Promise<Timestamp>;
  setLastFetched(collection: string, timestamp: Timestamp): Promise<void>;
}

/**
 * Why a pass did not start.
 */
export type SyncNotStartedReason =
  | { kind: "engineDisabled"; collection: string }
  | { kind: "noAccount" }
  | { kind: "backoff"; remainingSeconds: number }
  | { kind: "engineFormatOutdated"; needs: number }
  | { kind: "engineFormatTooNew"; expected: number };

/**
 * Decides whether a collection may sync right now. Must not have side effects.
 */
export interface SyncGate {
  reasonToNotSync(collection: string, storageVersion: number): SyncNotStartedReason | null;
}
