/**
 * InMemoryHistoryStorage - An in-memory implementation of SyncableHistory.
 * Non-persistent; for tests and local runs, never production storage.
 */

import type {
  GUID,
  Place,
  PlaceWithVisits,
  SyncableHistory,
  Timestamp,
  Visit,
} from "@histsync/core";

/**
 * Configuration options for InMemoryHistoryStorage.
 */
export interface InMemoryHistoryStorageOptions {
  /**
   * When true, `inTransaction` is offered and a failed page apply leaves no
   * trace. When false, each call stands alone.
   */
  transactional?: boolean;
  /**
   * Clock for local modification times.
   */
  now?: () => Timestamp;
}

interface StoredPlace {
  place: Place;
  /** Keyed by `${date}:${type}`. */
  visits: Map<string, Visit>;
  /** Last local change. */
  localModified: Timestamp;
  /** Server time of the last applied or uploaded version; null if never synced. */
  serverModified: Timestamp | null;
  shouldUpload: boolean;
}

interface Snapshot {
  places: Map<GUID, StoredPlace>;
  pendingDeletions: Set<GUID>;
}

function visitKey(visit: Visit): string {
  return `${visit.date}:${visit.type}`;
}

function copyStored(stored: StoredPlace): StoredPlace {
  return { ...stored, place: { ...stored.place }, visits: new Map(stored.visits) };
}

export class InMemoryHistoryStorage implements SyncableHistory {
  private places: Map<GUID, StoredPlace>;
  private pendingDeletions: Set<GUID>;
  private readonly now: () => Timestamp;

  /**
   * Present only on transactional instances.
   */
  readonly inTransaction?: <T>(fn: () => Promise<T>) => Promise<T>;

  constructor(options: InMemoryHistoryStorageOptions = {}) {
    this.places = new Map();
    this.pendingDeletions = new Set();
    this.now = options.now ?? Date.now;

    if (options.transactional) {
      this.inTransaction = async <T>(fn: () => Promise<T>): Promise<T> => {
        const snapshot = this.snapshot();
        try {
          return await fn();
        } catch (error) {
          this.restore(snapshot);
          throw error;
        }
      };
    }
  }

  // --- SyncableHistory ---

  async deleteByIdentifier(guid: GUID, _deletedAt: Timestamp): Promise<void> {
    this.places.delete(guid);
    // The server already knows about this deletion.
    this.pendingDeletions.delete(guid);
  }

  async insertOrUpdateEntity(place: Place, modifiedAt: Timestamp): Promise<void> {
    const existing = this.places.get(place.guid);
    if (existing) {
      // A version we already uploaded or applied must not clobber newer local edits.
      const seen = existing.serverModified !== null && modifiedAt <= existing.serverModified;
      if (existing.shouldUpload && seen) {
        return;
      }
      existing.place = { ...place };
      existing.serverModified = modifiedAt;
      return;
    }

    // A remote record newer than a pending local deletion brings the place back.
    this.pendingDeletions.delete(place.guid);
    this.places.set(place.guid, {
      place: { ...place },
      visits: new Map(),
      localModified: modifiedAt,
      serverModified: modifiedAt,
      shouldUpload: false,
    });
  }

  async mergeVisits(visits: Visit[], forGUID: GUID): Promise<void> {
    const stored = this.places.get(forGUID);
    if (!stored) {
      throw new Error(`No place with GUID ${forGUID}`);
    }
    for (const visit of visits) {
      const key = visitKey(visit);
      if (!stored.visits.has(key)) {
        stored.visits.set(key, { date: visit.date, type: visit.type });
      }
    }
  }

  async getLocallyDeletedIdentifiers(): Promise<GUID[]> {
    return Array.from(this.pendingDeletions);
  }

  async getLocallyModifiedEntities(): Promise<PlaceWithVisits[]> {
    const modified: PlaceWithVisits[] = [];
    for (const stored of this.places.values()) {
      if (stored.shouldUpload) {
        modified.push([{ ...stored.place }, this.sortedVisits(stored)]);
      }
    }
    return modified;
  }

  async markSynchronized(guids: GUID[], uploadedAt: Timestamp): Promise<Timestamp> {
    for (const guid of guids) {
      const stored = this.places.get(guid);
      if (stored) {
        stored.shouldUpload = false;
        stored.serverModified = uploadedAt;
      }
    }
    return uploadedAt;
  }

  async markDeletedSynchronized(guids: GUID[]): Promise<void> {
    for (const guid of guids) {
      this.pendingDeletions.delete(guid);
    }
  }

  // --- Local changes, as the browser would make them ---

  /**
   * Record a local visit, creating the place if needed. Marks it for upload.
   */
  addLocalVisit(place: Place, visit: Visit): void {
    this.insertLocalPlace(place, [visit]);
  }

  /**
   * Insert or update a place locally with extra visits. Marks it for upload.
   */
  insertLocalPlace(place: Place, visits: Visit[] = []): void {
    const stored = this.places.get(place.guid) ?? {
      place: { ...place },
      visits: new Map<string, Visit>(),
      localModified: 0,
      serverModified: null,
      shouldUpload: true,
    };
    stored.place = { ...place };
    for (const visit of visits) {
      stored.visits.set(visitKey(visit), { date: visit.date, type: visit.type });
    }
    stored.localModified = this.now();
    stored.shouldUpload = true;
    this.places.set(place.guid, stored);
    this.pendingDeletions.delete(place.guid);
  }

  /**
   * Delete a place locally. The deletion is queued for upload.
   */
  removeLocalPlace(guid: GUID): void {
    this.places.delete(guid);
    this.pendingDeletions.add(guid);
  }

  // --- Helper methods for testing/debugging ---

  /**
   * Get a place by GUID (useful for testing/debugging).
   */
  getPlace(guid: GUID): Place | undefined {
    const stored = this.places.get(guid);
    return stored ? { ...stored.place } : undefined;
  }

  /**
   * Get the visits of a place, oldest first (useful for testing/debugging).
   */
  getVisits(guid: GUID): Visit[] {
    const stored = this.places.get(guid);
    return stored ? this.sortedVisits(stored) : [];
  }

  /**
   * Server timestamp last recorded for a place (useful for testing/debugging).
   */
  getServerModified(guid: GUID): Timestamp | null {
    return this.places.get(guid)?.serverModified ?? null;
  }

  /**
   * Whether a place is waiting to be uploaded (useful for testing/debugging).
   */
  isPendingUpload(guid: GUID): boolean {
    return this.places.get(guid)?.shouldUpload ?? false;
  }

  hasPlace(guid: GUID): boolean {
    return this.places.has(guid);
  }

  getAllPlaces(): Place[] {
    return Array.from(this.places.values(), (stored) => ({ ...stored.place }));
  }

  /**
   * Clear all data (useful for testing/debugging).
   */
  clear(): void {
    this.places.clear();
    this.pendingDeletions.clear();
  }

  private sortedVisits(stored: StoredPlace): Visit[] {
    return Array.from(stored.visits.values()).sort((a, b) => a.date - b.date || a.type - b.type);
  }

  private snapshot(): Snapshot {
    const places = new Map<GUID, StoredPlace>();
    for (const [guid, stored] of this.places) {
      places.set(guid, copyStored(stored));
    }
    return { places, pendingDeletions: new Set(this.pendingDeletions) };
  }

  private restore(snapshot: Snapshot): void {
    this.places = snapshot.places;
    this.pendingDeletions = snapshot.pendingDeletions;
  }
}
