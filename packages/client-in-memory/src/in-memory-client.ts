/**
 * In-memory collection clients backed by an InMemoryCollectionServer.
 */

import type {
  BatchResult,
  CollectionClient,
  Envelope,
  FetchResponse,
  StorageClient,
  Timestamp,
} from "@histsync/core";
import { InMemoryCollectionServer } from "./in-memory-server.js";

/**
 * Client for one collection on the in-memory server.
 */
export class InMemoryCollectionClient<P = unknown> implements CollectionClient<P> {
  constructor(
    private readonly server: InMemoryCollectionServer,
    readonly collection: string
  ) {}

  async fetchSince(since: Timestamp): Promise<FetchResponse> {
    return this.server.fetchSince(this.collection, since);
  }

  async upload(batch: Envelope<P>[], lastTimestamp: Timestamp): Promise<BatchResult> {
    return this.server.upload(this.collection, batch, lastTimestamp);
  }
}

/**
 * Configuration options for InMemoryStorageClient.
 */
export interface InMemoryStorageClientOptions {
  server?: InMemoryCollectionServer;
  /**
   * Collections this client can hand out. All collections when omitted.
   */
  collections?: string[];
}

/**
 * Hands out collection clients for the in-memory server.
 */
export class InMemoryStorageClient implements StorageClient {
  readonly server: InMemoryCollectionServer;
  private readonly collections?: string[];

  constructor(options: InMemoryStorageClientOptions = {}) {
    this.server = options.server ?? new InMemoryCollectionServer();
    this.collections = options.collections;
  }

  clientForCollection(collection: string): CollectionClient | null {
    if (this.collections && !this.collections.includes(collection)) {
      return null;
    }
    return new InMemoryCollectionClient(this.server, collection);
  }
}
