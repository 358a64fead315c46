/**
 * Tests for HistorySynchronizer
 * Uses scripted clients for exact call sequences and the in-memory server for
 * multi-device flows.
 */

import { HistorySynchronizer, type SyncResult } from "../src/synchronizer";
import { HistoryCodec } from "../src/history-codec";
import { CollectionGate } from "../src/gate";
import {
  ClientUnavailableError,
  NetworkError,
  PreconditionFailedError,
  StorageError,
  SyncInProgressError,
  UnexpectedError,
} from "../src/errors";
import { createLogger } from "../src/logger";
import type { Envelope, FetchResponse, HistoryPayload, StorageClient } from "../src/types";
import { InMemoryHistoryStorage, InMemoryScratchpad } from "@histsync/storage-in-memory";
import { InMemoryCollectionServer, InMemoryStorageClient } from "@histsync/client-in-memory";
import { ScriptedCollectionClient, ScriptedStorageClient } from "./fakes";

const codec = new HistoryCodec();

function livePlace(guid: string, visits: Array<{ date: number; type: number }>, modified: number) {
  return {
    ...codec.encode({ guid, url: `https://example.com/${guid}`, title: `Title ${guid}` }, visits),
    modified,
  };
}

function tombstone(guid: string, modified: number): Envelope<HistoryPayload> {
  return { ...codec.encodeDeleted(guid), modified };
}

function createSynchronizer(
  options: { cursor?: number; gate?: CollectionGate; uploadBaseline?: number } = {}
): { synchronizer: HistorySynchronizer; scratchpad: InMemoryScratchpad } {
  const scratchpad = new InMemoryScratchpad(
    options.cursor === undefined ? {} : { history: options.cursor }
  );
  const synchronizer = new HistorySynchronizer({
    scratchpad,
    gate: options.gate ?? new CollectionGate(),
    uploadBaseline: options.uploadBaseline,
  });
  return { synchronizer, scratchpad };
}

function expectFailed(result: SyncResult): Extract<SyncResult, { status: "failed" }> {
  if (result.status !== "failed") {
    throw new Error(`Expected a failed pass, got ${result.status}`);
  }
  return result;
}

describe("HistorySynchronizer", () => {
  describe("Full pass", () => {
    it("should apply incoming records, advance the cursor and upload local changes", async () => {
      const { synchronizer, scratchpad } = createSynchronizer({ cursor: 100 });
      const storage = new InMemoryHistoryStorage();
      await storage.insertOrUpdateEntity({ guid: "a", url: "https://example.com/a", title: "A" }, 50);
      storage.insertLocalPlace({ guid: "c", url: "https://example.com/c", title: "C" }, [
        { date: 7, type: 1 },
      ]);
      const client = new ScriptedCollectionClient({
        records: [
          tombstone("a", 120),
          livePlace("b", [
            { date: 1, type: 1 },
            { date: 2, type: 2 },
          ], 150),
        ],
        fetchTimestamp: 160,
        lastModified: 150,
      });

      const result = await synchronizer.synchronizeLocalHistory(storage, new ScriptedStorageClient(client));

      expect(result).toEqual({
        status: "completed",
        stats: {
          fetched: 2,
          applied: 2,
          skipped: 0,
          deletionsUploaded: 0,
          modificationsUploaded: 1,
          lastFetched: 150,
          uploadTimestamp: 200,
        },
      });
      expect(synchronizer.state).toBe("completed");
      expect(client.fetchCalls).toEqual([100]);
      expect(storage.hasPlace("a")).toBe(false);
      expect(storage.getVisits("b")).toHaveLength(2);
      expect(client.uploadCalls.map((call) => [call.ids, call.lastTimestamp])).toEqual([[["c"], 0]]);
      expect(await scratchpad.getLastFetched("history")).toBe(150);
    });

    it("should fall back to the fetch timestamp when the server sends no last-modified time", async () => {
      const { synchronizer, scratchpad } = createSynchronizer();
      const client = new ScriptedCollectionClient({ records: [], fetchTimestamp: 300, lastModified: null });

      const result = await synchronizer.synchronizeLocalHistory(
        new InMemoryHistoryStorage(),
        new ScriptedStorageClient(client)
      );

      expect(result.status).toBe("completed");
      expect(await scratchpad.getLastFetched("history")).toBe(300);
      expect(client.uploadCalls).toEqual([]);
    });

    it("should never move the cursor back", async () => {
      const { synchronizer, scratchpad } = createSynchronizer({ cursor: 500 });
      const setLastFetched = jest.spyOn(scratchpad, "setLastFetched");
      const client = new ScriptedCollectionClient({ records: [], fetchTimestamp: 400, lastModified: 400 });

      const result = await synchronizer.synchronizeLocalHistory(
        new InMemoryHistoryStorage(),
        new ScriptedStorageClient(client)
      );

      expect(result).toMatchObject({ status: "completed", stats: { lastFetched: 500 } });
      expect(setLastFetched).not.toHaveBeenCalled();
      expect(await scratchpad.getLastFetched("history")).toBe(500);
    });

    it("should skip malformed records and still complete", async () => {
      const { synchronizer } = createSynchronizer();
      const storage = new InMemoryHistoryStorage();
      const malformed: Envelope<unknown> = {
        id: "bad",
        modified: 140,
        sortindex: 1,
        ttl: 1,
        payload: { id: "bad", visits: "nope" },
      };
      const client = new ScriptedCollectionClient({
        records: [malformed, livePlace("b", [], 150)],
        fetchTimestamp: 160,
        lastModified: 150,
      });

      const result = await synchronizer.synchronizeLocalHistory(storage, new ScriptedStorageClient(client));

      expect(result).toMatchObject({ status: "completed", stats: { fetched: 2, applied: 1, skipped: 1 } });
      expect(storage.hasPlace("b")).toBe(true);
      expect(storage.hasPlace("bad")).toBe(false);
    });

    it("should use configured batch sizes", async () => {
      const scratchpad = new InMemoryScratchpad();
      const synchronizer = new HistorySynchronizer({
        scratchpad,
        gate: new CollectionGate(),
        batching: { deletions: 1 },
      });
      const storage = new InMemoryHistoryStorage();
      storage.removeLocalPlace("x");
      storage.removeLocalPlace("y");
      const client = new ScriptedCollectionClient();

      const result = await synchronizer.synchronizeLocalHistory(storage, new ScriptedStorageClient(client));

      expect(client.uploadCalls.map((call) => call.ids)).toEqual([["x"], ["y"]]);
      expect(result).toMatchObject({
        status: "completed",
        stats: { deletionsUploaded: 2, uploadTimestamp: 300 },
      });
    });
  });

  describe("Gating", () => {
    it("should not touch anything when the gate refuses", async () => {
      const { synchronizer, scratchpad } = createSynchronizer({
        cursor: 100,
        gate: new CollectionGate({ disabled: ["history"] }),
      });
      const storage = new InMemoryHistoryStorage();
      storage.insertLocalPlace({ guid: "c", url: "https://example.com/c", title: "C" });
      const client = new ScriptedCollectionClient();
      const storageClient = new ScriptedStorageClient(client);

      const result = await synchronizer.synchronizeLocalHistory(storage, storageClient);

      expect(result).toEqual({
        status: "notStarted",
        reason: { kind: "engineDisabled", collection: "history" },
      });
      expect(synchronizer.state).toBe("notStarted");
      expect(storageClient.requested).toEqual([]);
      expect(client.fetchCalls).toEqual([]);
      expect(client.uploadCalls).toEqual([]);
      expect(storage.isPendingUpload("c")).toBe(true);
      expect(await scratchpad.getLastFetched("history")).toBe(100);
    });

    it("should ask the gate with the history storage version", async () => {
      const { synchronizer } = createSynchronizer({
        gate: new CollectionGate({ remoteVersions: { history: 2 } }),
      });

      const result = await synchronizer.synchronizeLocalHistory(
        new InMemoryHistoryStorage(),
        new ScriptedStorageClient(new ScriptedCollectionClient())
      );

      expect(synchronizer.storageVersion).toBe(1);
      expect(result).toEqual({
        status: "notStarted",
        reason: { kind: "engineFormatOutdated", needs: 2 },
      });
    });
  });

  describe("Failures", () => {
    it("should fail in fetching when no client is available", async () => {
      const { synchronizer } = createSynchronizer();

      const result = expectFailed(
        await synchronizer.synchronizeLocalHistory(new InMemoryHistoryStorage(), new ScriptedStorageClient(null))
      );

      expect(result.phase).toBe("fetching");
      expect(result.error).toBeInstanceOf(ClientUnavailableError);
      expect(result.error.message).toBe("Couldn't make history client");
      expect(synchronizer.state).toBe("failed");
    });

    it("should keep the cause when building the client throws", async () => {
      const { synchronizer } = createSynchronizer();
      const cause = new Error("missing keys");
      const storageClient: StorageClient = {
        clientForCollection: () => {
          throw cause;
        },
      };

      const result = expectFailed(
        await synchronizer.synchronizeLocalHistory(new InMemoryHistoryStorage(), storageClient)
      );

      expect(result.error.kind).toBe("client_unavailable");
      expect(result.error.cause).toBe(cause);
    });

    it("should fail in fetching on a transport error and leave everything untouched", async () => {
      const { synchronizer, scratchpad } = createSynchronizer({ cursor: 40 });
      const storage = new InMemoryHistoryStorage();
      storage.insertLocalPlace({ guid: "c", url: "https://example.com/c", title: "C" });
      const client = new ScriptedCollectionClient(new Error("offline"));

      const result = expectFailed(
        await synchronizer.synchronizeLocalHistory(storage, new ScriptedStorageClient(client))
      );

      expect(result.phase).toBe("fetching");
      expect(result.error).toBeInstanceOf(NetworkError);
      expect(result.error.message).toBe("Fetching history since 40 failed");
      expect(client.uploadCalls).toEqual([]);
      expect(storage.isPendingUpload("c")).toBe(true);
      expect(await scratchpad.getLastFetched("history")).toBe(40);
    });

    it("should fail in applying without rolling back or moving the cursor", async () => {
      const { synchronizer, scratchpad } = createSynchronizer();
      const storage = new InMemoryHistoryStorage();
      const original = storage.mergeVisits.bind(storage);
      jest.spyOn(storage, "mergeVisits").mockImplementation(async (visits, guid) => {
        if (guid === "p2") {
          throw new Error("write failed");
        }
        return original(visits, guid);
      });
      const client = new ScriptedCollectionClient({
        records: [livePlace("p1", [{ date: 1, type: 1 }], 150), livePlace("p2", [], 151)],
        fetchTimestamp: 160,
        lastModified: 151,
      });

      const result = expectFailed(
        await synchronizer.synchronizeLocalHistory(storage, new ScriptedStorageClient(client))
      );

      expect(result.phase).toBe("applying");
      expect(result.error).toMatchObject({ kind: "storage", guid: "p2" });
      expect(storage.getVisits("p1")).toEqual([{ date: 1, type: 1 }]);
      expect(await scratchpad.getLastFetched("history")).toBe(0);
      expect(client.uploadCalls).toEqual([]);
    });

    it("should keep the advanced cursor when the upload fails", async () => {
      const { synchronizer, scratchpad } = createSynchronizer();
      const storage = new InMemoryHistoryStorage();
      storage.insertLocalPlace({ guid: "c", url: "https://example.com/c", title: "C" });
      const client = new ScriptedCollectionClient({ records: [], fetchTimestamp: 300, lastModified: null });
      client.queueUploadResults(new Error("503 Service Unavailable"));

      const result = expectFailed(
        await synchronizer.synchronizeLocalHistory(storage, new ScriptedStorageClient(client))
      );

      expect(result.phase).toBe("uploading");
      expect(result.error).toBeInstanceOf(NetworkError);
      expect(await scratchpad.getLastFetched("history")).toBe(300);
      expect(storage.isPendingUpload("c")).toBe(true);
    });

    it("should log a storage failure once, from the pass", async () => {
      class ObservedSynchronizer extends HistorySynchronizer {
        get passLog() {
          return this.log;
        }
      }
      const synchronizer = new ObservedSynchronizer({
        scratchpad: new InMemoryScratchpad(),
        gate: new CollectionGate(),
        logger: createLogger("synchronizer-test"),
      });
      const error = jest.spyOn(synchronizer.passLog, "error").mockImplementation(() => undefined);
      const storage = new InMemoryHistoryStorage();
      jest.spyOn(storage, "insertOrUpdateEntity").mockRejectedValue(new Error("disk full"));
      const client = new ScriptedCollectionClient({
        records: [livePlace("p1", [], 150)],
        fetchTimestamp: 160,
        lastModified: 150,
      });

      const result = expectFailed(
        await synchronizer.synchronizeLocalHistory(storage, new ScriptedStorageClient(client))
      );

      expect(result.error).toMatchObject({ kind: "storage", guid: "p1" });
      expect(error).toHaveBeenCalledTimes(1);
      expect(error).toHaveBeenCalledWith(
        { phase: "applying", err: result.error },
        "Sync of history failed: Storage operation failed for p1: disk full"
      );
    });

    it("should report a cursor that cannot be read as a storage failure", async () => {
      const { synchronizer, scratchpad } = createSynchronizer();
      jest.spyOn(scratchpad, "getLastFetched").mockRejectedValue(new Error("cursor store offline"));
      const client = new ScriptedCollectionClient();

      const result = expectFailed(
        await synchronizer.synchronizeLocalHistory(new InMemoryHistoryStorage(), new ScriptedStorageClient(client))
      );

      expect(result.phase).toBe("fetching");
      expect(result.error).toBeInstanceOf(StorageError);
      expect(result.error.message).toBe("Storage operation failed: cursor store offline");
      expect(client.fetchCalls).toEqual([]);
    });

    it("should report a cursor that cannot be written as a storage failure", async () => {
      const { synchronizer, scratchpad } = createSynchronizer();
      jest.spyOn(scratchpad, "setLastFetched").mockRejectedValue(new Error("read-only"));
      const storage = new InMemoryHistoryStorage();
      storage.insertLocalPlace({ guid: "c", url: "https://example.com/c", title: "C" });
      const client = new ScriptedCollectionClient({ records: [], fetchTimestamp: 300, lastModified: null });

      const result = expectFailed(
        await synchronizer.synchronizeLocalHistory(storage, new ScriptedStorageClient(client))
      );

      expect(result.phase).toBe("applying");
      expect(result.error).toMatchObject({ kind: "storage", guid: null });
      expect(result.error.message).toBe("Storage operation failed: read-only");
      expect(client.uploadCalls).toEqual([]);
      expect(storage.isPendingUpload("c")).toBe(true);
    });

    it("should keep the class of an unexpected error in the failure", async () => {
      const cause = new TypeError("remoteVersions is not iterable");
      const gate = new CollectionGate();
      jest.spyOn(gate, "reasonToNotSync").mockImplementation(() => {
        throw cause;
      });
      const { synchronizer } = createSynchronizer({ gate });

      const result = expectFailed(
        await synchronizer.synchronizeLocalHistory(new InMemoryHistoryStorage(), new ScriptedStorageClient(null))
      );

      expect(result.phase).toBe("gating");
      expect(result.error).toBeInstanceOf(UnexpectedError);
      expect(result.error.kind).toBe("unexpected");
      expect(result.error.message).toBe("Unexpected TypeError: remoteVersions is not iterable");
      expect(result.error.cause).toBe(cause);
    });

    it("should refuse to run two passes at once", async () => {
      const { synchronizer } = createSynchronizer();
      const client = new ScriptedCollectionClient();
      let release: (response: FetchResponse) => void = () => {};
      jest.spyOn(client, "fetchSince").mockReturnValue(
        new Promise<FetchResponse>((resolve) => {
          release = resolve;
        })
      );
      const storage = new InMemoryHistoryStorage();
      const storageClient = new ScriptedStorageClient(client);

      const first = synchronizer.synchronizeLocalHistory(storage, storageClient);
      const second = expectFailed(await synchronizer.synchronizeLocalHistory(storage, storageClient));
      release({ records: [], fetchTimestamp: 10, lastModified: null });

      expect(second.error).toBeInstanceOf(SyncInProgressError);
      expect(second.error.message).toBe("A history sync is already running");
      expect((await first).status).toBe("completed");
    });
  });

  describe("Multiple devices", () => {
    it("should carry a visit and then its deletion between two devices", async () => {
      const server = new InMemoryCollectionServer({ now: () => 1000 });
      const storageClient = new InMemoryStorageClient({ server });
      const deviceA = createSynchronizer();
      const deviceB = createSynchronizer();
      const storageA = new InMemoryHistoryStorage();
      const storageB = new InMemoryHistoryStorage();

      storageA.addLocalVisit({ guid: "p1", url: "https://example.com/", title: "Home" }, { date: 10, type: 2 });

      const a1 = await deviceA.synchronizer.synchronizeLocalHistory(storageA, storageClient);
      expect(a1).toMatchObject({ status: "completed", stats: { lastFetched: 1000, uploadTimestamp: 1001 } });

      const b1 = await deviceB.synchronizer.synchronizeLocalHistory(storageB, storageClient);
      expect(b1).toMatchObject({ status: "completed", stats: { applied: 1, lastFetched: 1001 } });
      expect(storageB.getPlace("p1")).toEqual({ guid: "p1", url: "https://example.com/", title: "Home" });
      expect(storageB.getVisits("p1")).toEqual([{ date: 10, type: 2 }]);

      storageB.removeLocalPlace("p1");
      const b2 = await deviceB.synchronizer.synchronizeLocalHistory(storageB, storageClient);
      expect(b2).toMatchObject({ status: "completed", stats: { fetched: 0, deletionsUploaded: 1 } });

      const a2 = await deviceA.synchronizer.synchronizeLocalHistory(storageA, storageClient);
      expect(a2).toMatchObject({ status: "completed", stats: { fetched: 1, applied: 1, lastFetched: 1002 } });
      expect(storageA.hasPlace("p1")).toBe(false);
      expect(await deviceA.scratchpad.getLastFetched("history")).toBe(1002);
    });

    it("should keep a local edit made after the place was uploaded", async () => {
      const server = new InMemoryCollectionServer({ now: () => 1000 });
      const storageClient = new InMemoryStorageClient({ server });
      const { synchronizer } = createSynchronizer();
      const storage = new InMemoryHistoryStorage();
      const place = { guid: "c", url: "https://example.com/c", title: "A" };

      storage.insertLocalPlace(place, [{ date: 10, type: 1 }]);
      await synchronizer.synchronizeLocalHistory(storage, storageClient);
      storage.insertLocalPlace({ ...place, title: "B" });

      const result = await synchronizer.synchronizeLocalHistory(storage, storageClient);

      expect(result).toMatchObject({
        status: "completed",
        stats: { fetched: 1, modificationsUploaded: 1, uploadTimestamp: 1002 },
      });
      expect(storage.getPlace("c")?.title).toBe("B");
      expect(server.getRecord("history", "c")?.payload).toEqual({
        id: "c",
        visits: [{ date: 10, type: 1 }],
        uri: "https://example.com/c",
        title: "B",
      });
    });

    it("should union visits made on both devices", async () => {
      const server = new InMemoryCollectionServer({ now: () => 1000 });
      const storageClient = new InMemoryStorageClient({ server });
      const deviceA = createSynchronizer();
      const deviceB = createSynchronizer();
      const storageA = new InMemoryHistoryStorage();
      const storageB = new InMemoryHistoryStorage();
      const place = { guid: "p1", url: "https://example.com/", title: "Home" };

      storageA.addLocalVisit(place, { date: 10, type: 1 });
      await deviceA.synchronizer.synchronizeLocalHistory(storageA, storageClient);
      storageB.addLocalVisit(place, { date: 20, type: 1 });
      await deviceB.synchronizer.synchronizeLocalHistory(storageB, storageClient);
      await deviceA.synchronizer.synchronizeLocalHistory(storageA, storageClient);

      const union = [
        { date: 10, type: 1 },
        { date: 20, type: 1 },
      ];
      expect(storageA.getVisits("p1")).toEqual(union);
      expect(storageB.getVisits("p1")).toEqual(union);
    });

    it("should fail the upload when another device wrote after the asserted baseline", async () => {
      const server = new InMemoryCollectionServer({ now: () => 1000 });
      server.putRecord("history", codec.encode({ guid: "other", url: "https://example.com/o", title: "O" }, []));
      const { synchronizer, scratchpad } = createSynchronizer({ uploadBaseline: 500 });
      const storage = new InMemoryHistoryStorage();
      storage.insertLocalPlace({ guid: "c", url: "https://example.com/c", title: "C" });

      const result = expectFailed(
        await synchronizer.synchronizeLocalHistory(storage, new InMemoryStorageClient({ server }))
      );

      expect(result.phase).toBe("uploading");
      expect(result.error).toBeInstanceOf(PreconditionFailedError);
      expect(storage.hasPlace("other")).toBe(true);
      expect(storage.isPendingUpload("c")).toBe(true);
      expect(await scratchpad.getLastFetched("history")).toBe(1000);
    });
  });
});
