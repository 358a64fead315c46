/**
 * Wire everything together: parse config, load collaborators, create
 * synchronizers, run passes.
 */

import {
  CollectionGate,
  HistorySynchronizer,
  createLogger,
  formatNotStartedReason,
  type Logger,
  type Scratchpad,
  type StorageClient,
  type SyncResult,
  type SyncableHistory,
} from "@histsync/core";
import type { CollectionConfigRaw, ConfigFile } from "./config.js";
import { loadHistoryStorage, loadScratchpad, loadStorageClient } from "./loaders.js";
import { loadConfigFile } from "./parser.js";

/**
 * A collection ready to run: its synchronizer and the collaborators it syncs.
 */
export interface PreparedCollection {
  config: CollectionConfigRaw;
  synchronizer: HistorySynchronizer;
  storage: SyncableHistory;
  storageClient: StorageClient;
}

/**
 * Outcome of one collection's pass.
 */
export interface CollectionRun {
  id: string;
  result: SyncResult;
}

/**
 * Build the gate for a collection from its configuration.
 */
export function createGate(collection: CollectionConfigRaw): CollectionGate {
  return new CollectionGate({
    disabled: collection.enabled === false ? [collection.type] : [],
    remoteVersions:
      collection.remote_storage_version !== undefined
        ? { [collection.type]: collection.remote_storage_version }
        : {},
  });
}

/**
 * Create a synchronizer for one configured collection.
 * @param collection - Raw collection configuration from JSONC
 * @param scratchpad - The scratchpad shared by all collections
 * @param configFilePath - Path to the config file (for resolving module paths)
 */
export async function createSynchronizerForCollection(
  collection: CollectionConfigRaw,
  scratchpad: Scratchpad,
  configFilePath: string,
  logger: Logger
): Promise<PreparedCollection> {
  const storage = await loadHistoryStorage(collection.storage, configFilePath);
  const storageClient = await loadStorageClient(collection.server, configFilePath);

  const synchronizer = new HistorySynchronizer({
    scratchpad,
    gate: createGate(collection),
    logger: logger.child({ collectionId: collection.id }),
    batching: collection.batching,
    uploadBaseline: collection.upload_baseline,
  });

  return { config: collection, synchronizer, storage, storageClient };
}

/**
 * Prepare every collection of a configuration, or only those in `ids`.
 */
export async function prepareCollections(
  config: ConfigFile,
  configFilePath: string,
  ids?: string[],
  logger: Logger = createLogger("histsync-cli")
): Promise<Map<string, PreparedCollection>> {
  const scratchpad = await loadScratchpad(config.scratchpad, configFilePath);
  const prepared = new Map<string, PreparedCollection>();

  for (const collection of config.collections) {
    if (ids && ids.length > 0 && !ids.includes(collection.id)) {
      continue;
    }
    try {
      prepared.set(
        collection.id,
        await createSynchronizerForCollection(collection, scratchpad, configFilePath, logger)
      );
    } catch (error) {
      logger.error({ collectionId: collection.id, err: error }, "Failed to prepare collection");
      throw error;
    }
  }

  if (ids) {
    const unknown = ids.filter((id) => !prepared.has(id));
    if (unknown.length > 0) {
      throw new Error(`Unknown collection(s): ${unknown.join(", ")}`);
    }
  }

  return prepared;
}

/**
 * Run one pass for each prepared collection, one collection at a time.
 */
export async function runCollections(
  prepared: Map<string, PreparedCollection>
): Promise<CollectionRun[]> {
  const runs: CollectionRun[] = [];
  for (const [id, { synchronizer, storage, storageClient }] of prepared) {
    const result = await synchronizer.synchronizeLocalHistory(storage, storageClient);
    runs.push({ id, result });
  }
  return runs;
}

/**
 * Load a configuration file and run its collections once.
 * @param configFilePath - Path to the JSONC configuration file
 * @param ids - Optional collection IDs to run (all when omitted)
 */
export async function runCollectionsFromFile(
  configFilePath: string,
  ids?: string[]
): Promise<CollectionRun[]> {
  const config = await loadConfigFile(configFilePath);
  const prepared = await prepareCollections(config, configFilePath, ids);
  return runCollections(prepared);
}

/**
 * One-line description of a run for CLI output.
 */
export function describeRun(run: CollectionRun): string {
  const { result } = run;
  switch (result.status) {
    case "completed":
      return (
        `completed (applied ${result.stats.applied}, skipped ${result.stats.skipped}, ` +
        `uploaded ${result.stats.deletionsUploaded} deletions and ` +
        `${result.stats.modificationsUploaded} modifications)`
      );
    case "notStarted":
      return `not started: ${formatNotStartedReason(result.reason)}`;
    case "failed":
      return `failed during ${result.phase}: ${result.error.message}`;
  }
}
