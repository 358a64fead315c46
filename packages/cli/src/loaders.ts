/**
 * Loading of storage, remote clients and scratchpads from driver configuration.
 */

import * as path from "path";
import * as url from "url";
import type { Scratchpad, StorageClient, SyncableHistory } from "@histsync/core";
import { InMemoryHistoryStorage, InMemoryScratchpad } from "@histsync/storage-in-memory";
import { InMemoryStorageClient } from "@histsync/client-in-memory";
import type { DriverConfig } from "./config.js";

type Guard<T> = (value: unknown) => value is T;

function hasMethods(value: unknown, methods: string[]): boolean {
  if (typeof value !== "object" || value === null) {
    return false;
  }
  return methods.every((method) => method in value && typeof Reflect.get(value, method) === "function");
}

export const isSyncableHistory: Guard<SyncableHistory> = (value): value is SyncableHistory =>
  hasMethods(value, [
    "deleteByIdentifier",
    "insertOrUpdateEntity",
    "mergeVisits",
    "getLocallyDeletedIdentifiers",
    "getLocallyModifiedEntities",
    "markSynchronized",
    "markDeletedSynchronized",
  ]);

export const isStorageClient: Guard<StorageClient> = (value): value is StorageClient =>
  hasMethods(value, ["clientForCollection"]);

export const isScratchpad: Guard<Scratchpad> = (value): value is Scratchpad =>
  hasMethods(value, ["getLastFetched", "setLastFetched"]);

/**
 * Import a module and call its default export with `options`.
 * @param modulePath - Path to the module (relative to the config file or absolute)
 * @param configFilePath - Path to the config file (for resolving relative paths)
 */
async function loadFromModule<T>(
  modulePath: string,
  options: { [key: string]: unknown },
  configFilePath: string,
  guard: Guard<T>,
  what: string
): Promise<T> {
  const resolvedPath = path.isAbsolute(modulePath)
    ? modulePath
    : path.resolve(path.dirname(configFilePath), modulePath);

  let loaded: unknown;
  try {
    loaded = await import(url.pathToFileURL(resolvedPath).href);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Failed to load ${what} from '${modulePath}': ${message}`);
  }

  const factory: unknown =
    typeof loaded === "object" && loaded !== null ? Reflect.get(loaded, "default") : undefined;
  if (typeof factory !== "function") {
    throw new Error(`Module '${modulePath}' must default-export a ${what} factory function`);
  }

  const instance: unknown = await factory(options);
  if (!guard(instance)) {
    throw new Error(`Factory in '${modulePath}' did not return a valid ${what}`);
  }
  return instance;
}

/**
 * Load the local history storage for a collection.
 */
export async function loadHistoryStorage(
  driver: DriverConfig,
  configFilePath: string
): Promise<SyncableHistory> {
  if (driver.driver === "in-memory") {
    return new InMemoryHistoryStorage();
  }
  return loadFromModule(driver.path, driver.options ?? {}, configFilePath, isSyncableHistory, "history storage");
}

/**
 * Load the client for the remote service.
 */
export async function loadStorageClient(
  driver: DriverConfig,
  configFilePath: string
): Promise<StorageClient> {
  if (driver.driver === "in-memory") {
    return new InMemoryStorageClient();
  }
  return loadFromModule(driver.path, driver.options ?? {}, configFilePath, isStorageClient, "storage client");
}

/**
 * Load the scratchpad shared by every collection.
 */
export async function loadScratchpad(
  driver: DriverConfig,
  configFilePath: string
): Promise<Scratchpad> {
  if (driver.driver === "in-memory") {
    return new InMemoryScratchpad();
  }
  return loadFromModule(driver.path, driver.options ?? {}, configFilePath, isScratchpad, "scratchpad");
}
