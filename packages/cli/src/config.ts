/**
 * Type definitions for the JSONC configuration file format.
 * These types represent the raw configuration as it appears in the JSONC file.
 */

/**
 * A collaborator implementation: one of the built-in in-memory drivers, or a
 * module whose default export is a factory taking `options`.
 */
export type DriverConfig =
  | { driver: "in-memory" }
  | { driver: "module"; path: string; options?: { [key: string]: unknown } };

/**
 * Batch sizes (as they appear in JSONC).
 */
export interface BatchingConfigRaw {
  deletions?: number;
  modifications?: number;
}

/**
 * Collection types this runner knows how to synchronize.
 */
export type CollectionType = "history";

/**
 * Individual collection configuration (as it appears in JSONC).
 * Uses snake_case to match JSONC format.
 */
export interface CollectionConfigRaw {
  id: string;
  type: CollectionType;
  enabled?: boolean;
  schedule?: string; // Cron expression; omit for manual/CLI-only
  storage: DriverConfig;
  server: DriverConfig;
  batching?: BatchingConfigRaw;
  upload_baseline?: number;
  remote_storage_version?: number;
}

/**
 * Complete configuration file structure (as it appears in JSONC).
 */
export interface ConfigFile {
  scratchpad: DriverConfig;
  collections: CollectionConfigRaw[];
}
