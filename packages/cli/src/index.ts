/**
 * @histsync/cli - CLI for histsync
 */

export {
  runCollections,
  runCollectionsFromFile,
  prepareCollections,
  createSynchronizerForCollection,
  createGate,
  describeRun,
  type PreparedCollection,
  type CollectionRun,
} from "./runner.js";
export {
  loadConfigFile,
  parseConfig,
  validateConfig,
  expandEnvironmentVariables,
} from "./parser.js";
export {
  loadHistoryStorage,
  loadStorageClient,
  loadScratchpad,
  isSyncableHistory,
  isStorageClient,
  isScratchpad,
} from "./loaders.js";
export type {
  ConfigFile,
  CollectionConfigRaw,
  CollectionType,
  DriverConfig,
  BatchingConfigRaw,
} from "./config.js";
