/**
 * @histsync/storage-in-memory - Reference storage contract and scratchpad in memory
 */

export {
  InMemoryHistoryStorage,
  type InMemoryHistoryStorageOptions,
} from "./in-memory-history-storage.js";
export { InMemoryScratchpad } from "./in-memory-scratchpad.js";
