/**
 * @histsync/client-in-memory - In-memory remote collections for tests and local runs
 */

export {
  InMemoryCollectionServer,
  type InMemoryCollectionServerOptions,
} from "./in-memory-server.js";
export {
  InMemoryCollectionClient,
  InMemoryStorageClient,
  type InMemoryStorageClientOptions,
} from "./in-memory-client.js";
