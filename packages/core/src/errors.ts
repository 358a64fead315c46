/**
 * Error types surfaced by a synchronization pass.
 */

import type { GUID, Timestamp } from "./types.js";

export type SyncErrorKind =
  | "client_unavailable"
  | "codec"
  | "storage"
  | "network"
  | "precondition_failed"
  | "in_progress"
  | "unexpected";

/**
 * Base class for every failure a pass can report.
 */
export abstract class SyncError extends Error {
  abstract readonly kind: SyncErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * No collection client could be obtained; the pass cannot start fetching.
 */
export class ClientUnavailableError extends SyncError {
  readonly kind = "client_unavailable";

  constructor(readonly collection: string, cause?: unknown) {
    super(`Couldn't make ${collection} client`, { cause });
  }
}

/**
 * An incoming payload could not be decoded.
 */
export class CodecError extends SyncError {
  readonly kind = "codec";

  constructor(readonly guid: GUID, detail: string) {
    super(`Malformed record ${guid}: ${detail}`);
  }
}

/**
 * A storage call failed. `guid` is null for calls not tied to one record.
 */
export class StorageError extends SyncError {
  readonly kind = "storage";

  constructor(readonly guid: GUID | null, cause: unknown) {
    super(
      guid === null
        ? `Storage operation failed: ${describeError(cause)}`
        : `Storage operation failed for ${guid}: ${describeError(cause)}`,
      { cause }
    );
  }
}

/**
 * A fetch or upload call failed.
 */
export class NetworkError extends SyncError {
  readonly kind: SyncErrorKind = "network";

  constructor(message: string, cause?: unknown) {
    super(message, { cause });
  }
}

/**
 * The server refused an upload because the collection changed after the
 * timestamp the client asserted.
 */
export class PreconditionFailedError extends NetworkError {
  readonly kind: SyncErrorKind = "precondition_failed";

  constructor(readonly lastTimestamp: Timestamp, readonly serverModified: Timestamp) {
    super(
      `Collection modified at ${serverModified}, after asserted timestamp ${lastTimestamp}`
    );
  }
}

/**
 * A pass was requested while another one on the same synchronizer was running.
 */
export class SyncInProgressError extends SyncError {
  readonly kind = "in_progress";

  constructor(readonly collection: string) {
    super(`A ${collection} sync is already running`);
  }
}

/**
 * Something other than a known sync failure escaped a pass, such as a bug in
 * a driver or the gate. The message keeps the original error's class.
 */
export class UnexpectedError extends SyncError {
  readonly kind = "unexpected";

  constructor(cause: unknown) {
    super(`Unexpected ${errorName(cause)}: ${describeError(cause)}`, { cause });
  }
}

function errorName(error: unknown): string {
  if (error instanceof Error) {
    return error.name;
  }
  return error === null ? "null" : typeof error;
}

/**
 * Render an unknown thrown value for a message.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  // Errors thrown from another realm (vm contexts, workers) fail instanceof.
  if (typeof error === "object" && error !== null) {
    const message: unknown = Reflect.get(error, "message");
    if (typeof message === "string") {
      return message;
    }
  }
  return String(error);
}
