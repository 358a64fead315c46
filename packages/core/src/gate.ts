/**
 * CollectionGate - the default "reason not to sync" predicate.
 */

import type { SyncGate, SyncNotStartedReason, Timestamp } from "./types.js";

export interface CollectionGateOptions {
  /** Collections switched off locally. */
  disabled?: string[];
  /** False when there is no signed-in account. Defaults to true. */
  hasAccount?: boolean;
  /** Engine versions advertised by the server, per collection. */
  remoteVersions?: { [collection: string]: number };
  /** Server-requested backoff, in milliseconds since the epoch. */
  backoffUntil?: Timestamp;
  now?: () => Timestamp;
}

export class CollectionGate implements SyncGate {
  constructor(private readonly options: CollectionGateOptions = {}) {}

  reasonToNotSync(collection: string, storageVersion: number): SyncNotStartedReason | null {
    const { disabled = [], hasAccount = true, remoteVersions = {}, backoffUntil } = this.options;

    if (!hasAccount) {
      return { kind: "noAccount" };
    }

    if (backoffUntil !== undefined) {
      const now = (this.options.now ?? Date.now)();
      if (backoffUntil > now) {
        return { kind: "backoff", remainingSeconds: Math.ceil((backoffUntil - now) / 1000) };
      }
    }

    if (disabled.includes(collection)) {
      return { kind: "engineDisabled", collection };
    }

    const remote = remoteVersions[collection];
    if (remote !== undefined) {
      if (remote > storageVersion) {
        return { kind: "engineFormatOutdated", needs: remote };
      }
      if (remote < storageVersion) {
        return { kind: "engineFormatTooNew", expected: remote };
      }
    }

    return null;
  }
}

/**
 * Render a reason for logs and CLI output.
 */
export function formatNotStartedReason(reason: SyncNotStartedReason): string {
  switch (reason.kind) {
    case "engineDisabled":
      return `${reason.collection} is disabled`;
    case "noAccount":
      return "no account";
    case "backoff":
      return `server backoff, ${reason.remainingSeconds}s remaining`;
    case "engineFormatOutdated":
      return `local format outdated, server needs version ${reason.needs}`;
    case "engineFormatTooNew":
      return `local format too new, server expects version ${reason.expected}`;
  }
}
