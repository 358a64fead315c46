/**
 * HistoryCodec - Converts places and visits to and from history envelopes.
 * Pure; no I/O.
 */

import { z } from "zod";
import { CodecError } from "./errors.js";
import type {
  DecodedHistoryRecord,
  Envelope,
  GUID,
  HistoryPayload,
  Place,
  RecordCodec,
  Visit,
} from "./types.js";

/** 60 days. */
export const HISTORY_TTL_SECONDS = 5_184_000;

/**
 * Sortindex for history is frecency. Deleted items rank above almost anything.
 */
export const DELETED_SORTINDEX = 5_000_000;

// TODO: frecency once storage exposes it.
export const LIVE_SORTINDEX = 1;

const visitSchema = z.object({
  date: z.number().int().nonnegative(),
  type: z.number().int(),
});

const tombstoneSchema = z.object({
  id: z.string().min(1),
  deleted: z.literal(true),
});

// Older clients write the URL as `histUri`.
const liveSchema = z
  .object({
    id: z.string().min(1),
    visits: z.array(visitSchema),
    uri: z.string().min(1).optional(),
    histUri: z.string().min(1).optional(),
    title: z.string().nullish(),
  })
  .refine((p) => p.uri !== undefined || p.histUri !== undefined, {
    message: "uri is required",
    path: ["uri"],
  });

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "payload"}: ${issue.message}`)
    .join("; ");
}

export class HistoryCodec
  implements RecordCodec<Place, HistoryPayload, DecodedHistoryRecord>
{
  encode(place: Place, visits: Visit[]): Envelope<HistoryPayload> {
    return {
      id: place.guid,
      // Ignored in upload serialization.
      modified: 0,
      sortindex: LIVE_SORTINDEX,
      ttl: HISTORY_TTL_SECONDS,
      payload: {
        id: place.guid,
        visits: visits.map((visit) => ({ date: visit.date, type: visit.type })),
        uri: place.url,
        title: place.title,
      },
    };
  }

  encodeDeleted(guid: GUID): Envelope<HistoryPayload> {
    return {
      id: guid,
      modified: 0,
      sortindex: DELETED_SORTINDEX,
      ttl: HISTORY_TTL_SECONDS,
      payload: { id: guid, deleted: true },
    };
  }

  decode(envelope: Envelope<unknown>): DecodedHistoryRecord {
    const { id, payload } = envelope;

    if (typeof payload !== "object" || payload === null) {
      throw new CodecError(id, "payload is not an object");
    }

    if ("deleted" in payload && payload.deleted === true) {
      const parsed = tombstoneSchema.safeParse(payload);
      if (!parsed.success) {
        throw new CodecError(id, formatIssues(parsed.error));
      }
      this.checkId(id, parsed.data.id);
      return { kind: "tombstone", id };
    }

    const parsed = liveSchema.safeParse(payload);
    if (!parsed.success) {
      throw new CodecError(id, formatIssues(parsed.error));
    }
    this.checkId(id, parsed.data.id);

    const { uri, histUri, title, visits } = parsed.data;
    return {
      kind: "live",
      id,
      place: { guid: id, url: uri ?? histUri ?? "", title: title ?? "" },
      visits,
    };
  }

  private checkId(envelopeId: GUID, payloadId: GUID): void {
    if (envelopeId !== payloadId) {
      throw new CodecError(envelopeId, `payload id ${payloadId} does not match`);
    }
  }
}
