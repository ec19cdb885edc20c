/**
 * Client update payload → `TelemetryUpdate`.
 *
 * Accepted body:
 *   { location?: { lat, lng, accuracy, speed }, frame?: "data:image/...",
 *     userAgent?: string, tzOffsetMinutes?: int }
 *
 * Wrong types are rejected. Unknown keys (including any client `ts`) are
 * dropped. A location object counts as present even when every reading
 * is missing. A frame without an image data-URI prefix is discarded, and a
 * body left with neither location nor frame is rejected.
 */

import { z } from "zod";

import { InvalidPayloadError } from "./errors.js";
import type { GeoLocation, TelemetryUpdate } from "./types.js";

export const FRAME_PREFIX = "data:image";
export const NO_TELEMETRY_MESSAGE = "No frame or location data supplied";

// ── Schema ──────────────────────────────────────────────────────────

const coordinate = z.number().finite().nullish();

export const LocationInputSchema = z.object({
  lat: coordinate,
  lng: coordinate,
  accuracy: coordinate,
  speed: coordinate,
});

export const UpdateBodySchema = z.object({
  location: LocationInputSchema.nullish(),
  frame: z.string().nullish(),
  userAgent: z.string().nullish(),
  tzOffsetMinutes: z.number().int().nullish(),
});

export type UpdateBody = z.infer<typeof UpdateBodySchema>;

// ── Normalisation ───────────────────────────────────────────────────

function toLocation(input: UpdateBody["location"]): GeoLocation | undefined {
  if (!input) return undefined;
  return {
    lat: input.lat ?? null,
    lng: input.lng ?? null,
    accuracy: input.accuracy ?? null,
    speed: input.speed ?? null,
  };
}

function toFrame(input: UpdateBody["frame"]): string | undefined {
  return input?.startsWith(FRAME_PREFIX) ? input : undefined;
}

/**
 * Validate a client body and stamp it with the ingestion time.
 *
 * @throws {InvalidPayloadError} On a malformed body, or one with neither
 *   a location object nor an image frame.
 */
export function parseUpdatePayload(
  body: unknown,
  ts: Date,
  token?: string,
): TelemetryUpdate {
  const result = UpdateBodySchema.safeParse(body);
  if (!result.success) {
    const issues = result.error.issues.map(
      (i) => `${i.path.join(".") || "(body)"}: ${i.message}`,
    );
    throw new InvalidPayloadError("Malformed update payload", issues, token);
  }

  const location = toLocation(result.data.location);
  const frame = toFrame(result.data.frame);
  if (!location && !frame) {
    throw new InvalidPayloadError(NO_TELEMETRY_MESSAGE, [], token);
  }

  const update: TelemetryUpdate = {
    ts,
    meta: {
      ua: result.data.userAgent ?? null,
      tzOffsetMinutes: result.data.tzOffsetMinutes ?? null,
    },
  };
  if (location) update.location = location;
  if (frame) update.frame = frame;
  return update;
}
