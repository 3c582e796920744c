import type { TrackRecord } from "../summary/types.js";

/** Attribute name → raw attribute text, as it appears on one Track element. */
export type AttributeBag = Readonly<Record<string, string | undefined>>;

export type FieldResult<T> =
  | { ok: true; value: T }
  | { ok: false; reason: string };

type NumberKind = "integer" | "float";

interface NumberField {
  attribute: string;
  kind: NumberKind;
  fallback: number;
}

export const TRACK_ATTRIBUTES = {
  track_id: { attribute: "TRACK_ID", kind: "integer", fallback: -1 },
  n_spots: { attribute: "NUMBER_SPOTS", kind: "integer", fallback: 0 },
  n_merges: { attribute: "NUMBER_MERGES", kind: "integer", fallback: 0 },
  mean_speed: { attribute: "TRACK_MEAN_SPEED", kind: "float", fallback: 0 },
  max_speed: { attribute: "TRACK_MAX_SPEED", kind: "float", fallback: 0 },
} as const satisfies Record<string, NumberField>;

const INTEGER_TEXT = /^[+-]?\d+$/;
const FLOAT_TEXT = /^[+-]?((\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?|inf(inity)?|nan)$/i;

export function parseIntegerText(text: string): number | null {
  const trimmed = text.trim();
  if (!INTEGER_TEXT.test(trimmed)) return null;
  const value = Number.parseInt(trimmed, 10);
  return Number.isSafeInteger(value) ? value : null;
}

// Accepts the spellings TrackMate and other exporters write for
// non-finite speeds (inf, -Infinity, NaN) alongside plain decimals.
export function parseFloatText(text: string): number | null {
  const trimmed = text.trim();
  if (!FLOAT_TEXT.test(trimmed)) return null;
  const unsigned = trimmed.replace(/^[+-]/, "").toLowerCase();
  const negative = trimmed.startsWith("-");
  if (unsigned === "nan") return Number.NaN;
  if (unsigned === "inf" || unsigned === "infinity") {
    return negative ? -Infinity : Infinity;
  }
  return Number(trimmed);
}

export function readNumberAttribute(
  attrs: AttributeBag,
  field: NumberField
): FieldResult<number> {
  const raw = attrs[field.attribute];
  if (raw === undefined) return { ok: true, value: field.fallback };

  const value =
    field.kind === "integer" ? parseIntegerText(raw) : parseFloatText(raw);
  if (value === null) {
    const tooLarge =
      field.kind === "integer" && INTEGER_TEXT.test(raw.trim());
    return {
      ok: false,
      reason: tooLarge
        ? `${field.attribute}: integer out of safe range, got "${raw}"`
        : `${field.attribute}: expected ${field.kind}, got "${raw}"`,
    };
  }
  return { ok: true, value };
}

export function readTrackRecord(attrs: AttributeBag): FieldResult<TrackRecord> {
  const trackId = readNumberAttribute(attrs, TRACK_ATTRIBUTES.track_id);
  if (!trackId.ok) return trackId;
  const spots = readNumberAttribute(attrs, TRACK_ATTRIBUTES.n_spots);
  if (!spots.ok) return spots;
  const merges = readNumberAttribute(attrs, TRACK_ATTRIBUTES.n_merges);
  if (!merges.ok) return merges;
  const meanSpeed = readNumberAttribute(attrs, TRACK_ATTRIBUTES.mean_speed);
  if (!meanSpeed.ok) return meanSpeed;
  const maxSpeed = readNumberAttribute(attrs, TRACK_ATTRIBUTES.max_speed);
  if (!maxSpeed.ok) return maxSpeed;

  return {
    ok: true,
    value: makeTrackRecord({
      track_id: trackId.value,
      n_spots: spots.value,
      n_merges: merges.value,
      mean_speed: meanSpeed.value,
      max_speed: maxSpeed.value,
    }),
  };
}

export function makeTrackRecord(
  fields: Omit<TrackRecord, "has_merging">
): TrackRecord {
  return Object.freeze({
    track_id: fields.track_id,
    n_spots: fields.n_spots,
    n_merges: fields.n_merges,
    has_merging: fields.n_merges > 0,
    mean_speed: fields.mean_speed,
    max_speed: fields.max_speed,
  });
}
