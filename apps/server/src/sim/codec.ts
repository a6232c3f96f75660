import { LocationSampleV1Schema, type LocationSampleV1 } from "@driftsim/contracts";

import { EncodingError } from "../errors";

// One recorded displacement. Immutable once created.
export type Sample = Readonly<{
  deltaX: number;
  deltaY: number;
  timestamp: Date;
}>;

export function toWire(s: Sample): LocationSampleV1 {
  return { dx: s.deltaX, dy: s.deltaY, ts: s.timestamp.toISOString() };
}

export function encodeSample(s: Sample): string {
  if (!Number.isFinite(s.deltaX) || !Number.isFinite(s.deltaY)) {
    throw new EncodingError(`non-finite displacement (${s.deltaX}, ${s.deltaY})`);
  }
  if (!Number.isFinite(s.timestamp.getTime())) {
    throw new EncodingError("invalid timestamp");
  }
  return JSON.stringify(toWire(s));
}

export function decodeSample(record: string): Sample {
  let raw: unknown;
  try {
    raw = JSON.parse(record);
  } catch (e) {
    throw new EncodingError("record is not JSON", { cause: e });
  }

  const parsed = LocationSampleV1Schema.safeParse(raw);
  if (!parsed.success) {
    throw new EncodingError(parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; "));
  }
  return {
    deltaX: parsed.data.dx,
    deltaY: parsed.data.dy,
    timestamp: new Date(parsed.data.ts),
  };
}
