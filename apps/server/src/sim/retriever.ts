import type { FastifyBaseLogger } from "fastify";

import { StoreUnavailableError, errorMessage } from "../errors";
import { topicForUser, type SampleStore } from "../store";
import { clamp01 } from "../util";
import { decodeSample, type Sample } from "./codec";

export type WindowBounds = { start: number; end: number };

/**
 * Half-open index range selected by a fraction window over `n` sorted samples.
 *
 * Fractions are clamped into [0, 1] (non-finite => 0) and min is pulled
 * down to max when it exceeds it, so any input yields a valid range.
 */
export function windowBounds(n: number, minFraction: number, maxFraction: number): WindowBounds {
  const max = clamp01(maxFraction);
  const min = Math.min(clamp01(minFraction), max);

  const end = Math.min(Math.max(Math.floor(max * n), 0), n);
  const start = Math.min(Math.max(Math.floor(min * n), 0), end);
  return { start, end };
}

function byTimestamp(a: Sample, b: Sample): number {
  return a.timestamp.getTime() - b.timestamp.getTime();
}

export class Retriever {
  constructor(private readonly deps: { store: SampleStore; log: FastifyBaseLogger }) {}

  async fetch(userId: string, minFraction = 0, maxFraction = 1): Promise<Sample[]> {
    const { store, log } = this.deps;

    let records: string[];
    try {
      records = await store.readAll(topicForUser(userId));
    } catch (e) {
      if (e instanceof StoreUnavailableError) throw e;
      throw new StoreUnavailableError(`failed to read data for user ${userId}: ${errorMessage(e)}`, { cause: e });
    }

    const samples: Sample[] = [];
    for (const r of records) {
      try {
        samples.push(decodeSample(r));
      } catch (e) {
        // corrupted record: skip, the rest of the series is still usable
        log.warn({ userId, record: r, err: e }, `skipping undecodable record: ${errorMessage(e)}`);
      }
    }
    if (!samples.length) return [];

    // write order across flushes is not chronological
    samples.sort(byTimestamp);

    const { start, end } = windowBounds(samples.length, minFraction, maxFraction);
    return samples.slice(start, end);
  }
}
