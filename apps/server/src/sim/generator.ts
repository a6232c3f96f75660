// apps/server/src/sim/generator.ts
//
// Per-entity random-walk generator.
//
// Each loop iteration checks, in order:
//   1. cancelled?          -> flush what is buffered, return
//   2. batch full?         -> flush, restart the interval clock
//      interval elapsed?   -> flush (if anything buffered), next tick
//   3. otherwise           -> generate one sample, sleep to the next event
//
// Delivery is at-most-once: a failed flush is logged and its batch dropped.

import type { FastifyBaseLogger } from "fastify";

import { FlushError, errorMessage } from "../errors";
import { topicForUser, type SampleStore } from "../store";
import { pause } from "./cancellation";
import { encodeSample, type Sample } from "./codec";
import type { SimConfigV1 } from "./config";
import { PRNG } from "./prng";

export type GeneratorOptions = Pick<
  SimConfigV1,
  "batch_size" | "flush_interval_ms" | "sample_interval_ms" | "max_step_magnitude"
>;

export type GeneratorDeps = {
  store: SampleStore;
  log: FastifyBaseLogger;
  options: GeneratorOptions;
  rng?: PRNG;
  now?: () => number;
};

export type GeneratorStats = {
  generated: number;
  flushed: number;
  dropped: number;
  flushes: number;
};

export function generateMovement(rng: PRNG, maxStep: number): { deltaX: number; deltaY: number } {
  const angle = rng.nextFloat() * 2 * Math.PI;
  const magnitude = rng.nextFloat() * maxStep;
  return { deltaX: magnitude * Math.cos(angle), deltaY: magnitude * Math.sin(angle) };
}

/**
 * Write one batch. Returns how many records reached the store.
 *
 * Never throws: unencodable samples are skipped, a failed append drops the batch.
 */
export async function flushBatch(
  store: SampleStore,
  userId: string,
  batch: readonly Sample[],
  log: FastifyBaseLogger
): Promise<number> {
  const records: string[] = [];
  for (const s of batch) {
    try {
      records.push(encodeSample(s));
    } catch (e) {
      log.warn({ userId, err: e }, `skipping sample: ${errorMessage(e)}`);
    }
  }
  if (!records.length) return 0;

  try {
    await store.appendBatch(topicForUser(userId), records);
    return records.length;
  } catch (e) {
    const err = new FlushError(userId, records.length, { cause: e });
    log.error({ userId, err }, `${err.message}: ${errorMessage(e)}`);
    return 0;
  }
}

export async function runGenerator(signal: AbortSignal, userId: string, deps: GeneratorDeps): Promise<GeneratorStats> {
  const { store, log, options } = deps;
  const rng = deps.rng ?? new PRNG();
  const now = deps.now ?? Date.now;
  const stats: GeneratorStats = { generated: 0, flushed: 0, dropped: 0, flushes: 0 };

  // replaced, never shared: a flushed batch is out of reach of the next append
  let buffer: Sample[] = [];
  let nextFlushAt = now() + options.flush_interval_ms;

  const flush = async (): Promise<void> => {
    const batch = buffer;
    buffer = [];
    if (!batch.length) return;
    const written = await flushBatch(store, userId, batch, log);
    stats.flushes++;
    stats.flushed += written;
    stats.dropped += batch.length - written;
  };

  log.info({ userId }, "generator started");

  while (!signal.aborted) {
    if (buffer.length >= options.batch_size) {
      await flush();
      nextFlushAt = now() + options.flush_interval_ms;
      continue;
    }

    const t = now();
    if (t >= nextFlushAt) {
      await flush();
      nextFlushAt = t + options.flush_interval_ms;
      continue;
    }

    const { deltaX, deltaY } = generateMovement(rng, options.max_step_magnitude);
    buffer.push({ deltaX, deltaY, timestamp: new Date(t) });
    stats.generated++;

    await pause(Math.min(options.sample_interval_ms, nextFlushAt - t), signal);
  }

  await flush();
  log.info({ userId, ...stats }, "generator stopped");
  return stats;
}
