import Fastify, { type FastifyBaseLogger } from "fastify";
import { setTimeout as sleep } from "node:timers/promises";

import { encodeSample, type Sample } from "../sim/codec";
import { computeSimConfigHash, type LoadedSimConfig, type SimConfigV1 } from "../sim/config";
import type { SampleStore } from "../store";

export { sleep };

export function silentLogger(): FastifyBaseLogger {
  return Fastify({ logger: false }).log;
}

export function testConfig(overrides: Partial<SimConfigV1> = {}): SimConfigV1 {
  return {
    schema_version: "1.0.0",
    name: "test",
    session_duration_ms: 60_000,
    batch_size: 10,
    flush_interval_ms: 20,
    sample_interval_ms: 1,
    max_step_magnitude: 0.004,
    ...overrides,
  };
}

export function loadedConfig(config: SimConfigV1 = testConfig()): LoadedSimConfig {
  return { config, ssot_hash: computeSimConfigHash(config), source: "test" };
}

export const BASE_TS = Date.UTC(2024, 4, 1, 12, 0, 0);

export function sampleAt(i: number): Sample {
  return { deltaX: i / 1000, deltaY: -i / 1000, timestamp: new Date(BASE_TS + i * 1000) };
}

export function encodedAt(...indices: number[]): string[] {
  return indices.map((i) => encodeSample(sampleAt(i)));
}

export async function waitFor(cond: () => boolean, timeoutMs = 2000, stepMs = 5): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!cond()) {
    if (Date.now() > deadline) throw new Error(`condition not met within ${timeoutMs}ms`);
    await sleep(stepMs);
  }
}

/** Store whose every call fails with a plain Error. */
export class BrokenStore implements SampleStore {
  readonly driver = "memory" as const;
  appendCalls = 0;

  async appendBatch(_topic: string, _records: string[]): Promise<void> {
    this.appendCalls++;
    throw new Error("disk full");
  }

  async readAll(_topic: string): Promise<string[]> {
    throw new Error("connection reset");
  }

  async close(): Promise<void> {}
}
