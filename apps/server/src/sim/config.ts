// apps/server/src/sim/config.ts
//
// Simulator config SSOT loader.
//
// Contract:
// - SSOT file: config/sim/default.json
// - ssot_hash: sha256(stableStringify(parsedJson)) with "sha256:" prefix
// - unknown keys are rejected

import fs from "node:fs";
import path from "node:path";
import { z } from "zod";

import { ValidationError } from "../errors";
import { findRepoRoot, sha256Hex, stableStringify } from "../util";

export const SIM_CONFIG_RELATIVE_PATH = path.join("config", "sim", "default.json");

export const SimConfigV1Schema = z
  .object({
    schema_version: z.string().min(1),
    name: z.string().optional(),
    // wall-clock bound of one session
    session_duration_ms: z.number().int().positive(),
    // size trigger
    batch_size: z.number().int().positive(),
    // time trigger
    flush_interval_ms: z.number().int().positive(),
    // pause between two generated samples
    sample_interval_ms: z.number().int().positive(),
    max_step_magnitude: z.number().finite().nonnegative(),
  })
  .strict();

export type SimConfigV1 = z.infer<typeof SimConfigV1Schema>;

export type LoadedSimConfig = {
  config: SimConfigV1;
  ssot_hash: string;
  source: string;
};

function resolveRepoRoot(): string {
  if (process.env.DRIFTSIM_REPO_ROOT) return path.resolve(process.env.DRIFTSIM_REPO_ROOT);
  return findRepoRoot(process.cwd(), SIM_CONFIG_RELATIVE_PATH);
}

export function parseSimConfig(raw: unknown): SimConfigV1 {
  const parsed = SimConfigV1Schema.safeParse(raw);
  if (!parsed.success) {
    throw new ValidationError(parsed.error.issues.map((i) => `${i.path.join(".") || "<root>"}: ${i.message}`));
  }
  return parsed.data;
}

export function computeSimConfigHash(cfg: SimConfigV1): string {
  return `sha256:${sha256Hex(stableStringify(cfg))}`;
}

export function loadSimConfig(repoRoot: string = resolveRepoRoot()): LoadedSimConfig {
  const source = path.join(repoRoot, SIM_CONFIG_RELATIVE_PATH);
  const raw: unknown = JSON.parse(fs.readFileSync(source, "utf8"));
  const config = parseSimConfig(raw);
  return { config, ssot_hash: computeSimConfigHash(config), source };
}
