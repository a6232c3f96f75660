import { randomBytes } from "node:crypto";

/**
 * Mulberry32 pseudo-random generator.
 *
 * Every generator task owns one instance; seeds come from the OS CSPRNG
 * so two entities started in the same millisecond never share a path.
 */
export class PRNG {
  private seed: number;

  constructor(seed: number = freshSeed()) {
    this.seed = seed >>> 0;
  }

  /** Float in [0, 1). */
  public nextFloat(): number {
    let t = (this.seed = (this.seed + 0x6d2b79f5) >>> 0);
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }
}

export function freshSeed(): number {
  return randomBytes(4).readUInt32LE(0);
}
