import { parseConfig } from "../src/config.js";
import type { GestureChannel, Point } from "../src/types.js";

/** Deterministic [0, 1) generator (mulberry32). */
export function seededRandom(seed: number): () => number {
  let a = seed >>> 0;
  return () => {
    a = (a + 0x6d2b79f5) >>> 0;
    let t = a;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/** Cycles through fixed values; handy for pinning a specific draw. */
export function sequenceRandom(values: number[]): () => number {
  let i = 0;
  return () => values[i++ % values.length];
}

export interface RecordedSwipe {
  from: Point;
  to: Point;
  durationMs: number;
}

export class RecordingChannel implements GestureChannel {
  readonly swipes: RecordedSwipe[] = [];

  async swipe(from: Point, to: Point, durationMs: number): Promise<void> {
    this.swipes.push({ from, to, durationMs });
  }
}

export const noSleep = async (_ms: number): Promise<void> => {};

export function testConfig() {
  return parseConfig({ debug: false });
}
