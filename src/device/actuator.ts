import type { GestureConfig } from "../config.js";
import { createLogger } from "../log.js";
import type { GestureChannel, GestureMode, SequenceResult } from "../types.js";

const log = createLogger("actuator");

export interface ActuatorDeps {
  /** Uniform in [0, 1). */
  random?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

export interface ScreenSize {
  width: number;
  height: number;
}

export interface ScrollOptions {
  mode?: GestureMode;
  /** Explicit pixel distance; bypasses every mode. */
  distance?: number;
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Issues swipes on one blind device. In compensated mode each gesture is
 * randomized, but the signed error against the nominal distance (debt) is
 * folded into the next gesture so the running total stays within half the
 * randomization range of count × nominal.
 *
 * One instance per device: the debt must never be shared.
 */
export class CompensatedActuator {
  private debtPx = 0;
  private sequences: Promise<unknown> = Promise.resolve();
  private readonly random: () => number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly channel: GestureChannel,
    private readonly screen: ScreenSize,
    private readonly config: GestureConfig,
    deps: ActuatorDeps = {},
  ) {
    this.random = deps.random ?? Math.random;
    this.sleep = deps.sleep ?? defaultSleep;
  }

  get debt(): number {
    return this.debtPx;
  }

  /** Marks the start of a bounded scroll sequence. */
  resetDebt(): void {
    this.debtPx = 0;
  }

  /** Picks the next distance for a mode and updates the debt. No I/O. */
  nextDistance(mode: GestureMode): number {
    const nominal = this.config.nominalDistance;
    const range = this.config.distanceRandom;

    switch (mode) {
      case "fixed":
        return nominal;
      case "random":
        return nominal + this.randInt(-range, range);
      case "compensated": {
        const target = nominal - this.debtPx;
        let lo = Math.max(nominal - range, target - Math.floor(range / 2));
        // Never above nominal: the predictor's count assumes it as the ceiling.
        let hi = Math.min(nominal, target + Math.floor(range / 2));
        if (lo > hi) [lo, hi] = [hi, lo];
        const actual = this.randInt(lo, hi);
        this.debtPx += actual - nominal;
        return actual;
      }
    }
  }

  /** Swipe up the screen so content moves up. Returns the distance used. */
  async scrollDown(opts: ScrollOptions = {}): Promise<number> {
    const mode = opts.mode ?? "random";
    const distance = opts.distance ?? this.nextDistance(mode);
    const x = this.swipeX(mode === "fixed");
    const startY = Math.round(this.screen.height * this.config.swipeStartFraction);
    const endY = Math.max(0, startY - distance);

    await this.channel.swipe({ x, y: startY }, { x, y: endY }, this.duration());

    if (mode !== "fixed") await this.maybeReadingPause();
    return distance;
  }

  async scrollUp(distance?: number): Promise<number> {
    const d = distance ?? this.nextDistance("random");
    const x = this.swipeX(false);
    const startY = Math.round(this.screen.height * (1 - this.config.swipeStartFraction));
    const endY = Math.min(this.screen.height, startY + d);

    await this.channel.swipe({ x, y: startY }, { x, y: endY }, this.duration());
    return d;
  }

  /**
   * resetDebt() followed by `count` gestures with pauses in between.
   * Sequences on the same device queue behind each other.
   */
  runSequence(count: number, mode: GestureMode = "compensated"): Promise<SequenceResult> {
    const run = this.sequences.then(() => this.sequence(count, mode));
    this.sequences = run.catch(() => undefined);
    return run;
  }

  private async sequence(count: number, mode: GestureMode): Promise<SequenceResult> {
    this.resetDebt();
    const distances: number[] = [];

    for (let i = 0; i < count; i++) {
      distances.push(await this.scrollDown({ mode }));
      await this.sleep(this.uniform(this.config.pauseMinMs, this.config.pauseMaxMs));
      if ((i + 1) % 10 === 0) log.info(`Scroll ${i + 1}/${count}`);
    }

    const totalDistance = distances.reduce((sum, d) => sum + d, 0);
    log.info(`Sequence done: ${count} gestures, ${totalDistance}px, debt ${this.debtPx}px`);
    return { gestures: count, distances, totalDistance, finalDebt: this.debtPx };
  }

  private async maybeReadingPause(): Promise<void> {
    const pause = this.config.readingPause;
    if (!pause.enabled || this.random() >= pause.probability) return;
    const ms = this.uniform(pause.minMs, pause.maxMs);
    log.debug(`Reading pause ${(ms / 1000).toFixed(1)}s`);
    await this.sleep(ms);
  }

  private swipeX(fixed: boolean): number {
    const center = Math.round(this.screen.width * this.config.swipeXFraction);
    if (fixed) return center;
    const jitter = this.config.xJitter;
    return Math.max(0, Math.min(this.screen.width, center + this.randInt(-jitter, jitter)));
  }

  private duration(): number {
    return this.randInt(this.config.durationMinMs, this.config.durationMaxMs);
  }

  private randInt(min: number, max: number): number {
    const lo = Math.ceil(min);
    const hi = Math.floor(max);
    return lo + Math.floor(this.random() * (hi - lo + 1));
  }

  private uniform(min: number, max: number): number {
    return min + this.random() * (max - min);
  }
}
