import { execFile } from "node:child_process";
import { promisify } from "node:util";
import { ActuationError, errorMessage } from "../errors.js";
import { createLogger } from "../log.js";
import type { GestureChannel, Point } from "../types.js";
import type { ScreenSize } from "./actuator.js";

const log = createLogger("adb");

export type ExecFn = (file: string, args: string[], options: { timeout: number }) => Promise<{ stdout: string }>;

const execFileAsync = promisify(execFile);

const defaultExec: ExecFn = async (file, args, options) => {
  const { stdout } = await execFileAsync(file, args, { timeout: options.timeout, encoding: "utf-8" });
  return { stdout };
};

export interface AdbOptions {
  serial: string;
  adbPath?: string;
  timeoutMs?: number;
  exec?: ExecFn;
}

/**
 * Parse `adb shell wm size`. An "Override size" line wins over the
 * physical size because it is what the browser lays out against.
 */
export function parseScreenSize(output: string): ScreenSize | null {
  let physical: ScreenSize | null = null;
  let override: ScreenSize | null = null;

  for (const line of output.split(/\r?\n/)) {
    const match = /(\d+)\s*x\s*(\d+)/.exec(line);
    if (!match) continue;
    const size = { width: parseInt(match[1], 10), height: parseInt(match[2], 10) };
    if (/override/i.test(line)) override = size;
    else physical ??= size;
  }
  return override ?? physical;
}

/** The swipe primitive over `adb shell input swipe`. */
export class AdbGestureChannel implements GestureChannel {
  private readonly adbPath: string;
  private readonly timeoutMs: number;
  private readonly exec: ExecFn;

  constructor(private readonly options: AdbOptions) {
    this.adbPath = options.adbPath ?? "adb";
    this.timeoutMs = options.timeoutMs ?? 30000;
    this.exec = options.exec ?? defaultExec;
  }

  get serial(): string {
    return this.options.serial;
  }

  async swipe(from: Point, to: Point, durationMs: number): Promise<void> {
    const coords = [from.x, from.y, to.x, to.y, durationMs].map((n) => String(Math.round(n)));
    log.debug(`swipe ${this.serial} (${coords[0]}, ${coords[1]}) -> (${coords[2]}, ${coords[3]}) ${coords[4]}ms`);
    await this.shell(["input", "swipe", ...coords]);
  }

  async detectScreenSize(): Promise<ScreenSize | null> {
    const output = await this.shell(["wm", "size"]);
    const size = parseScreenSize(output);
    if (size) log.info(`${this.serial} screen ${size.width}x${size.height}`);
    else log.warn(`${this.serial}: could not parse "wm size" output`);
    return size;
  }

  private async shell(args: string[]): Promise<string> {
    try {
      const { stdout } = await this.exec(this.adbPath, ["-s", this.serial, "shell", ...args], {
        timeout: this.timeoutMs,
      });
      return stdout.trim();
    } catch (e) {
      throw new ActuationError(`adb ${args.join(" ")} on ${this.serial} failed: ${errorMessage(e)}`, { cause: e });
    }
  }
}
