import { describe, it, expect } from "vitest";
import { AdbGestureChannel, parseScreenSize, type ExecFn } from "../../src/device/adb.js";
import { ActuationError } from "../../src/errors.js";

function recordingExec(stdout = ""): { exec: ExecFn; calls: { file: string; args: string[]; timeout: number }[] } {
  const calls: { file: string; args: string[]; timeout: number }[] = [];
  const exec: ExecFn = async (file, args, options) => {
    calls.push({ file, args, timeout: options.timeout });
    return { stdout };
  };
  return { exec, calls };
}

describe("parseScreenSize", () => {
  it("reads the physical size", () => {
    expect(parseScreenSize("Physical size: 1080x2400\n")).toEqual({ width: 1080, height: 2400 });
  });

  it("prefers an override size", () => {
    const output = "Physical size: 1440x3120\nOverride size: 1080x2340\n";
    expect(parseScreenSize(output)).toEqual({ width: 1080, height: 2340 });
  });

  it("returns null for unexpected output", () => {
    expect(parseScreenSize("error: device offline")).toBeNull();
  });
});

describe("AdbGestureChannel", () => {
  it("issues a rounded input swipe against the given serial", async () => {
    const { exec, calls } = recordingExec();
    const channel = new AdbGestureChannel({ serial: "emulator-5554", adbPath: "/opt/adb", timeoutMs: 5000, exec });

    await channel.swipe({ x: 360.4, y: 1094 }, { x: 360.6, y: 694.2 }, 412.7);

    expect(calls).toEqual([
      {
        file: "/opt/adb",
        args: ["-s", "emulator-5554", "shell", "input", "swipe", "360", "1094", "361", "694", "413"],
        timeout: 5000,
      },
    ]);
  });

  it("detects the screen size through wm size", async () => {
    const { exec, calls } = recordingExec("Physical size: 720x1440\n");
    const channel = new AdbGestureChannel({ serial: "10.0.0.2:5555", exec });

    expect(await channel.detectScreenSize()).toEqual({ width: 720, height: 1440 });
    expect(calls[0].file).toBe("adb");
    expect(calls[0].args).toEqual(["-s", "10.0.0.2:5555", "shell", "wm", "size"]);
    expect(calls[0].timeout).toBe(30000);
  });

  it("wraps command failures in an ADB_FAILED error", async () => {
    const exec: ExecFn = async () => {
      throw new Error("device 'emulator-5554' not found");
    };
    const channel = new AdbGestureChannel({ serial: "emulator-5554", exec });

    const err = await channel.swipe({ x: 0, y: 10 }, { x: 0, y: 0 }, 300).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ActuationError);
    if (!(err instanceof ActuationError)) return;
    expect(err.code).toBe("ADB_FAILED");
    expect(err.message).toBe(
      "adb input swipe 0 10 0 0 300 on emulator-5554 failed: device 'emulator-5554' not found",
    );
  });
});
