import { describe, it, expect } from "vitest";
import { CompensatedActuator } from "../../src/device/actuator.js";
import { DeviceRegistry, type DeviceHandle } from "../../src/device/registry.js";
import { ActuationError } from "../../src/errors.js";
import { RecordingChannel, noSleep, testConfig } from "../helpers.js";

const gesture = testConfig().gesture;

function opener(detected = { width: 720, height: 1440 }) {
  const opened: string[] = [];
  const open = async (serial: string, screen?: { width: number; height: number }): Promise<DeviceHandle> => {
    opened.push(serial);
    // Stands in for the adb round trip of screen detection.
    await new Promise<void>((resolve) => setTimeout(resolve, 5));
    const size = screen ?? detected;
    return { actuator: new CompensatedActuator(new RecordingChannel(), size, gesture, { sleep: noSleep }), screen: size };
  };
  return { open, opened };
}

describe("DeviceRegistry", () => {
  it("opens a device once for concurrent first calls", async () => {
    const { open, opened } = opener();
    const registry = new DeviceRegistry(open);

    const [a, b, c] = await Promise.all([
      registry.get("emulator-5554"),
      registry.get("emulator-5554"),
      registry.get("emulator-5554"),
    ]);

    expect(opened).toEqual(["emulator-5554"]);
    expect(b.actuator).toBe(a.actuator);
    expect(c.actuator).toBe(a.actuator);
    expect(registry.size).toBe(1);
  });

  it("keeps separate handles per serial", async () => {
    const { open, opened } = opener();
    const registry = new DeviceRegistry(open);

    const [a, b] = await Promise.all([registry.get("emulator-5554"), registry.get("10.0.0.2:5555")]);

    expect(opened.sort()).toEqual(["10.0.0.2:5555", "emulator-5554"]);
    expect(a.actuator).not.toBe(b.actuator);
  });

  it("reuses the handle when the same screen is given and reopens on a new one", async () => {
    const { open, opened } = opener();
    const registry = new DeviceRegistry(open);

    const first = await registry.get("emulator-5554");
    expect(await registry.get("emulator-5554", { width: 720, height: 1440 })).toBe(first);

    const resized = await registry.get("emulator-5554", { width: 1080, height: 2340 });
    expect(resized.screen).toEqual({ width: 1080, height: 2340 });
    expect(opened).toHaveLength(2);
    expect(await registry.get("emulator-5554")).toBe(resized);
  });

  it("forgets a failed open so the next call retries", async () => {
    let attempts = 0;
    const { open } = opener();
    const registry = new DeviceRegistry(async (serial, screen) => {
      attempts++;
      if (attempts === 1) throw new ActuationError(`Cannot determine screen size of ${serial}`);
      return open(serial, screen);
    });

    await expect(registry.get("emulator-5554")).rejects.toThrow("Cannot determine screen size of emulator-5554");
    expect(registry.size).toBe(0);

    const handle = await registry.get("emulator-5554");
    expect(handle.screen).toEqual({ width: 720, height: 1440 });
    expect(attempts).toBe(2);
  });
});
