import { createLogger } from "../log.js";
import type { CompensatedActuator, ScreenSize } from "./actuator.js";

const log = createLogger("devices");

export interface DeviceHandle {
  actuator: CompensatedActuator;
  screen: ScreenSize;
}

export type DeviceOpener = (serial: string, screen?: ScreenSize) => Promise<DeviceHandle>;

function sameSize(a: ScreenSize, b: ScreenSize): boolean {
  return a.width === b.width && a.height === b.height;
}

/**
 * One handle, and so one actuator, per serial. The pending handle is stored
 * before it resolves, so concurrent first calls share a single open.
 */
export class DeviceRegistry {
  private readonly handles = new Map<string, Promise<DeviceHandle>>();

  constructor(private readonly open: DeviceOpener) {}

  async get(serial: string, screen?: ScreenSize): Promise<DeviceHandle> {
    for (;;) {
      const pending = this.handles.get(serial);
      if (!pending) break;
      const handle = await pending.catch((e: unknown) => {
        log.debug(`Earlier open of ${serial} failed, reopening: ${String(e)}`);
        return null;
      });
      // Replaced or dropped while we waited: look again.
      if (!handle || this.handles.get(serial) !== pending) continue;
      if (!screen || sameSize(handle.screen, screen)) return handle;
      log.info(`${serial} screen changed to ${screen.width}x${screen.height}, reopening`);
      break;
    }

    const next: Promise<DeviceHandle> = this.open(serial, screen).catch((e: unknown) => {
      if (this.handles.get(serial) === next) this.handles.delete(serial);
      throw e;
    });
    this.handles.set(serial, next);
    return next;
  }

  get size(): number {
    return this.handles.size;
  }
}
