import type { Config } from "../config.js";
import { ChannelError, errorMessage } from "../errors.js";
import { createLogger } from "../log.js";
import type { MeasurementSession, ViewportGeometry } from "../types.js";
import type { EventEmitter } from "node:events";
import { isCrashed, type CDPClient } from "./client.js";

const log = createLogger("session");

export type SessionOptions = Pick<
  Config["cdp"],
  "userAgent" | "acceptLanguage" | "deviceScaleFactor" | "pageLoadWaitMs" | "navigationTimeoutMs"
>;

/** The slice of the CDP client a session drives. */
export interface SessionClient extends Pick<EventEmitter, "on" | "removeListener"> {
  Page: Pick<CDPClient["Page"], "navigate">;
  Runtime: Pick<CDPClient["Runtime"], "evaluate">;
  Emulation: Pick<CDPClient["Emulation"], "setUserAgentOverride" | "setDeviceMetricsOverride">;
}

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * The measurement surrogate: a desktop Chrome tab emulating the device's
 * viewport. Only navigation, emulation and script evaluation go through here.
 */
export class CdpMeasurementSession implements MeasurementSession {
  constructor(
    private readonly cdp: SessionClient,
    private readonly options: SessionOptions,
  ) {}

  async emulate(geometry: ViewportGeometry): Promise<void> {
    try {
      await this.cdp.Emulation.setUserAgentOverride({
        userAgent: this.options.userAgent,
        acceptLanguage: this.options.acceptLanguage,
        platform: "Linux armv81",
      });
      await this.cdp.Emulation.setDeviceMetricsOverride({
        width: geometry.screenWidth,
        height: geometry.effectiveViewportHeight,
        deviceScaleFactor: this.options.deviceScaleFactor,
        mobile: true,
        screenWidth: geometry.screenWidth,
        screenHeight: geometry.screenHeight,
      });
    } catch (e) {
      throw new ChannelError("CDP_DISCONNECTED", `Viewport emulation failed: ${errorMessage(e)}`, { cause: e });
    }
    log.info(`Viewport ${geometry.screenWidth}x${geometry.effectiveViewportHeight} (screen ${geometry.screenHeight})`);
  }

  async navigate(url: string): Promise<void> {
    this.assertAlive();
    let timer: ReturnType<typeof setTimeout> | undefined;
    let markLoaded = (): void => undefined;
    const loaded = new Promise<void>((resolve) => {
      markLoaded = () => resolve();
    });
    const onLoad = () => markLoaded();
    this.cdp.on("Page.loadEventFired", onLoad);
    try {
      const { errorText } = await this.cdp.Page.navigate({ url });
      if (errorText) throw new Error(errorText);
      await Promise.race([
        loaded,
        new Promise<never>((_, reject) => {
          timer = setTimeout(
            () => reject(new Error(`Navigation timeout after ${this.options.navigationTimeoutMs}ms`)),
            this.options.navigationTimeoutMs,
          );
        }),
      ]);
    } catch (e) {
      throw new ChannelError("NAVIGATION_FAILED", `Navigate to ${url} failed: ${errorMessage(e)}`, { cause: e });
    } finally {
      this.cdp.removeListener("Page.loadEventFired", onLoad);
      if (timer) clearTimeout(timer);
    }
    // Late-loading modules shift result positions after the load event.
    await sleep(this.options.pageLoadWaitMs);
  }

  async evaluate(expression: string): Promise<unknown> {
    this.assertAlive();
    const response = await this.cdp.Runtime.evaluate({ expression, returnByValue: true });
    if (response.exceptionDetails) {
      const description = response.exceptionDetails.exception?.description ?? response.exceptionDetails.text;
      throw new ChannelError("SCRIPT_ERROR", `Exception in page context: ${description}`);
    }
    const value: unknown = response.result.value;
    return value;
  }

  private assertAlive(): void {
    if (isCrashed()) throw new ChannelError("PAGE_CRASHED", "Measurement tab crashed");
  }
}
