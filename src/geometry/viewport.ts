import type { ViewportChromeConfig } from "../config.js";
import type { ErrorDetail, ViewportGeometry } from "../types.js";

/**
 * The mobile browser's scrollable area is the screen minus the status bar,
 * the address bar and the navigation bar.
 */
export function buildViewportGeometry(
  screenWidth: number,
  screenHeight: number,
  chrome: ViewportChromeConfig,
): ViewportGeometry | ErrorDetail {
  if (!Number.isFinite(screenWidth) || !Number.isFinite(screenHeight) || screenWidth <= 0 || screenHeight <= 0) {
    return { code: "GEOMETRY_INVALID", message: `Invalid screen size ${screenWidth}x${screenHeight}` };
  }

  const { statusBarHeight, addressBarHeight, navBarHeight } = chrome;
  if ([statusBarHeight, addressBarHeight, navBarHeight].some((h) => !Number.isFinite(h) || h < 0)) {
    return { code: "GEOMETRY_INVALID", message: "Chrome offsets must be non-negative numbers" };
  }

  const effectiveViewportHeight = screenHeight - statusBarHeight - addressBarHeight - navBarHeight;
  if (effectiveViewportHeight <= 0) {
    return {
      code: "GEOMETRY_INVALID",
      message: `Effective viewport ${effectiveViewportHeight}px for screen height ${screenHeight}`,
    };
  }

  return {
    screenWidth,
    screenHeight,
    statusBarHeight,
    addressBarHeight,
    navBarHeight,
    effectiveViewportHeight,
  };
}

export function isGeometryError(value: ViewportGeometry | ErrorDetail): value is ErrorDetail {
  return "code" in value;
}
