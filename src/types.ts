// Error codes
export type ErrorCode =
  | "GEOMETRY_INVALID"
  | "SCRIPT_ERROR"
  | "NAVIGATION_FAILED"
  | "CDP_DISCONNECTED"
  | "PAGE_CRASHED"
  | "STORE_IO"
  | "ADB_FAILED"
  | "PLAN_NOT_CALCULATED"
  | "CONFIG_INVALID";

export interface ErrorDetail {
  code: ErrorCode;
  message: string;
}

// Stage result. Pipeline stages return one of these instead of throwing.
export type Outcome<T> =
  | { status: "ok"; value: T }
  | { status: "not-found"; reason: string }
  | { status: "failed"; error: ErrorDetail };

export interface ViewportGeometry {
  screenWidth: number;
  screenHeight: number;
  statusBarHeight: number;
  addressBarHeight: number;
  navBarHeight: number;
  effectiveViewportHeight: number;
}

export interface ElementMeasurement {
  found: boolean;
  /** Offset from the document top. */
  absoluteY: number;
  /** Offset from the current scroll position. */
  screenY: number;
  width: number;
  height: number;
  tag?: string;
  text?: string;
  href?: string;
}

export interface ScrollPlan {
  moreScrollCount: number;
  moreElementY: number;
  /** -1 when the target was not found within the page bound. */
  domainScrollCount: number;
  domainElementY: number;
  domainPage: number | null;
  viewportHeight: number;
  gestureDistance: number;
  calculated: boolean;
}

export type PlanPhase = "more" | "domain";

export interface PlanLookup {
  plan: ScrollPlan;
  source: "cache" | "computed";
}

export interface Point {
  x: number;
  y: number;
}

export type GestureMode = "compensated" | "fixed" | "random";

export interface SequenceResult {
  gestures: number;
  distances: number[];
  totalDistance: number;
  finalDebt: number;
}

/** Remote page-script execution against the measurement browser. */
export interface ScriptChannel {
  evaluate(expression: string): Promise<unknown>;
}

export interface MeasurementSession extends ScriptChannel {
  navigate(url: string): Promise<void>;
  emulate(geometry: ViewportGeometry): Promise<void>;
}

/** Touch injection on the blind device. */
export interface GestureChannel {
  swipe(from: Point, to: Point, durationMs: number): Promise<void>;
}
