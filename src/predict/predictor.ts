export interface CalibrationModel {
  /** Search-phase distance discount (< 1 compensates for swipe-to-scroll loss). */
  calibration: number;
  marginRatio: number;
  marginMin: number;
  marginMax: number;
}

export interface CountBreakdown {
  targetScreenY: number;
  need: number;
  effectiveDistance: number;
  raw: number;
  margin: number;
  count: number;
}

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(value, max));
}

function allFinite(...values: number[]): boolean {
  return values.every((v) => Number.isFinite(v));
}

function zeroBreakdown(effectiveDistance: number): CountBreakdown {
  return { targetScreenY: 0, need: 0, effectiveDistance, raw: 0, margin: 0, count: 0 };
}

export function explainMarginPaddedCount(
  elementY: number,
  targetFraction: number,
  viewportHeight: number,
  gestureDistance: number,
  model: CalibrationModel,
): CountBreakdown {
  const effectiveDistance = gestureDistance * model.calibration;
  if (!allFinite(elementY, targetFraction, viewportHeight, effectiveDistance) || effectiveDistance <= 0) {
    return zeroBreakdown(effectiveDistance);
  }

  const targetScreenY = viewportHeight * targetFraction;
  const need = elementY - targetScreenY;
  const raw = need / effectiveDistance;
  const margin = clamp(Math.round(raw * model.marginRatio), model.marginMin, model.marginMax);
  const count = Math.max(0, Math.floor(raw) + margin);
  return { targetScreenY, need, effectiveDistance, raw, margin, count };
}

/**
 * Gesture count for the broad search phase, where overshoot is acceptable:
 * calibrated distance plus a clamped proportional margin.
 */
export function marginPaddedCount(
  elementY: number,
  targetFraction: number,
  viewportHeight: number,
  gestureDistance: number,
  model: CalibrationModel,
): number {
  return explainMarginPaddedCount(elementY, targetFraction, viewportHeight, gestureDistance, model).count;
}

export function explainMarginFreeCount(
  elementY: number,
  targetFraction: number,
  viewportHeight: number,
  gestureDistance: number,
): CountBreakdown {
  if (!allFinite(elementY, targetFraction, viewportHeight, gestureDistance) || gestureDistance <= 0) {
    return zeroBreakdown(gestureDistance);
  }

  const targetScreenY = viewportHeight * targetFraction;
  const need = elementY - targetScreenY;
  const raw = need / gestureDistance;
  return { targetScreenY, need, effectiveDistance: gestureDistance, raw, margin: 0, count: Math.max(0, Math.floor(raw)) };
}

/**
 * Gesture count for the final approach. Uncalibrated, because the compensated
 * actuator keeps the running total at the nominal distance, and always rounded
 * down: an undershoot is recovered by scrolling on, an overshoot is not.
 */
export function marginFreeCount(
  elementY: number,
  targetFraction: number,
  viewportHeight: number,
  gestureDistance: number,
): number {
  return explainMarginFreeCount(elementY, targetFraction, viewportHeight, gestureDistance).count;
}

export function formatBreakdown(b: CountBreakdown): string {
  return (
    `targetY=${b.targetScreenY.toFixed(0)} need=${b.need.toFixed(0)}px ` +
    `distance=${b.effectiveDistance.toFixed(0)}px raw=${b.raw.toFixed(2)} margin=${b.margin} count=${b.count}`
  );
}
