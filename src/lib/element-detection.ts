import { rectsWithinTolerance } from "@/ui-workflows/capture-shell/geometry";
import type { ElementDescriptor } from "@/ui-workflows/capture-shell/types";

// Detectors report jittering bounds for the same element on repeated polls.
export const ELEMENT_BOUNDS_TOLERANCE_PX = 5;

export const DETECTION_MIN_MOVEMENT_PX = 8;
export const DETECTION_MIN_INTERVAL_MS = 30;

export type DetectionSample = {
  x: number;
  y: number;
  at: number;
};

export type ElementDetector = {
  detectElementAt: (x: number, y: number) => ElementDescriptor | null;
};

export function areElementsEquivalent(
  a: ElementDescriptor,
  b: ElementDescriptor,
  tolerance = ELEMENT_BOUNDS_TOLERANCE_PX,
): boolean {
  return (
    a.windowHandle === b.windowHandle &&
    a.className === b.className &&
    rectsWithinTolerance(a.bounds, b.bounds, tolerance)
  );
}

export function describeElement(element: ElementDescriptor): string {
  const label = element.name ? `${element.name} (${element.className})` : element.className;
  const { x, y, width, height } = element.bounds;
  return `${label} @ ${x},${y} ${width}x${height}`;
}

/**
 * Mouse-move throttle for element detection: both the interval and the
 * movement threshold must be exceeded before the detector is polled again.
 */
export function shouldUpdateElementDetection(
  last: DetectionSample | null,
  x: number,
  y: number,
  now = Date.now(),
  minIntervalMs = DETECTION_MIN_INTERVAL_MS,
  minMovementPx = DETECTION_MIN_MOVEMENT_PX,
): boolean {
  if (!last) return true;
  if (now - last.at < minIntervalMs) return false;
  return Math.hypot(x - last.x, y - last.y) >= minMovementPx;
}
