export type CaptureRect = {
  x: number;
  y: number;
  width: number;
  height: number;
};

export type ScreenInfo = {
  id: string;
  x: number;
  y: number;
  width: number;
  height: number;
  scaleFactor: number;
  isPrimary?: boolean;
};

export type DesktopBounds = {
  minX: number;
  minY: number;
  width: number;
  height: number;
};

export type SelectionMode = "free" | "element";

export type ModifierKeyEdge = "down" | "up";

/**
 * A UI element reported by the platform element detector.
 * `windowHandle` is opaque to the coordinator and only compared by identity.
 */
export type ElementDescriptor = {
  windowHandle: unknown;
  className: string;
  bounds: CaptureRect;
  name?: string;
  processName?: string;
  isWindow?: boolean;
};

export type OverlayRegionStrategy = "per-screen" | "virtual-desktop";

export type OverlayRegion = {
  bounds: CaptureRect;
  screens: readonly ScreenInfo[];
};
