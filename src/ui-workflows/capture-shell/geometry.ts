import type {
  CaptureRect,
  DesktopBounds,
  OverlayRegion,
  OverlayRegionStrategy,
  ScreenInfo,
} from "./types";

export function normalizeRect(startX: number, startY: number, endX: number, endY: number): CaptureRect {
  const x = Math.min(startX, endX);
  const y = Math.min(startY, endY);
  const width = Math.abs(endX - startX);
  const height = Math.abs(endY - startY);
  return { x, y, width, height };
}

export function pointInRect(x: number, y: number, rect: CaptureRect): boolean {
  return (
    x >= rect.x &&
    x <= rect.x + rect.width &&
    y >= rect.y &&
    y <= rect.y + rect.height
  );
}

export function screenRect(screen: ScreenInfo): CaptureRect {
  return {
    x: screen.x,
    y: screen.y,
    width: screen.width,
    height: screen.height,
  };
}

export function getVirtualDesktopBounds(screens: readonly ScreenInfo[]): DesktopBounds {
  if (screens.length === 0) {
    return { minX: 0, minY: 0, width: 0, height: 0 };
  }
  const minX = Math.min(...screens.map((screen) => screen.x));
  const minY = Math.min(...screens.map((screen) => screen.y));
  const maxX = Math.max(...screens.map((screen) => screen.x + screen.width));
  const maxY = Math.max(...screens.map((screen) => screen.y + screen.height));
  return {
    minX,
    minY,
    width: maxX - minX,
    height: maxY - minY,
  };
}

export function findScreenForPoint(x: number, y: number, screens: readonly ScreenInfo[]): ScreenInfo | null {
  return screens.find((screen) => pointInRect(x, y, screenRect(screen))) ?? null;
}

export function findScreenForRect(rect: CaptureRect, screens: readonly ScreenInfo[]): ScreenInfo | null {
  const centerX = rect.x + rect.width / 2;
  const centerY = rect.y + rect.height / 2;
  return findScreenForPoint(centerX, centerY, screens);
}

/** True when every edge measurement differs by strictly less than `tolerance`. */
export function rectsWithinTolerance(a: CaptureRect, b: CaptureRect, tolerance: number): boolean {
  return (
    Math.abs(a.x - b.x) < tolerance &&
    Math.abs(a.y - b.y) < tolerance &&
    Math.abs(a.width - b.width) < tolerance &&
    Math.abs(a.height - b.height) < tolerance
  );
}

export function planOverlayRegions(
  screens: readonly ScreenInfo[],
  strategy: OverlayRegionStrategy,
): OverlayRegion[] {
  if (screens.length === 0) return [];

  if (strategy === "virtual-desktop") {
    const desktop = getVirtualDesktopBounds(screens);
    return [
      {
        bounds: { x: desktop.minX, y: desktop.minY, width: desktop.width, height: desktop.height },
        screens,
      },
    ];
  }

  return screens.map((screen) => ({ bounds: screenRect(screen), screens: [screen] }));
}
