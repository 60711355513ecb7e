import { describe, expect, it } from "vitest";
import {
  findScreenForPoint,
  findScreenForRect,
  getVirtualDesktopBounds,
  normalizeRect,
  planOverlayRegions,
  rectsWithinTolerance,
} from "./geometry";
import type { ScreenInfo } from "./types";

const screens: ScreenInfo[] = [
  { id: "left", x: -1920, y: 0, width: 1920, height: 1080, scaleFactor: 1 },
  { id: "main", x: 0, y: 0, width: 2560, height: 1440, scaleFactor: 2, isPrimary: true },
];

describe("capture shell geometry", () => {
  it("normalizes a drag in any direction", () => {
    expect(normalizeRect(100, 80, 20, 10)).toEqual({ x: 20, y: 10, width: 80, height: 70 });
  });

  it("computes the virtual desktop spanning every screen", () => {
    expect(getVirtualDesktopBounds(screens)).toEqual({
      minX: -1920,
      minY: 0,
      width: 4480,
      height: 1440,
    });
  });

  it("returns empty bounds when no screens are known", () => {
    expect(getVirtualDesktopBounds([])).toEqual({ minX: 0, minY: 0, width: 0, height: 0 });
  });

  it("finds the screen under a point or a rect center", () => {
    expect(findScreenForPoint(-10, 500, screens)?.id).toBe("left");
    expect(findScreenForRect({ x: 100, y: 100, width: 200, height: 200 }, screens)?.id).toBe("main");
    expect(findScreenForPoint(5000, 5000, screens)).toBeNull();
  });

  it("compares rects with a strict tolerance", () => {
    const base = { x: 10, y: 10, width: 100, height: 50 };
    expect(rectsWithinTolerance(base, { x: 14, y: 6, width: 104, height: 46 }, 5)).toBe(true);
    expect(rectsWithinTolerance(base, { x: 15, y: 10, width: 100, height: 50 }, 5)).toBe(false);
  });

  it("plans one overlay region per screen", () => {
    const regions = planOverlayRegions(screens, "per-screen");
    expect(regions).toHaveLength(2);
    expect(regions[0]).toEqual({
      bounds: { x: -1920, y: 0, width: 1920, height: 1080 },
      screens: [screens[0]],
    });
  });

  it("plans a single region covering the virtual desktop", () => {
    const regions = planOverlayRegions(screens, "virtual-desktop");
    expect(regions).toEqual([
      { bounds: { x: -1920, y: 0, width: 4480, height: 1440 }, screens },
    ]);
  });
});
