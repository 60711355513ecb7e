import { WindowBuilderConfigError } from "@/lib/capture-errors";
import type { SessionLogger } from "@/lib/logger";
import { findScreenForRect } from "@/ui-workflows/capture-shell/geometry";
import type { CaptureRect, ScreenInfo } from "@/ui-workflows/capture-shell/types";
import type { OverlayWindow, OverlayWindowFactory } from "./overlay-window";

export class WindowBuilder<W extends OverlayWindow> {
  private bounds: CaptureRect | null = null;
  private screens: readonly ScreenInfo[] | null = null;
  private elementDetection = false;
  private built = false;

  constructor(
    private readonly createWindow: OverlayWindowFactory<W> | null,
    private readonly register: (window: W) => void,
    private readonly assertCanBuild: () => void,
    private readonly logger: SessionLogger,
  ) {}

  withBounds(bounds: CaptureRect): this {
    this.bounds = bounds;
    return this;
  }

  withScreens(screens: readonly ScreenInfo[]): this {
    this.screens = screens;
    return this;
  }

  enableElementDetection(enable = true): this {
    this.elementDetection = enable;
    return this;
  }

  build(): W {
    if (this.built) {
      throw new WindowBuilderConfigError("Window already built. Create a new builder for each window");
    }
    this.assertCanBuild();
    if (!this.bounds) {
      throw new WindowBuilderConfigError("Bounds is required. Call withBounds() before build()");
    }
    if (!this.screens || this.screens.length === 0) {
      throw new WindowBuilderConfigError("Screens are required. Call withScreens() before build()");
    }
    if (this.bounds.width <= 0 || this.bounds.height <= 0) {
      throw new WindowBuilderConfigError(
        `Bounds must have a positive size, got ${this.bounds.width}x${this.bounds.height}`,
      );
    }
    if (!this.createWindow) {
      throw new WindowBuilderConfigError("No overlay window factory configured for this session");
    }

    if (!findScreenForRect(this.bounds, this.screens)) {
      this.logger.warn("Window bounds are centered outside every given screen", this.bounds);
    }

    this.built = true;
    const window = this.createWindow({
      bounds: { ...this.bounds },
      screens: this.screens,
      elementDetection: this.elementDetection,
    });
    this.register(window);

    const { x, y, width, height } = this.bounds;
    this.logger.debug(
      `Window built at ${x},${y} ${width}x${height}, screens=${this.screens.length}, elementDetection=${this.elementDetection}`,
    );
    return window;
  }
}
