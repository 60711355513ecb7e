import {
  shouldUpdateElementDetection,
  type DetectionSample,
  type ElementDetector,
} from "@/lib/element-detection";
import type { SessionLogger } from "@/lib/logger";
import type { ElementDescriptor } from "@/ui-workflows/capture-shell/types";

export type HighlightCoordinator<W> = {
  setHighlightedElement: (element: ElementDescriptor | null, owner: W) => boolean;
  clearHighlightOwner: (owner: W) => void;
};

export type HighlightUpdate =
  | { kind: "throttled" }
  | { kind: "render"; element: ElementDescriptor }
  | { kind: "clear" }
  | { kind: "hidden" };

/**
 * Per-window element picking: polls the detector on throttled pointer moves
 * and asks the session whether this window may draw the result.
 */
export class ElementHighlightTracker<W> {
  private lastSample: DetectionSample | null = null;

  constructor(
    private readonly owner: W,
    private readonly session: HighlightCoordinator<W>,
    private readonly detector: ElementDetector,
    private readonly logger: SessionLogger,
    private readonly now: () => number = Date.now,
  ) {}

  handlePointerMoved(x: number, y: number): HighlightUpdate {
    const at = this.now();
    if (!shouldUpdateElementDetection(this.lastSample, x, y, at)) {
      return { kind: "throttled" };
    }
    this.lastSample = { x, y, at };
    return this.detectAt(x, y);
  }

  /** Detects immediately, e.g. when the modifier key switches this window into element mode. */
  detectAt(x: number, y: number): HighlightUpdate {
    let element: ElementDescriptor | null;
    try {
      element = this.detector.detectElementAt(x, y);
    } catch (error) {
      this.logger.warn(`Element detection failed at ${x},${y}:`, error);
      element = null;
    }

    const shouldRender = this.session.setHighlightedElement(element, this.owner);
    if (!element) return shouldRender ? { kind: "clear" } : { kind: "hidden" };
    return shouldRender ? { kind: "render", element } : { kind: "hidden" };
  }

  reset(): void {
    this.lastSample = null;
    this.session.clearHighlightOwner(this.owner);
  }
}
