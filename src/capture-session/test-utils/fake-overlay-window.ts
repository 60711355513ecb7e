import { vi } from "vitest";
import type { CaptureRect } from "@/ui-workflows/capture-shell/types";
import type {
  OverlayWindow,
  OverlayWindowConfig,
  WindowCancelledEvent,
  WindowRegionSelectedEvent,
} from "../overlay-window";

export class FakeOverlayWindow implements OverlayWindow {
  locked = false;
  readonly show = vi.fn();
  readonly close = vi.fn();

  private regionHandlers: Array<(event: WindowRegionSelectedEvent) => void> = [];
  private cancelHandlers: Array<(event: WindowCancelledEvent) => void> = [];

  constructor(
    readonly label: string,
    readonly config: OverlayWindowConfig | null = null,
  ) {}

  setSelectionLocked(locked: boolean): void {
    this.locked = locked;
  }

  onRegionSelected(handler: (event: WindowRegionSelectedEvent) => void) {
    this.regionHandlers.push(handler);
    return () => {
      this.regionHandlers = this.regionHandlers.filter((candidate) => candidate !== handler);
    };
  }

  onCancelled(handler: (event: WindowCancelledEvent) => void) {
    this.cancelHandlers.push(handler);
    return () => {
      this.cancelHandlers = this.cancelHandlers.filter((candidate) => candidate !== handler);
    };
  }

  get subscriberCount(): number {
    return this.regionHandlers.length + this.cancelHandlers.length;
  }

  simulateRegionSelected(rect: CaptureRect, isEditable: boolean): void {
    for (const handler of this.regionHandlers) handler({ rect, isEditable });
  }

  simulateCancelled(reason = "User cancelled"): void {
    for (const handler of this.cancelHandlers) handler({ reason });
  }
}
