import type {
  CaptureRect,
  ElementDescriptor,
  ScreenInfo,
} from "@/ui-workflows/capture-shell/types";

export type Unsubscribe = () => void;

export type WindowRegionSelectedEvent = {
  rect: CaptureRect;
  /** A finished drag that enters annotation editing, as opposed to a final confirm. */
  isEditable: boolean;
  element?: ElementDescriptor | null;
};

export type WindowCancelledEvent = {
  reason: string;
};

export interface SelectionLockable {
  setSelectionLocked(locked: boolean): void;
}

/**
 * One transparent overlay covering a monitor (or the whole desktop).
 * The session only shows, closes and locks it, and listens to its outcome events.
 */
export interface OverlayWindow extends SelectionLockable {
  show(): void;
  close(): void;
  onRegionSelected(handler: (event: WindowRegionSelectedEvent) => void): Unsubscribe;
  onCancelled(handler: (event: WindowCancelledEvent) => void): Unsubscribe;
}

export type OverlayWindowConfig = {
  bounds: CaptureRect;
  screens: readonly ScreenInfo[];
  elementDetection: boolean;
};

export type OverlayWindowFactory<W extends OverlayWindow> = (config: OverlayWindowConfig) => W;
