export {
  CaptureSession,
  createCaptureSession,
  type CaptureSessionOptions,
} from "./capture-session/capture-session";
export {
  ElementHighlightTracker,
  type HighlightCoordinator,
  type HighlightUpdate,
} from "./capture-session/element-highlight-tracker";
export type {
  OverlayWindow,
  OverlayWindowConfig,
  OverlayWindowFactory,
  SelectionLockable,
  Unsubscribe,
  WindowCancelledEvent,
  WindowRegionSelectedEvent,
} from "./capture-session/overlay-window";
export type {
  CaptureSessionEventArgs,
  SessionCancelledEvent,
  SessionRegionSelectedEvent,
} from "./capture-session/session-events";
export { DEFAULT_SELECTION_MODE } from "./capture-session/session-store";
export { WindowBuilder } from "./capture-session/window-builder";
export {
  CaptureSessionError,
  SessionDisposedError,
  WindowBuilderConfigError,
  WindowOperationError,
  classifyCaptureSessionError,
  type CaptureSessionErrorKind,
} from "./lib/capture-errors";
export {
  DETECTION_MIN_INTERVAL_MS,
  DETECTION_MIN_MOVEMENT_PX,
  ELEMENT_BOUNDS_TOLERANCE_PX,
  areElementsEquivalent,
  describeElement,
  shouldUpdateElementDetection,
  type DetectionSample,
  type ElementDetector,
} from "./lib/element-detection";
export { createLogger, silentLogger, type SessionLogger } from "./lib/logger";
export {
  initialSessionPhase,
  isSessionDisposed,
  isSessionOpen,
  reduceSessionPhase,
  type SessionPhase,
  type SessionPhaseEvent,
} from "./state-machine/session-machine";
export {
  findScreenForPoint,
  findScreenForRect,
  getVirtualDesktopBounds,
  normalizeRect,
  planOverlayRegions,
  pointInRect,
  rectsWithinTolerance,
} from "./ui-workflows/capture-shell/geometry";
export type {
  CaptureRect,
  DesktopBounds,
  ElementDescriptor,
  ModifierKeyEdge,
  OverlayRegion,
  OverlayRegionStrategy,
  ScreenInfo,
  SelectionMode,
} from "./ui-workflows/capture-shell/types";
