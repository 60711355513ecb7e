import { SessionDisposedError } from "@/lib/capture-errors";
import { ELEMENT_BOUNDS_TOLERANCE_PX } from "@/lib/element-detection";
import { createLogger, type SessionLogger } from "@/lib/logger";
import {
  isSessionDisposed,
  isSessionOpen,
  reduceSessionPhase,
  type SessionPhaseEvent,
} from "@/state-machine/session-machine";
import type {
  ElementDescriptor,
  ModifierKeyEdge,
  SelectionMode,
} from "@/ui-workflows/capture-shell/types";
import { HighlightArbiter } from "./highlight-arbiter";
import { ModeBroadcaster } from "./mode-broadcaster";
import type {
  OverlayWindow,
  OverlayWindowFactory,
  Unsubscribe,
  WindowCancelledEvent,
  WindowRegionSelectedEvent,
} from "./overlay-window";
import { SelectionArbiter } from "./selection-arbiter";
import {
  EventHub,
  type CaptureSessionEventArgs,
  type Handler,
} from "./session-events";
import {
  DEFAULT_SELECTION_MODE,
  createSessionStore,
  transact,
  type SessionStore,
} from "./session-store";
import { WindowBuilder } from "./window-builder";
import { WindowMembership } from "./window-membership";

export type CaptureSessionOptions<W extends OverlayWindow> = {
  createWindow?: OverlayWindowFactory<W>;
  logger?: SessionLogger;
  boundsTolerance?: number;
  initialMode?: SelectionMode;
};

/**
 * One screenshot capture across every overlay window it spans.
 *
 * State lives in a session-scoped store and is only touched inside
 * synchronous transactions. Windows and subscribers are always called after
 * the transaction that decided to call them, so any of them may call back
 * into the session, including `close()` and `dispose()`.
 */
export class CaptureSession<W extends OverlayWindow = OverlayWindow> {
  private readonly store: SessionStore<W>;
  private readonly events: EventHub<CaptureSessionEventArgs<W>>;
  private readonly logger: SessionLogger;
  private readonly membership: WindowMembership<W>;
  private readonly selection: SelectionArbiter<W>;
  private readonly highlight: HighlightArbiter<W>;
  private readonly modes: ModeBroadcaster<W>;
  private readonly createWindow: OverlayWindowFactory<W> | null;

  constructor(options: CaptureSessionOptions<W> = {}) {
    this.logger = options.logger ?? createLogger("CaptureSession");
    this.store = createSessionStore<W>(options.initialMode ?? DEFAULT_SELECTION_MODE);
    this.events = new EventHub<CaptureSessionEventArgs<W>>(this.logger);
    this.membership = new WindowMembership(this.store, this.logger);
    this.selection = new SelectionArbiter(this.store, this.events, this.logger);
    this.highlight = new HighlightArbiter(
      this.store,
      this.logger,
      options.boundsTolerance ?? ELEMENT_BOUNDS_TOLERANCE_PX,
    );
    this.modes = new ModeBroadcaster(this.store, this.events, this.logger);
    this.createWindow = options.createWindow ?? null;
  }

  // --- Events ---

  on<Name extends keyof CaptureSessionEventArgs<W>>(
    name: Name,
    handler: Handler<CaptureSessionEventArgs<W>[Name]>,
  ): Unsubscribe {
    return this.events.on(name, handler);
  }

  // --- Lifecycle state ---

  get isClosed(): boolean {
    return !isSessionOpen(this.store.getState().phase);
  }

  get isDisposed(): boolean {
    return isSessionDisposed(this.store.getState().phase);
  }

  // --- Window membership ---

  get windows(): readonly W[] {
    return this.membership.windows;
  }

  createWindowBuilder(): WindowBuilder<W> {
    this.assertNotDisposed("create window builder");
    return new WindowBuilder(
      this.createWindow,
      (window) => this.addWindow(window),
      () => this.assertNotDisposed("build window"),
      this.logger,
    );
  }

  /** A window added once the session is closing or closed is closed instead of registered. */
  addWindow(window: W): void {
    this.assertNotDisposed("add window");
    if (this.isClosed) {
      this.membership.discard(window);
      return;
    }
    const detachRegion = window.onRegionSelected((event) => this.handleRegionSelected(window, event));
    const detachCancel = window.onCancelled((event) => this.handleCancelled(window, event));
    this.membership.add(window, () => {
      detachRegion();
      detachCancel();
    });
  }

  /** Detaches `window` without closing it; its selection and highlight are released. */
  removeWindow(window: W): boolean {
    this.assertNotDisposed("remove window");
    if (!this.membership.remove(window)) return false;
    this.selection.clearSelection(window);
    this.highlight.clearOwner(window);
    return true;
  }

  showAll(): void {
    this.assertNotDisposed("show windows");
    this.membership.showAll();
  }

  // --- Selection ---

  get hasSelection(): boolean {
    return this.selection.state.hasSelection;
  }

  get activeSelectionWindow(): W | null {
    return this.selection.state.activeWindow;
  }

  canStartSelection(window: W): boolean {
    this.assertNotDisposed("check selection");
    return this.selection.canStartSelection(window);
  }

  setSelection(window: W): void {
    this.assertNotDisposed("set selection");
    this.selection.setSelection(window);
  }

  clearSelection(window?: W): void {
    if (this.isDisposed) return;
    this.selection.clearSelection(window);
  }

  // --- Element highlight ---

  setHighlightedElement(element: ElementDescriptor | null, owner: W): boolean {
    this.assertNotDisposed("set highlighted element");
    return this.highlight.setHighlightedElement(element, owner);
  }

  isHighlightOwner(window: W): boolean {
    return this.highlight.isOwner(window);
  }

  clearHighlightOwner(window: W): void {
    if (this.isDisposed) return;
    this.highlight.clearOwner(window);
  }

  get currentHighlightedElement(): ElementDescriptor | null {
    return this.highlight.currentElement;
  }

  // --- Selection mode ---

  get selectionMode(): SelectionMode {
    return this.modes.mode;
  }

  set selectionMode(mode: SelectionMode) {
    this.assertNotDisposed("set selection mode");
    this.modes.setMode(mode);
  }

  handleModifierKey(edge: ModifierKeyEdge): void {
    this.assertNotDisposed("handle modifier key");
    this.modes.handleModifierKey(edge);
  }

  // --- Teardown ---

  close(): void {
    if (!this.advancePhase({ type: "Close" })) return;
    this.finishClose();
  }

  dispose(): void {
    const { phase } = this.store.getState();
    if (isSessionDisposed(phase)) return;

    // Subscribers go first so nothing is notified from here on.
    this.events.clear();
    this.advancePhase({ type: "Dispose" });

    if (phase.kind === "Active") {
      this.finishClose();
    }
    this.logger.debug("Disposed");
  }

  private finishClose(): void {
    const closedCount = this.membership.closeAll();
    this.advancePhase({ type: "CloseComplete" });
    this.logger.debug(`Session closed (${closedCount} window(s)), firing closed`);
    this.events.capture("closed")();
  }

  /** Applies a phase event; returns true when it moved the session out of Active. */
  private advancePhase(event: SessionPhaseEvent): boolean {
    return transact<W, boolean>(this.store, (state) => {
      const phase = reduceSessionPhase(state.phase, event);
      if (phase === state.phase) return { result: false };
      return { next: { phase }, result: state.phase.kind === "Active" };
    });
  }

  // --- Window events ---

  private handleRegionSelected(source: W, event: WindowRegionSelectedEvent): void {
    if (this.isClosed) return;

    if (event.isEditable) {
      this.selection.lockOtherWindows(source, this.membership.windows);
    }
    this.events.capture("regionSelected")({
      source,
      rect: event.rect,
      isEditable: event.isEditable,
      element: event.element ?? null,
    });
  }

  private handleCancelled(source: W, event: WindowCancelledEvent): void {
    if (this.isClosed) return;

    this.logger.debug(`Window cancelled: ${event.reason}`);
    this.events.capture("cancelled")({ source, reason: event.reason });
    this.close();
  }

  private assertNotDisposed(operation: string): void {
    if (this.isDisposed) {
      throw new SessionDisposedError(operation);
    }
  }
}

export function createCaptureSession<W extends OverlayWindow>(
  options: CaptureSessionOptions<W> = {},
): CaptureSession<W> {
  return new CaptureSession(options);
}
