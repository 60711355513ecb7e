import type { SessionLogger } from "@/lib/logger";
import { WindowOperationError } from "@/lib/capture-errors";
import type { SelectionLockable } from "./overlay-window";
import type { CaptureSessionEvents, Delivery } from "./session-events";
import {
  noSelection,
  transact,
  type SelectionState,
  type SessionStore,
} from "./session-store";

type SelectionNotifier = Delivery<[hasSelection: boolean]>;

/**
 * Single active selection across every overlay of a session.
 *
 * `canStartSelection` is advisory: `setSelection` does not consult it and the
 * last writer wins. Strategies are expected to ask before starting a drag.
 */
export class SelectionArbiter<W extends SelectionLockable> {
  constructor(
    private readonly store: SessionStore<W>,
    private readonly events: CaptureSessionEvents<W>,
    private readonly logger: SessionLogger,
  ) {}

  get state(): SelectionState<W> {
    return this.store.getState().selection;
  }

  canStartSelection(window: W): boolean {
    const { selection } = this.store.getState();
    return !selection.hasSelection || selection.activeWindow === window;
  }

  setSelection(window: W): void {
    const notify = transact<W, SelectionNotifier | null>(this.store, (state) => {
      if (state.selection.activeWindow === window) return { result: null };
      return {
        next: { selection: { hasSelection: true, activeWindow: window } },
        result: this.events.capture("selectionStateChanged"),
      };
    });
    if (!notify) return;

    this.logger.debug("Selection set for window");
    notify(true);
  }

  clearSelection(window?: W): void {
    const notify = transact<W, SelectionNotifier | null>(this.store, (state) => {
      if (!state.selection.hasSelection) return { result: null };
      if (window !== undefined && state.selection.activeWindow !== window) return { result: null };
      return {
        next: { selection: noSelection<W>() },
        result: this.events.capture("selectionStateChanged"),
      };
    });
    if (!notify) return;

    this.logger.debug("Selection cleared");
    notify(false);
  }

  /**
   * Locks every registered window except `source` once it holds an editable
   * selection. Locks are never lifted while the session lives.
   */
  lockOtherWindows(source: W, registered: readonly W[]): void {
    const others = registered.filter((window) => window !== source);
    for (const window of others) {
      try {
        window.setSelectionLocked(true);
      } catch (error) {
        this.logger.error(new WindowOperationError("lock", error).message, error);
      }
    }
    if (others.length > 0) {
      this.logger.debug(`Locked ${others.length} other window(s) after editable selection`);
    }
  }
}
