import { WindowOperationError, type WindowOperation } from "@/lib/capture-errors";
import type { SessionLogger } from "@/lib/logger";
import type { OverlayWindow, Unsubscribe } from "./overlay-window";
import {
  noHighlight,
  noSelection,
  transact,
  type SessionStore,
  type WindowEntry,
} from "./session-store";

export class WindowMembership<W extends OverlayWindow> {
  constructor(
    private readonly store: SessionStore<W>,
    private readonly logger: SessionLogger,
  ) {}

  get windows(): readonly W[] {
    return this.store.getState().windows.map((entry) => entry.window);
  }

  get size(): number {
    return this.store.getState().windows.length;
  }

  add(window: W, detach: Unsubscribe): void {
    const total = transact(this.store, (state) => {
      const windows = [...state.windows, { window, detach }];
      return { next: { windows }, result: windows.length };
    });
    this.logger.debug(`Window added, total: ${total}`);
  }

  /** Drops the first registration of `window` and detaches its event subscriptions. */
  remove(window: W): boolean {
    const entry = transact<W, WindowEntry<W> | null>(this.store, (state) => {
      const index = state.windows.findIndex((candidate) => candidate.window === window);
      if (index === -1) return { result: null };
      return {
        next: { windows: [...state.windows.slice(0, index), ...state.windows.slice(index + 1)] },
        result: state.windows[index],
      };
    });
    if (!entry) return false;

    entry.detach();
    this.logger.debug(`Window removed, total: ${this.size}`);
    return true;
  }

  /** Closes a window that arrived after teardown and was never registered. */
  discard(window: W): void {
    this.logger.warn("Window arrived after the session closed, closing it");
    this.attempt("close", () => window.close());
  }

  showAll(): void {
    for (const { window } of this.store.getState().windows) {
      this.attempt("show", () => window.show());
    }
  }

  /**
   * Empties membership and arbitration state in one step, then closes the
   * detached windows one by one. A window that fails to close is logged and
   * skipped so teardown always reaches the rest.
   */
  closeAll(): number {
    const entries = transact(this.store, (state) => ({
      next: {
        windows: [],
        selection: noSelection<W>(),
        highlight: noHighlight<W>(),
      },
      result: state.windows,
    }));

    this.logger.debug(`Closing ${entries.length} window(s)`);
    for (const entry of entries) {
      this.release(entry);
    }
    return entries.length;
  }

  private release(entry: WindowEntry<W>): void {
    try {
      entry.detach();
    } catch (error) {
      this.logger.error("Failed to unsubscribe from window events:", error);
    }
    this.attempt("close", () => entry.window.close());
  }

  private attempt(operation: WindowOperation, action: () => void): void {
    try {
      action();
    } catch (error) {
      this.logger.error(new WindowOperationError(operation, error).message, error);
    }
  }
}
