import { createStore, type StoreApi } from "zustand/vanilla";
import {
  initialSessionPhase,
  type SessionPhase,
} from "@/state-machine/session-machine";
import type {
  ElementDescriptor,
  SelectionMode,
} from "@/ui-workflows/capture-shell/types";
import type { Unsubscribe } from "./overlay-window";

export const DEFAULT_SELECTION_MODE: SelectionMode = "free";

export type SelectionState<W> =
  | { hasSelection: false; activeWindow: null }
  | { hasSelection: true; activeWindow: W };

export type HighlightState<W> =
  | { currentElement: null; ownerWindow: null }
  | { currentElement: ElementDescriptor; ownerWindow: W };

export type WindowEntry<W> = {
  window: W;
  detach: Unsubscribe;
};

export type SessionState<W> = {
  phase: SessionPhase;
  windows: readonly WindowEntry<W>[];
  selection: SelectionState<W>;
  highlight: HighlightState<W>;
  mode: SelectionMode;
};

export type SessionStore<W> = StoreApi<SessionState<W>>;

export type Transaction<W, R> = {
  next?: Partial<SessionState<W>>;
  result: R;
};

export function noSelection<W>(): SelectionState<W> {
  return { hasSelection: false, activeWindow: null };
}

export function noHighlight<W>(): HighlightState<W> {
  return { currentElement: null, ownerWindow: null };
}

export function createSessionStore<W>(mode: SelectionMode = DEFAULT_SELECTION_MODE): SessionStore<W> {
  return createStore<SessionState<W>>()(() => ({
    phase: initialSessionPhase,
    windows: [],
    selection: noSelection<W>(),
    highlight: noHighlight<W>(),
    mode,
  }));
}

/**
 * Runs one read-modify-write against the session state. Everything the
 * caller needs afterwards (handler snapshots, windows to call) comes back
 * in `result`; nothing external is invoked while the update is in flight.
 */
export function transact<W, R>(
  store: SessionStore<W>,
  update: (state: SessionState<W>) => Transaction<W, R>,
): R {
  const { next, result } = update(store.getState());
  if (next) store.setState(next);
  return result;
}
