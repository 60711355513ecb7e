import type { SessionLogger } from "@/lib/logger";
import type {
  ModifierKeyEdge,
  SelectionMode,
} from "@/ui-workflows/capture-shell/types";
import type { CaptureSessionEvents, Delivery } from "./session-events";
import { transact, type SessionStore } from "./session-store";

export function modeForModifierEdge(edge: ModifierKeyEdge): SelectionMode {
  return edge === "down" ? "element" : "free";
}

export class ModeBroadcaster<W> {
  constructor(
    private readonly store: SessionStore<W>,
    private readonly events: CaptureSessionEvents<W>,
    private readonly logger: SessionLogger,
  ) {}

  get mode(): SelectionMode {
    return this.store.getState().mode;
  }

  /** Returns whether the mode actually changed. */
  setMode(mode: SelectionMode): boolean {
    const change = transact<W, { previous: SelectionMode; notify: Delivery<[mode: SelectionMode]> } | null>(
      this.store,
      (state) => {
        if (state.mode === mode) return { result: null };
        return {
          next: { mode },
          result: { previous: state.mode, notify: this.events.capture("selectionModeChanged") },
        };
      },
    );
    if (!change) return false;

    this.logger.debug(`Selection mode changed: ${change.previous} -> ${mode}`);
    change.notify(mode);
    return true;
  }

  // Key auto-repeat re-sends "down"; the dedupe in setMode swallows it.
  handleModifierKey(edge: ModifierKeyEdge): boolean {
    return this.setMode(modeForModifierEdge(edge));
  }
}
