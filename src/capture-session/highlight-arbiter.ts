import {
  ELEMENT_BOUNDS_TOLERANCE_PX,
  areElementsEquivalent,
  describeElement,
} from "@/lib/element-detection";
import type { SessionLogger } from "@/lib/logger";
import type { ElementDescriptor } from "@/ui-workflows/capture-shell/types";
import {
  noHighlight,
  transact,
  type HighlightState,
  type SessionStore,
} from "./session-store";

export type HighlightDecision =
  | "cleared"
  | "not-owner"
  | "unchanged"
  | "denied"
  | "claimed";

/**
 * Exclusive right to render the detected-element highlight.
 *
 * A new element is last-writer-wins, but an element equivalent to the
 * current one stays with its owner: the tracking window can refresh it on
 * every mouse move while another monitor's overlay cannot flicker onto it.
 */
export class HighlightArbiter<W> {
  constructor(
    private readonly store: SessionStore<W>,
    private readonly logger: SessionLogger,
    private readonly tolerance = ELEMENT_BOUNDS_TOLERANCE_PX,
  ) {}

  get state(): HighlightState<W> {
    return this.store.getState().highlight;
  }

  get currentElement(): ElementDescriptor | null {
    return this.store.getState().highlight.currentElement;
  }

  isOwner(window: W): boolean {
    const { highlight } = this.store.getState();
    return highlight.ownerWindow !== null && highlight.ownerWindow === window;
  }

  /** Returns whether `owner` should render (or, for null, clear) its highlight. */
  setHighlightedElement(element: ElementDescriptor | null, owner: W): boolean {
    const decision = this.decide(element, owner);

    switch (decision) {
      case "cleared":
        this.logger.debug("Cleared element highlight");
        return true;
      case "denied":
        this.logger.debug("Different window tried to highlight the same element, denied");
        return false;
      case "claimed":
        if (element) this.logger.debug(`Highlighting ${describeElement(element)}`);
        return true;
      case "unchanged":
        return true;
      case "not-owner":
        return false;
    }
  }

  clearOwner(window: W): void {
    const cleared = transact<W, boolean>(this.store, (state) => {
      if (state.highlight.ownerWindow === null || state.highlight.ownerWindow !== window) {
        return { result: false };
      }
      return { next: { highlight: noHighlight<W>() }, result: true };
    });
    if (cleared) this.logger.debug("Cleared highlight owner");
  }

  private decide(element: ElementDescriptor | null, owner: W): HighlightDecision {
    return transact<W, HighlightDecision>(this.store, (state) => {
      const { highlight } = state;

      if (element === null) {
        if (highlight.ownerWindow === null || highlight.ownerWindow !== owner) {
          return { result: "not-owner" };
        }
        return { next: { highlight: noHighlight<W>() }, result: "cleared" };
      }

      if (
        highlight.currentElement !== null &&
        areElementsEquivalent(highlight.currentElement, element, this.tolerance)
      ) {
        return { result: highlight.ownerWindow === owner ? "unchanged" : "denied" };
      }

      return {
        next: { highlight: { currentElement: element, ownerWindow: owner } },
        result: "claimed",
      };
    });
  }
}
