import type { SessionLogger } from "@/lib/logger";
import type {
  CaptureRect,
  ElementDescriptor,
  SelectionMode,
} from "@/ui-workflows/capture-shell/types";
import type { Unsubscribe } from "./overlay-window";

export type SessionRegionSelectedEvent<W> = {
  source: W;
  rect: CaptureRect;
  isEditable: boolean;
  element: ElementDescriptor | null;
};

export type SessionCancelledEvent<W> = {
  source: W;
  reason: string;
};

export type CaptureSessionEventArgs<W> = {
  regionSelected: [event: SessionRegionSelectedEvent<W>];
  cancelled: [event: SessionCancelledEvent<W>];
  selectionStateChanged: [hasSelection: boolean];
  selectionModeChanged: [mode: SelectionMode];
  closed: [];
};

export type Handler<Args extends unknown[]> = (...args: Args) => void;

export type Delivery<Args extends unknown[]> = (...args: Args) => void;

type HandlerLists<Events extends Record<keyof Events, unknown[]>> = {
  [Name in keyof Events]?: ReadonlyArray<Handler<Events[Name]>>;
};

/**
 * Copy-on-write subscriber lists. `capture` hands back a delivery bound to
 * the list as it is right now, so clearing or unsubscribing afterwards never
 * affects a notification that is already on its way.
 */
export class EventHub<Events extends Record<keyof Events, unknown[]>> {
  private handlers: HandlerLists<Events> = {};

  constructor(private readonly logger: SessionLogger) {}

  on<Name extends keyof Events>(name: Name, handler: Handler<Events[Name]>): Unsubscribe {
    this.handlers[name] = [...(this.handlers[name] ?? []), handler];
    let active = true;
    return () => {
      if (!active) return;
      active = false;
      const current = this.handlers[name];
      if (!current) return;
      const index = current.indexOf(handler);
      if (index === -1) return;
      this.handlers[name] = [...current.slice(0, index), ...current.slice(index + 1)];
    };
  }

  listenerCount(name: keyof Events): number {
    return this.handlers[name]?.length ?? 0;
  }

  capture<Name extends keyof Events>(name: Name): Delivery<Events[Name]> {
    const snapshot = this.handlers[name] ?? [];
    return (...args) => {
      for (const handler of snapshot) {
        try {
          handler(...args);
        } catch (error) {
          this.logger.error(`Subscriber for "${String(name)}" threw:`, error);
        }
      }
    };
  }

  clear(): void {
    this.handlers = {};
  }
}

export type CaptureSessionEvents<W> = EventHub<CaptureSessionEventArgs<W>>;
