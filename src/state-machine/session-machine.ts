export type SessionPhase =
  | { kind: "Active" }
  | { kind: "Closing"; disposeRequested: boolean }
  | { kind: "Closed" }
  | { kind: "Disposed" };

export type SessionPhaseEvent =
  | { type: "Close" }
  | { type: "CloseComplete" }
  | { type: "Dispose" };

export const initialSessionPhase: SessionPhase = { kind: "Active" };

export function reduceSessionPhase(phase: SessionPhase, event: SessionPhaseEvent): SessionPhase {
  switch (phase.kind) {
    case "Active":
      if (event.type === "Close") return { kind: "Closing", disposeRequested: false };
      if (event.type === "Dispose") return { kind: "Closing", disposeRequested: true };
      return phase;
    case "Closing":
      if (event.type === "Dispose") return { kind: "Closing", disposeRequested: true };
      if (event.type === "CloseComplete") {
        return phase.disposeRequested ? { kind: "Disposed" } : { kind: "Closed" };
      }
      return phase;
    case "Closed":
      return event.type === "Dispose" ? { kind: "Disposed" } : phase;
    case "Disposed":
      return phase;
    default: {
      const _exhaustive: never = phase;
      return _exhaustive;
    }
  }
}

export function isSessionOpen(phase: SessionPhase): boolean {
  return phase.kind === "Active";
}

export function isSessionDisposed(phase: SessionPhase): boolean {
  return phase.kind === "Disposed" || (phase.kind === "Closing" && phase.disposeRequested);
}
