import { describe, expect, it } from "vitest";
import {
  initialSessionPhase,
  isSessionDisposed,
  isSessionOpen,
  reduceSessionPhase,
  type SessionPhase,
} from "./session-machine";

describe("session machine", () => {
  it("closes from active through closing", () => {
    const closing = reduceSessionPhase(initialSessionPhase, { type: "Close" });
    expect(closing).toEqual({ kind: "Closing", disposeRequested: false });
    expect(reduceSessionPhase(closing, { type: "CloseComplete" })).toEqual({ kind: "Closed" });
  });

  it("ignores a second close while closing", () => {
    const closing: SessionPhase = { kind: "Closing", disposeRequested: false };
    expect(reduceSessionPhase(closing, { type: "Close" })).toBe(closing);
  });

  it("ends disposed when dispose arrives mid-close", () => {
    const closing = reduceSessionPhase(initialSessionPhase, { type: "Close" });
    const disposing = reduceSessionPhase(closing, { type: "Dispose" });
    expect(isSessionDisposed(disposing)).toBe(true);
    expect(reduceSessionPhase(disposing, { type: "CloseComplete" })).toEqual({ kind: "Disposed" });
  });

  it("disposes a closed session", () => {
    expect(reduceSessionPhase({ kind: "Closed" }, { type: "Dispose" })).toEqual({ kind: "Disposed" });
  });

  it("keeps disposed terminal", () => {
    const disposed: SessionPhase = { kind: "Disposed" };
    expect(reduceSessionPhase(disposed, { type: "Close" })).toBe(disposed);
    expect(reduceSessionPhase(disposed, { type: "Dispose" })).toBe(disposed);
  });

  it("reports only the active phase as open", () => {
    expect(isSessionOpen(initialSessionPhase)).toBe(true);
    expect(isSessionOpen({ kind: "Closed" })).toBe(false);
    expect(isSessionDisposed({ kind: "Closed" })).toBe(false);
  });
});
