import { describe, expect, it, vi } from "vitest";
import { silentLogger } from "@/lib/logger";
import { ModeBroadcaster, modeForModifierEdge } from "./mode-broadcaster";
import { EventHub, type CaptureSessionEventArgs } from "./session-events";
import { createSessionStore } from "./session-store";

type Owner = { id: string };

function setup() {
  const store = createSessionStore<Owner>();
  const events = new EventHub<CaptureSessionEventArgs<Owner>>(silentLogger);
  return { events, broadcaster: new ModeBroadcaster(store, events, silentLogger) };
}

describe("ModeBroadcaster", () => {
  it("maps modifier edges to modes", () => {
    expect(modeForModifierEdge("down")).toBe("element");
    expect(modeForModifierEdge("up")).toBe("free");
  });

  it("never raises for the current mode", () => {
    const { events, broadcaster } = setup();
    const handler = vi.fn();
    events.on("selectionModeChanged", handler);

    expect(broadcaster.setMode("free")).toBe(false);
    expect(handler).not.toHaveBeenCalled();
  });

  it("delivers the same change to every subscribed window", () => {
    const { events, broadcaster } = setup();
    const windowA = vi.fn();
    const windowB = vi.fn();
    events.on("selectionModeChanged", windowA);
    events.on("selectionModeChanged", windowB);

    broadcaster.handleModifierKey("down");

    expect(windowA).toHaveBeenCalledWith("element");
    expect(windowB).toHaveBeenCalledWith("element");
    expect(broadcaster.mode).toBe("element");
  });

  it("swallows auto-repeated key downs", () => {
    const { events, broadcaster } = setup();
    const handler = vi.fn();
    events.on("selectionModeChanged", handler);

    expect(broadcaster.handleModifierKey("down")).toBe(true);
    expect(broadcaster.handleModifierKey("down")).toBe(false);
    expect(broadcaster.handleModifierKey("up")).toBe(true);

    expect(handler.mock.calls).toEqual([["element"], ["free"]]);
  });

  it("sees the new mode from inside a change handler", () => {
    const { events, broadcaster } = setup();
    const observed: string[] = [];
    events.on("selectionModeChanged", () => observed.push(broadcaster.mode));

    broadcaster.setMode("element");

    expect(observed).toEqual(["element"]);
  });
});
