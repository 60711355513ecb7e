import { describe, expect, it, vi } from "vitest";
import { silentLogger } from "@/lib/logger";
import { createSessionStore } from "./session-store";
import { FakeOverlayWindow } from "./test-utils/fake-overlay-window";
import { WindowMembership } from "./window-membership";

function setup() {
  const store = createSessionStore<FakeOverlayWindow>();
  return { store, membership: new WindowMembership(store, silentLogger) };
}

describe("WindowMembership", () => {
  it("keeps insertion order and allows repeated registration", () => {
    const { membership } = setup();
    const [a, b] = [new FakeOverlayWindow("A"), new FakeOverlayWindow("B")];

    membership.add(a, vi.fn());
    membership.add(b, vi.fn());
    membership.add(a, vi.fn());

    expect(membership.windows).toEqual([a, b, a]);
    expect(membership.size).toBe(3);
  });

  it("removes only the first registration and detaches it", () => {
    const { membership } = setup();
    const a = new FakeOverlayWindow("A");
    const firstDetach = vi.fn();
    const secondDetach = vi.fn();
    membership.add(a, firstDetach);
    membership.add(a, secondDetach);

    expect(membership.remove(a)).toBe(true);

    expect(firstDetach).toHaveBeenCalledTimes(1);
    expect(secondDetach).not.toHaveBeenCalled();
    expect(membership.windows).toEqual([a]);
  });

  it("reports windows it never held", () => {
    const { membership } = setup();
    expect(membership.remove(new FakeOverlayWindow("stranger"))).toBe(false);
  });

  it("clears membership and arbitration state before closing windows", () => {
    const { store, membership } = setup();
    const a = new FakeOverlayWindow("A");
    const b = new FakeOverlayWindow("B");
    const detach = vi.fn();
    membership.add(a, detach);
    membership.add(b, vi.fn());
    store.setState({ selection: { hasSelection: true, activeWindow: a } });
    const seenDuringClose: number[] = [];
    a.close.mockImplementation(() => seenDuringClose.push(membership.size));

    expect(membership.closeAll()).toBe(2);

    expect(seenDuringClose).toEqual([0]);
    expect(detach).toHaveBeenCalledTimes(1);
    expect(b.close).toHaveBeenCalledTimes(1);
    expect(store.getState().selection).toEqual({ hasSelection: false, activeWindow: null });
    expect(membership.windows).toEqual([]);
  });

  it("closes the remaining windows when a window adds another mid-close", () => {
    const { membership } = setup();
    const a = new FakeOverlayWindow("A");
    const b = new FakeOverlayWindow("B");
    const late = new FakeOverlayWindow("late");
    membership.add(a, vi.fn());
    membership.add(b, vi.fn());
    a.close.mockImplementation(() => membership.add(late, vi.fn()));

    membership.closeAll();

    expect(b.close).toHaveBeenCalledTimes(1);
    expect(late.close).not.toHaveBeenCalled();
    expect(membership.windows).toEqual([late]);
  });

  it("closes a discarded window without registering it", () => {
    const { membership } = setup();
    const late = new FakeOverlayWindow("late");

    membership.discard(late);

    expect(late.close).toHaveBeenCalledTimes(1);
    expect(membership.size).toBe(0);
  });
});
