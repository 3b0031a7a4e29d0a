import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { Debouncer } from "./debouncer.js";

describe("Debouncer", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("fires once for a burst of triggers", () => {
    const fire = vi.fn();
    const debouncer = new Debouncer(500, fire);

    debouncer.trigger();
    vi.advanceTimersByTime(300);
    debouncer.trigger();
    vi.advanceTimersByTime(300);
    debouncer.trigger();

    expect(fire).not.toHaveBeenCalled();
    expect(debouncer.pending).toBe(true);

    vi.advanceTimersByTime(500);

    expect(fire).toHaveBeenCalledTimes(1);
    expect(debouncer.pending).toBe(false);
  });

  it("fires again for a later burst", () => {
    const fire = vi.fn();
    const debouncer = new Debouncer(100, fire);

    debouncer.trigger();
    vi.advanceTimersByTime(100);
    debouncer.trigger();
    vi.advanceTimersByTime(100);

    expect(fire).toHaveBeenCalledTimes(2);
  });

  it("drops a pending fire on cancel", () => {
    const fire = vi.fn();
    const debouncer = new Debouncer(100, fire);

    debouncer.trigger();
    debouncer.cancel();
    vi.advanceTimersByTime(1_000);

    expect(fire).not.toHaveBeenCalled();
  });
});
