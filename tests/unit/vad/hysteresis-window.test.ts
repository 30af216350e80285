import { HysteresisWindow } from "../../../src/vad/hysteresis-window";

describe("HysteresisWindow", () => {
  it("tracks exact window contents and count for [0.9, 0.9, 0.9, 0.1, 0.1]", () => {
    const w = new HysteresisWindow();
    const steps = [
      { p: 0.9, window: [true], count: 1, confirmed: false },
      { p: 0.9, window: [true, true], count: 2, confirmed: false },
      { p: 0.9, window: [true, true, true], count: 3, confirmed: true },
      { p: 0.1, window: [true, true, true, false], count: 3, confirmed: true },
      { p: 0.1, window: [true, true, true, false, false], count: 3, confirmed: true },
    ];
    for (const step of steps) {
      expect(w.update(step.p, 0.5)).toBe(step.confirmed);
      expect(w.snapshot()).toEqual(step.window);
      expect(w.voicedCount).toBe(step.count);
    }
  });

  it("evicts the oldest decision once five are held", () => {
    const w = new HysteresisWindow();
    for (const p of [0.9, 0.9, 0.9, 0.1, 0.1]) w.update(p, 0.5);
    expect(w.update(0.1, 0.5)).toBe(false);
    expect(w.snapshot()).toEqual([true, true, false, false, false]);
    expect(w.voicedCount).toBe(2);
  });

  it("never holds more than five decisions", () => {
    const w = new HysteresisWindow();
    const probabilities = [0.7, 0.2, 0.9, 0.4, 0.6, 0.8, 0.1, 0.95, 0.3, 0.5, 0.55, 0.05];
    for (const p of probabilities) {
      w.update(p, 0.5);
      expect(w.length).toBeLessThanOrEqual(5);
    }
    expect(w.length).toBe(5);
  });

  it("cannot confirm on fewer than three frames even when all are voiced", () => {
    const w = new HysteresisWindow();
    expect(w.update(1, 0.5)).toBe(false);
    expect(w.update(1, 0.5)).toBe(false);
    expect(w.update(1, 0.5)).toBe(true);
  });

  it("counts a probability equal to the threshold as voiced", () => {
    const w = new HysteresisWindow();
    w.update(0.5, 0.5);
    expect(w.snapshot()).toEqual([true]);
  });

  it("ignores a single spurious voiced frame", () => {
    const w = new HysteresisWindow();
    const confirmed = [0.1, 0.1, 0.95, 0.1, 0.1].map((p) => w.update(p, 0.5));
    expect(confirmed).toEqual([false, false, false, false, false]);
  });

  it("honours a custom size and minimum", () => {
    const w = new HysteresisWindow({ size: 3, minVoiced: 2 });
    expect(w.update(0.9, 0.5)).toBe(false);
    expect(w.update(0.9, 0.5)).toBe(true);
    w.update(0.1, 0.5);
    expect(w.update(0.1, 0.5)).toBe(false);
    expect(w.snapshot()).toEqual([true, false, false]);
  });
});
