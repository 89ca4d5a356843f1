import { describe, it, expect } from "vitest";
import { nextBatchSize } from "../crawler/batch-size";

describe("nextBatchSize", () => {
  it("doubles after a full page", () => {
    expect(nextBatchSize(100, 100, 500)).toEqual({ size: 200, max: 500 });
  });

  it("caps the doubled size at the current max", () => {
    expect(nextBatchSize(300, 300, 500)).toEqual({ size: 500, max: 500 });
  });

  it("locks onto the max once a full page arrives at it", () => {
    expect(nextBatchSize(500, 500, 500)).toEqual({ size: 500, max: 500 });
  });

  it("treats a short page as the server's real ceiling", () => {
    expect(nextBatchSize(200, 120, 500)).toEqual({ size: 120, max: 120 });
  });

  it("never proposes more than the discovered max", () => {
    let state = { size: 100, max: 500 };
    const served = [100, 200, 250, 250, 250];
    const requested: number[] = [];
    for (const received of served) {
      requested.push(state.size);
      state = nextBatchSize(state.size, Math.min(received, state.size), state.max);
      expect(state.size).toBeLessThanOrEqual(state.max);
    }
    expect(requested).toEqual([100, 200, 400, 250, 250]);
    expect(state).toEqual({ size: 250, max: 250 });
  });

  it("leaves state alone for an empty page", () => {
    expect(nextBatchSize(200, 0, 500)).toEqual({ size: 200, max: 500 });
  });

  it("leaves state alone when the server ignores the limit", () => {
    expect(nextBatchSize(100, 150, 500)).toEqual({ size: 100, max: 500 });
  });
});
