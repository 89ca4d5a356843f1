import { describe, expect, it } from "vitest";

import { ValidationError } from "../errors";
import { formatWithOffset, fromTimestamp, parseUtc, toTimestamp } from "../time";

describe("time", () => {
  it("parses a UTC date time to unix seconds", () => {
    expect(toTimestamp(parseUtc("2024-12-19 01:06:50"))).toBe(1734570410);
    expect(toTimestamp(parseUtc("2024-12-19 1:06:50"))).toBe(1734570410);
  });

  it("rejects malformed and impossible dates", () => {
    expect(() => parseUtc("19/12/2024")).toThrow(ValidationError);
    expect(() => parseUtc("2024-02-30 00:00:00")).toThrow('Invalid date "2024-02-30 00:00:00"');
    expect(() => parseUtc("2024-12-19 24:00:00")).toThrow(ValidationError);
  });

  it("formats at a fixed offset", () => {
    const date = fromTimestamp(1734570410);

    expect(formatWithOffset(date, 0)).toBe("2024-12-19 01:06:50+00:00");
    expect(formatWithOffset(date, 8)).toBe("2024-12-19 09:06:50+08:00");
    expect(formatWithOffset(date, -5.5)).toBe("2024-12-18 19:36:50-05:30");
  });
});
