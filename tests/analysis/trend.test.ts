import { describe, expect, it } from "vitest";
import { trendDirection } from "../../src/analysis/trend";

describe("trendDirection", () => {
  it("compares second-half and first-half means", () => {
    expect(trendDirection([10, 10, 10, 20, 20, 20])).toBe("increasing");
    expect(trendDirection([20, 20, 20, 10, 10, 10])).toBe("decreasing");
    expect(trendDirection([10, 10, 10, 10.2, 10.2, 10.2])).toBe("stable");
  });

  it("treats exactly 5% as stable", () => {
    expect(trendDirection([100, 105])).toBe("stable");
    expect(trendDirection([100, 95])).toBe("stable");
  });

  it("puts the extra value of an odd series in the second half", () => {
    // first half [10], second half [20, 30]
    expect(trendDirection([10, 20, 30])).toBe("increasing");
    // first half [30], second half [30, 0] -> mean 15
    expect(trendDirection([30, 30, 0])).toBe("decreasing");
  });

  it("needs at least two values", () => {
    expect(trendDirection([42])).toBe("insufficient_data");
    expect(trendDirection([])).toBe("insufficient_data");
  });

  it("reports a zero baseline as stable", () => {
    expect(trendDirection([0, 0, 0, 5, 5, 5])).toBe("stable");
  });
});
