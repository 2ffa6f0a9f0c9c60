import { describe, expect, it } from "vitest";
import {
  COLLATZ_TRIPLE_LIMIT,
  CollatzInvalidArgumentError,
  CollatzOverflowError,
  collatzOperation,
  collatzStats,
  computeCollatz,
  describeCollatzSteps,
  nextCollatzValue,
} from "../shared/collatz";

describe("computeCollatz", () => {
  it("returns the single value for a start of 1", () => {
    expect(computeCollatz(1)).toEqual({ values: [1], truncated: false });
  });

  it("walks 6 down to 1", () => {
    expect(computeCollatz(6)).toEqual({
      values: [6, 3, 10, 5, 16, 8, 4, 2, 1],
      truncated: false,
    });
  });

  it("produces the 112 values of the 27 trajectory", () => {
    const { values, truncated } = computeCollatz(27);
    expect(truncated).toBe(false);
    expect(values).toHaveLength(112);
    expect(values.slice(0, 6)).toEqual([27, 82, 41, 124, 62, 31]);
    expect(values[values.length - 1]).toBe(1);
    expect(Math.max(...values)).toBe(9232);
  });

  it("stops after maxSteps appended values and flags truncation", () => {
    expect(computeCollatz(27, 3)).toEqual({ values: [27, 82, 41, 124], truncated: true });
    expect(computeCollatz(7, 3)).toEqual({ values: [7, 22, 11, 34], truncated: true });
  });

  it("does not flag truncation when 1 lands exactly on the cap", () => {
    expect(computeCollatz(2, 1)).toEqual({ values: [2, 1], truncated: false });
    expect(computeCollatz(6, 8)).toEqual({
      values: [6, 3, 10, 5, 16, 8, 4, 2, 1],
      truncated: false,
    });
  });

  it("treats a zero cap as returning only the start", () => {
    expect(computeCollatz(6, 0)).toEqual({ values: [6], truncated: true });
    expect(computeCollatz(1, 0)).toEqual({ values: [1], truncated: false });
  });

  it("rejects starts below 1", () => {
    expect(() => computeCollatz(0)).toThrow(CollatzInvalidArgumentError);
    expect(() => computeCollatz(-5)).toThrow(CollatzInvalidArgumentError);
  });

  it("rejects non-integer and non-finite starts", () => {
    expect(() => computeCollatz(2.5)).toThrow("start must be a positive integer");
    expect(() => computeCollatz(Number.NaN)).toThrow(CollatzInvalidArgumentError);
    expect(() => computeCollatz(Number.POSITIVE_INFINITY)).toThrow(CollatzInvalidArgumentError);
  });

  it("rejects starts beyond the safe integer range", () => {
    expect(() => computeCollatz(2 ** 53)).toThrow("start exceeds the safe integer range");
  });

  it("rejects negative or fractional caps", () => {
    expect(() => computeCollatz(6, -1)).toThrow("maxSteps must be a non-negative integer");
    expect(() => computeCollatz(6, 1.5)).toThrow(CollatzInvalidArgumentError);
  });

  it("returns identical results for repeated calls", () => {
    expect(computeCollatz(97, 50)).toEqual(computeCollatz(97, 50));
    expect(computeCollatz(97)).toEqual(computeCollatz(97));
  });

  it("keeps every value but the last above 1 and obeys the rule", () => {
    for (let start = 1; start <= 300; start += 1) {
      const { values, truncated } = computeCollatz(start);
      expect(truncated).toBe(false);
      expect(values[values.length - 1]).toBe(1);
      for (let i = 0; i < values.length - 1; i += 1) {
        expect(values[i]).toBeGreaterThan(1);
        const expected = values[i] % 2 === 0 ? values[i] / 2 : values[i] * 3 + 1;
        expect(values[i + 1]).toBe(expected);
      }
    }
  });
});

describe("nextCollatzValue", () => {
  it("halves even values and triples-plus-one odd values", () => {
    expect(nextCollatzValue(10)).toBe(5);
    expect(nextCollatzValue(5)).toBe(16);
  });

  it("throws once 3n+1 would leave the safe integer range", () => {
    expect(COLLATZ_TRIPLE_LIMIT).toBe(3002399751580330);
    expect(nextCollatzValue(3002399751580329)).toBe(9007199254740988);
    expect(() => nextCollatzValue(3002399751580331)).toThrow(CollatzOverflowError);
  });

  it("reports the offending value on overflow", () => {
    let caught: unknown;
    try {
      computeCollatz(Number.MAX_SAFE_INTEGER);
    } catch (error) {
      caught = error;
    }
    if (!(caught instanceof CollatzOverflowError)) {
      throw new Error("expected CollatzOverflowError");
    }
    expect(caught.value).toBe(Number.MAX_SAFE_INTEGER);
    expect(caught.status).toBe(422);
    expect(caught.message).toBe("3n+1 leaves the safe integer range at 9007199254740991");
  });
});

describe("describeCollatzSteps", () => {
  it("labels each value with the rule that produced it", () => {
    expect(describeCollatzSteps([6, 3, 10, 5])).toEqual([
      { step: 0, value: 6, operation: "" },
      { step: 1, value: 3, operation: "divide" },
      { step: 2, value: 10, operation: "multiply-add" },
      { step: 3, value: 5, operation: "divide" },
    ]);
  });

  it("matches collatzOperation for the predecessor", () => {
    expect(collatzOperation(8)).toBe("divide");
    expect(collatzOperation(7)).toBe("multiply-add");
  });
});

describe("collatzStats", () => {
  it("counts computed steps and finds the peak", () => {
    expect(collatzStats([6, 3, 10, 5, 16, 8, 4, 2, 1])).toEqual({ computedSteps: 8, peak: 16 });
    expect(collatzStats([1])).toEqual({ computedSteps: 0, peak: 1 });
    expect(collatzStats([])).toEqual({ computedSteps: 0, peak: 0 });
  });
});
