import { describe, it, expect } from "vitest";
import { assertPeriod } from "./assert-period.js";
import { InvalidParameterError } from "./invalid-parameter-error.js";

describe("assertPeriod", () => {
  it("returns the period when valid", () => {
    expect(assertPeriod(1, "SMA period")).toBe(1);
    expect(assertPeriod(14, "RSI period")).toBe(14);
  });

  it("rejects zero", () => {
    expect(() => assertPeriod(0, "RSI period")).toThrow(InvalidParameterError);
  });

  it("rejects negatives and fractions", () => {
    expect(() => assertPeriod(-3, "p")).toThrow(InvalidParameterError);
    expect(() => assertPeriod(2.5, "p")).toThrow(InvalidParameterError);
  });

  it("rejects NaN and Infinity", () => {
    expect(() => assertPeriod(NaN, "p")).toThrow(InvalidParameterError);
    expect(() => assertPeriod(Infinity, "p")).toThrow(InvalidParameterError);
  });

  it("names the argument in the message", () => {
    expect(() => assertPeriod(0, "SSMA period")).toThrow(
      "SSMA period: expected integer period >= 1, got 0",
    );
  });
});
