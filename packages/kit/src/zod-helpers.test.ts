import { describe, it, expect } from "vitest";
import { z } from "zod";
import { formatZodErrors } from "./zod-helpers.js";

describe("formatZodErrors", () => {
  it("formats a single field error", () => {
    const schema = z.object({ period: z.number() });
    const result = schema.safeParse({ period: "14" });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(formatZodErrors(result.error)).toEqual([
        "period: Expected number, received string",
      ]);
    }
  });

  it("formats multiple field errors in order", () => {
    const schema = z.object({ kind: z.string(), period: z.number() });
    const result = schema.safeParse({ kind: 1, period: "x" });

    expect(result.success).toBe(false);
    if (!result.success) {
      const errors = formatZodErrors(result.error);
      expect(errors).toHaveLength(2);
      expect(errors[0]).toBe("kind: Expected string, received number");
      expect(errors[1]).toBe("period: Expected number, received string");
    }
  });

  it("joins nested paths with dots", () => {
    const schema = z.object({ rsi: z.object({ period: z.number().int() }) });
    const result = schema.safeParse({ rsi: { period: 1.5 } });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(formatZodErrors(result.error)).toEqual([
        "rsi.period: Expected integer, received float",
      ]);
    }
  });

  it("labels root-level issues", () => {
    const result = z.number().safeParse("nope");

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(formatZodErrors(result.error)).toEqual([
        "(root): Expected number, received string",
      ]);
    }
  });
});
