import { z } from "zod";
import { formatZodErrors, InvalidParameterError } from "@ticktape/kit";
import { DEFAULT_SMA_PERIOD } from "../indicators/sma.js";
import { DEFAULT_SSMA_PERIOD } from "../indicators/ssma.js";
import { DEFAULT_RSI_PERIOD } from "../indicators/rsi.js";

const PeriodSchema = z.number().int().positive();

export const IndicatorConfigSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("sma"), period: PeriodSchema.default(DEFAULT_SMA_PERIOD) }),
  z.object({ kind: z.literal("ssma"), period: PeriodSchema.default(DEFAULT_SSMA_PERIOD) }),
  z.object({ kind: z.literal("rsi"), period: PeriodSchema.default(DEFAULT_RSI_PERIOD) }),
]);

export type IndicatorConfig = z.output<typeof IndicatorConfigSchema>;
export type IndicatorKind = IndicatorConfig["kind"];

/** Validate untrusted config (JSON, CLI args). Missing periods take each kind's default. */
export function parseIndicatorConfig(raw: unknown): IndicatorConfig {
  const result = IndicatorConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new InvalidParameterError(
      `Invalid indicator config: ${formatZodErrors(result.error).join("; ")}`,
    );
  }
  return result.data;
}
