import { logger } from "@ticktape/kit";
import type { StreamingIndicator } from "../types/indicator.js";
import { SMA } from "../indicators/sma.js";
import { SSMA } from "../indicators/ssma.js";
import { RSI } from "../indicators/rsi.js";
import {
  IndicatorConfigSchema,
  parseIndicatorConfig,
  type IndicatorConfig,
  type IndicatorKind,
} from "./indicator-config.js";

const log = logger.createChild("indicators");

const REGISTRY: Record<IndicatorKind, (period: number) => StreamingIndicator> = {
  sma: (period) => new SMA(period),
  ssma: (period) => new SSMA(period),
  rsi: (period) => new RSI(period),
};

/** Build a fresh indicator from a validated config. */
export function createIndicator(config: IndicatorConfig): StreamingIndicator {
  const indicator = REGISTRY[config.kind](config.period);
  log.debug({ kind: config.kind, period: config.period }, `created ${indicator.toString()}`);
  return indicator;
}

/** Parse untrusted config and build the indicator it describes. */
export function createIndicatorFromConfig(raw: unknown): StreamingIndicator {
  return createIndicator(parseIndicatorConfig(raw));
}

export function listIndicatorKinds(): IndicatorKind[] {
  return IndicatorConfigSchema.options.map((o) => o.shape.kind.value);
}
