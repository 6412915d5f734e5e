// Types
export type { Close, IndicatorInput, Period, Resettable, StreamingIndicator } from "./types/indicator.js";
export { closeOf } from "./types/indicator.js";
export type { Bar } from "./types/bar.js";
export { BarSchema } from "./types/bar.js";

// Indicators
export { SMA, DEFAULT_SMA_PERIOD } from "./indicators/sma.js";
export { SSMA, DEFAULT_SSMA_PERIOD } from "./indicators/ssma.js";
export { RSI, DEFAULT_RSI_PERIOD } from "./indicators/rsi.js";

// Factory
export { IndicatorConfigSchema, parseIndicatorConfig } from "./factory/indicator-config.js";
export type { IndicatorConfig, IndicatorKind } from "./factory/indicator-config.js";
export { createIndicator, createIndicatorFromConfig, listIndicatorKinds } from "./factory/create-indicator.js";

// Errors
export { InvalidParameterError } from "@ticktape/kit";
