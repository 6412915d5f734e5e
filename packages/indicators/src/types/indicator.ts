/** Any record exposing a real-valued close reading (bar, candle, tick). */
export interface Close {
  readonly close: number;
}

export type IndicatorInput = number | Close;

export interface Period {
  readonly period: number;
}

export interface Resettable {
  /** Return to the state held immediately after construction. */
  reset(): void;
}

/**
 * A stateful transducer of one-dimensional samples.
 * `next` runs in O(1) time and never throws; NaN and Infinity propagate.
 */
export interface StreamingIndicator extends Period, Resettable {
  /** Samples consumed since construction or the last reset. */
  readonly count: number;
  /** True once a full window of `period` samples has been seen. */
  readonly isStable: boolean;
  next(input: IndicatorInput): number;
  toString(): string;
}

export function closeOf(input: IndicatorInput): number {
  return typeof input === "number" ? input : input.close;
}
