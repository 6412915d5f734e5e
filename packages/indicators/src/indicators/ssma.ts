import { assertPeriod } from "@ticktape/kit";
import { closeOf, type IndicatorInput, type StreamingIndicator } from "../types/indicator.js";

export const DEFAULT_SSMA_PERIOD = 9;

/**
 * Smoothed Simple Moving Average.
 *
 * For the first `period` samples the value is the plain mean of everything
 * seen so far. From sample `period + 1` on it follows the one-pole recurrence
 *
 *   SSMA(t) = (SSMA(t-1) * (period - 1) + x(t)) / period
 *
 * seeded with the warm-up mean. No window is kept.
 */
export class SSMA implements StreamingIndicator {
  readonly period: number;
  private samples = 0;
  private sum = 0; // only read during warm-up
  private current = 0;

  constructor(period: number = DEFAULT_SSMA_PERIOD) {
    this.period = assertPeriod(period, "SSMA period");
  }

  get count(): number {
    return this.samples;
  }

  get isStable(): boolean {
    return this.samples >= this.period;
  }

  next(input: IndicatorInput): number {
    const value = closeOf(input);
    this.samples += 1;

    if (this.samples <= this.period) {
      this.sum += value;
      this.current = this.sum / this.samples;
    } else {
      this.current = (this.current * (this.period - 1) + value) / this.period;
    }

    return this.current;
  }

  reset(): void {
    this.samples = 0;
    this.sum = 0;
    this.current = 0;
  }

  toString(): string {
    return `SSMA(${this.period})`;
  }
}
