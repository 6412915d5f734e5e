import { assertPeriod } from "@ticktape/kit";
import { closeOf, type IndicatorInput, type StreamingIndicator } from "../types/indicator.js";

export const DEFAULT_SMA_PERIOD = 9;

/**
 * Simple Moving Average over a ring buffer of `period` slots.
 * Until the window fills, returns the mean of every sample seen so far.
 */
export class SMA implements StreamingIndicator {
  readonly period: number;
  private readonly window: number[];
  private index = 0;
  private samples = 0;
  private sum = 0;

  constructor(period: number = DEFAULT_SMA_PERIOD) {
    this.period = assertPeriod(period, "SMA period");
    this.window = new Array<number>(this.period).fill(0);
  }

  get count(): number {
    return this.samples;
  }

  get isStable(): boolean {
    return this.samples >= this.period;
  }

  next(input: IndicatorInput): number {
    const value = closeOf(input);
    const evicted = this.window[this.index];
    this.window[this.index] = value;
    this.index = (this.index + 1) % this.period;
    this.samples += 1;
    // Empty slots hold 0, so eviction is a no-op during warm-up
    this.sum = this.sum - evicted + value;
    return this.sum / Math.min(this.samples, this.period);
  }

  reset(): void {
    this.window.fill(0);
    this.index = 0;
    this.samples = 0;
    this.sum = 0;
  }

  toString(): string {
    return `SMA(${this.period})`;
  }
}
