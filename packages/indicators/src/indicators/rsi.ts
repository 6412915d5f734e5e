import { assertPeriod } from "@ticktape/kit";
import { closeOf, type IndicatorInput, type StreamingIndicator } from "../types/indicator.js";
import { SMA } from "./sma.js";

export const DEFAULT_RSI_PERIOD = 14;

/** Below this U + D the oscillator reports the neutral value. */
const NEUTRAL_EPSILON = 1e-9;
const NEUTRAL = 50;

/**
 * Relative Strength Index smoothed with two plain SMAs.
 *
 *   RSI = 100 * U / (U + D)
 *
 * where U is the SMA of up moves and D the SMA of down moves. A move is "up"
 * only when the sample is strictly greater than the previous one; equal
 * samples feed zero to the down average. The first sample only seeds the
 * previous value and feeds zero to both averages, so it always reads 50.
 * Output stays within [0, 100].
 */
export class RSI implements StreamingIndicator {
  readonly period: number;
  private readonly upMa: SMA;
  private readonly downMa: SMA;
  private prevValue = 0;
  private isNew = true;

  constructor(period: number = DEFAULT_RSI_PERIOD) {
    this.period = assertPeriod(period, "RSI period");
    this.upMa = new SMA(this.period);
    this.downMa = new SMA(this.period);
  }

  get count(): number {
    return this.upMa.count;
  }

  get isStable(): boolean {
    return this.upMa.isStable;
  }

  next(input: IndicatorInput): number {
    const value = closeOf(input);
    let up: number;
    let down: number;

    if (this.isNew) {
      this.isNew = false;
      up = this.upMa.next(0);
      down = this.downMa.next(0);
    } else if (value > this.prevValue) {
      up = this.upMa.next(value - this.prevValue);
      down = this.downMa.next(0);
    } else {
      up = this.upMa.next(0);
      down = this.downMa.next(this.prevValue - value);
    }
    this.prevValue = value;

    // Window sums can drift just below zero once their moves are evicted
    up = Math.max(0, up);
    down = Math.max(0, down);

    if (up + down < NEUTRAL_EPSILON) return NEUTRAL;
    // The ratio is in [0, 1] and exactly 1 when down is 0
    return 100 * (up / (up + down));
  }

  reset(): void {
    this.isNew = true;
    this.prevValue = 0;
    this.upMa.reset();
    this.downMa.reset();
  }

  toString(): string {
    return `RSI(${this.period})`;
  }
}
