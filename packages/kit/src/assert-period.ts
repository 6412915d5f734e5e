import { InvalidParameterError } from "./invalid-parameter-error.js";

/** Throws if value is not an integer >= 1. */
export function assertPeriod(value: number, label: string): number {
  if (!Number.isInteger(value) || value < 1) {
    throw new InvalidParameterError(`${label}: expected integer period >= 1, got ${value}`);
  }
  return value;
}
