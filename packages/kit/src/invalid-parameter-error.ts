/** Raised when an indicator is constructed with an argument outside its domain. */
export class InvalidParameterError extends Error {
  readonly name = "InvalidParameterError";
}
