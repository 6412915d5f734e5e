export { InvalidParameterError } from "./invalid-parameter-error.js";
export { assertPeriod } from "./assert-period.js";
export { formatZodErrors } from "./zod-helpers.js";
export { logger, resolveLogLevel } from "./logger.js";
