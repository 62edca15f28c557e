/**
 * Tier thresholds and runtime defaults shared by the models, API and CLI.
 */

/** Days per year used to turn an A/R-to-sales ratio into benchmark DSO days. */
export const DAYS_PER_YEAR = 365;

/** ARR (USD) at which a client moves from Small to Middle market. */
export const MIDDLE_MARKET_ARR_THRESHOLD = 25_000_000;

/** ARR (USD) at which a client moves from Middle market to Enterprise. */
export const ENTERPRISE_ARR_THRESHOLD = 50_000_000;

/** Default port for the HTTP API when PORT is not set. */
export const DEFAULT_PORT = 3000;

/** Input file used by run-roi.ts when no path is given. */
export const DEFAULT_INPUT_FILE = "example-request.json";
