/** Fixed-point scale of prices, values and health factors (18 decimals). */
export const PRECISION = 10n ** 18n;

/** Decimals of the internal fixed-point scale. */
export const PRECISION_DECIMALS = 18;

/** Share of collateral value counted toward solvency, in percent. */
export const LIQUIDATION_THRESHOLD = 50n;

/** Denominator for percentage parameters. */
export const LIQUIDATION_PRECISION = 100n;

/** Premium paid to liquidators in seized collateral, in percent. */
export const LIQUIDATION_BONUS = 10n;

/** Health factor of exactly 1.0. Positions below it can be liquidated. */
export const MIN_HEALTH_FACTOR = PRECISION;

/** Health factor reported for an account without debt. */
export const MAX_HEALTH_FACTOR = 2n ** 256n - 1n;

/** Default maximum age of an oracle reading, in seconds (3 hours). */
export const ORACLE_TIMEOUT_SECONDS = 3 * 60 * 60;
