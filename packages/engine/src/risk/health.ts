/**
 * Health factor arithmetic.
 */

import {
	LIQUIDATION_PRECISION,
	LIQUIDATION_THRESHOLD,
	MAX_HEALTH_FACTOR,
	MIN_HEALTH_FACTOR,
	PRECISION,
} from "../core/constants.js";

/**
 * Health factor (18 decimals) of a position.
 *
 * `(collateralValueUsd * threshold / 100) * 1e18 / debtMinted`, or
 * MAX_HEALTH_FACTOR when there is no debt.
 *
 * @example
 * ```typescript
 * // $20,000 of collateral against $10,000 of debt at a 50% threshold
 * calculateHealthFactor(10_000n * PRECISION, 20_000n * PRECISION); // 1e18
 * ```
 */
export function calculateHealthFactor(
	debtMinted: bigint,
	collateralValueUsd: bigint,
	liquidationThreshold: bigint = LIQUIDATION_THRESHOLD,
): bigint {
	if (debtMinted === 0n) return MAX_HEALTH_FACTOR;
	const adjusted =
		(collateralValueUsd * liquidationThreshold) / LIQUIDATION_PRECISION;
	return (adjusted * PRECISION) / debtMinted;
}

/**
 * Whether a health factor satisfies the solvency invariant. Exactly 1.0 is healthy.
 */
export function isHealthy(healthFactor: bigint): boolean {
	return healthFactor >= MIN_HEALTH_FACTOR;
}
