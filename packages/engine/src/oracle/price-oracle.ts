/**
 * Price Oracle Adapter
 *
 * Reads the registered feed of an asset, validates the reading and scales
 * it to the engine's 18-decimal fixed-point format.
 */

import { AssetId, EngineError } from "../core/types.js";
import {
	ORACLE_TIMEOUT_SECONDS,
	PRECISION,
	PRECISION_DECIMALS,
} from "../core/constants.js";
import { AssetRegistry } from "../registry/asset-registry.js";
import { OracleReading, PriceOracleOptions } from "./types.js";

const systemClock = (): number => Math.floor(Date.now() / 1000);

/**
 * Price oracle adapter.
 *
 * Every call re-reads the feed; nothing is cached.
 *
 * @example
 * ```typescript
 * const oracle = new PriceOracle(registry, { timeoutSeconds: 3600 });
 *
 * oracle.priceOf("weth");                    // 2000_000000000000000000n
 * oracle.usdValue("weth", 10n * PRECISION);  // 20000_000000000000000000n
 * ```
 */
export class PriceOracle {
	readonly timeoutSeconds: number;
	private readonly now: () => number;

	constructor(
		private readonly registry: AssetRegistry,
		options: PriceOracleOptions = {},
	) {
		this.timeoutSeconds = options.timeoutSeconds ?? ORACLE_TIMEOUT_SECONDS;
		this.now = options.now ?? systemClock;
	}

	/**
	 * USD price of one whole unit of the asset, 18 decimals.
	 *
	 * @throws EngineError ORACLE_ERROR
	 */
	priceOf(asset: AssetId): bigint {
		const feed = this.registry.priceFeedOf(asset);
		if (!feed) {
			throw new EngineError(
				`No price feed registered for asset "${asset}"`,
				"ORACLE_ERROR",
				{ asset },
			);
		}

		let reading: OracleReading;
		try {
			reading = feed.latestReading();
		} catch (err) {
			throw new EngineError(
				`Price feed "${feed.id}" failed to report`,
				"ORACLE_ERROR",
				{ asset, feed: feed.id },
				{ cause: err },
			);
		}

		this.validate(asset, feed.id, reading);
		const price = scaleToPrecision(reading.price, reading.decimals);
		if (price === 0n) {
			throw new EngineError(
				`Price feed "${feed.id}" reported a price below the engine's resolution`,
				"ORACLE_ERROR",
				{ asset, feed: feed.id, decimals: reading.decimals },
			);
		}
		return price;
	}

	/**
	 * USD value (18 decimals) of an amount of the asset.
	 */
	usdValue(asset: AssetId, amount: bigint): bigint {
		return (this.priceOf(asset) * amount) / PRECISION;
	}

	/**
	 * Amount of the asset worth `usdAmount` (18 decimals) at the current price.
	 */
	assetAmountFromUsd(asset: AssetId, usdAmount: bigint): bigint {
		return (usdAmount * PRECISION) / this.priceOf(asset);
	}

	private validate(asset: AssetId, feedId: string, reading: OracleReading): void {
		const details = {
			asset,
			feed: feedId,
			price: reading.price.toString(),
			updatedAt: reading.updatedAt,
		};

		if (reading.price <= 0n) {
			throw new EngineError(
				`Price feed "${feedId}" reported a non-positive price`,
				"ORACLE_ERROR",
				details,
			);
		}
		if (!Number.isInteger(reading.decimals) || reading.decimals < 0) {
			throw new EngineError(
				`Price feed "${feedId}" reported invalid decimals ${reading.decimals}`,
				"ORACLE_ERROR",
				details,
			);
		}
		if (reading.updatedAt === 0) {
			throw new EngineError(
				`Price feed "${feedId}" has never been updated`,
				"ORACLE_ERROR",
				details,
			);
		}
		if (
			reading.roundId !== undefined &&
			reading.answeredInRound !== undefined &&
			reading.answeredInRound < reading.roundId
		) {
			throw new EngineError(
				`Price feed "${feedId}" answer is from an earlier round`,
				"ORACLE_ERROR",
				details,
			);
		}

		const age = this.now() - reading.updatedAt;
		if (age > this.timeoutSeconds) {
			throw new EngineError(
				`Price feed "${feedId}" is stale: last update ${age}s ago (limit ${this.timeoutSeconds}s)`,
				"ORACLE_ERROR",
				{ ...details, age },
			);
		}
	}
}

/**
 * Rescale a fixed-point value from `decimals` to 18 decimals.
 */
export function scaleToPrecision(value: bigint, decimals: number): bigint {
	if (decimals === PRECISION_DECIMALS) return value;
	if (decimals < PRECISION_DECIMALS) {
		return value * 10n ** BigInt(PRECISION_DECIMALS - decimals);
	}
	return value / 10n ** BigInt(decimals - PRECISION_DECIMALS);
}
