/**
 * Oracle Types
 *
 * Interfaces for the external price feeds the engine reads. The engine
 * never writes to a feed; it only pulls the latest reading.
 */

/**
 * A single price reading as reported by a feed.
 */
export interface OracleReading {
	/** USD price of one whole unit, scaled by 10^decimals */
	price: bigint;
	/** Number of fractional digits in `price` */
	decimals: number;
	/** When the price was last updated (Unix seconds). 0 means never. */
	updatedAt: number;
	/** Round in which the price was computed, when the feed has rounds */
	roundId?: bigint;
	/** Round in which the answer was last carried forward */
	answeredInRound?: bigint;
}

/**
 * External read-only price feed.
 *
 * @example
 * ```typescript
 * class HttpPriceFeed implements PriceFeed {
 *   readonly id = "eth-usd";
 *   constructor(private cache: PriceCache) {}
 *
 *   latestReading(): OracleReading {
 *     const { answer, ts } = this.cache.get(this.id);
 *     return { price: answer, decimals: 8, updatedAt: ts };
 *   }
 * }
 * ```
 */
export interface PriceFeed {
	/** Oracle identifier (e.g. "eth-usd") */
	readonly id: string;
	/** Latest reading. May throw; the engine reports that as ORACLE_ERROR. */
	latestReading(): OracleReading;
}

/**
 * Options for the price oracle adapter.
 */
export interface PriceOracleOptions {
	/** Maximum age of a reading in seconds */
	timeoutSeconds?: number;
	/** Current time in Unix seconds */
	now?: () => number;
}
