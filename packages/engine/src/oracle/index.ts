/**
 * Oracle module - Price feed integration
 *
 * Defines the feed interface the engine reads, the adapter that validates
 * and scales readings, and a settable reference feed.
 */

// Types
export type {
	OracleReading,
	PriceFeed,
	PriceOracleOptions,
} from "./types.js";

// Adapter
export { PriceOracle, scaleToPrecision } from "./price-oracle.js";

// Reference implementations
export { StaticPriceFeed } from "./static-price-feed.js";
