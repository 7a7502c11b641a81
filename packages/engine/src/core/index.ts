/**
 * Core module - Identifiers, errors and protocol constants
 */

// Types
export type {
	AccountId,
	AssetId,
	EngineErrorCode,
	EngineLogger,
} from "./types.js";

export {
	EngineError,
	isEngineError,
	toError,
	silentLogger,
	requirePositive,
} from "./types.js";

// Constants
export {
	PRECISION,
	PRECISION_DECIMALS,
	LIQUIDATION_THRESHOLD,
	LIQUIDATION_PRECISION,
	LIQUIDATION_BONUS,
	MIN_HEALTH_FACTOR,
	MAX_HEALTH_FACTOR,
	ORACLE_TIMEOUT_SECONDS,
} from "./constants.js";
