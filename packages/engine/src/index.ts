/**
 * Pegvault Engine
 *
 * Over-collateralized debt engine: accounts lock collateral assets and
 * mint a liability token pegged to one USD against them, as long as their
 * health factor stays at or above 1.0.
 *
 * @example
 * ```typescript
 * import {
 *   DebtEngine,
 *   MemoryCollateralToken,
 *   MemoryLiabilityToken,
 *   StaticPriceFeed,
 *   PRECISION,
 * } from "@pegvault/engine";
 *
 * const weth = new MemoryCollateralToken("weth", "engine");
 * const pusd = new MemoryLiabilityToken();
 * const ethUsd = new StaticPriceFeed("eth-usd", 8, 2000_00000000n);
 *
 * const engine = new DebtEngine({
 *   collateral: [{ id: "weth", token: weth }],
 *   priceFeeds: [ethUsd],
 *   liabilityToken: pusd,
 *   custodyAccount: "engine",
 * });
 *
 * weth.mintTo("alice", 10n * PRECISION);
 * engine.depositCollateralAndMintDebt("alice", "weth", 10n * PRECISION, 10_000n * PRECISION);
 *
 * // Price drops, bob liquidates half of alice's debt
 * ethUsd.updateAnswer(1500_00000000n);
 * engine.liquidate("bob", "alice", "weth", 5_000n * PRECISION);
 * ```
 */

// Core - Identifiers, errors and constants
export {
	// Types
	type AccountId,
	type AssetId,
	type EngineErrorCode,
	type EngineLogger,
	// Classes
	EngineError,
	// Utilities
	isEngineError,
	toError,
	silentLogger,
	requirePositive,
	// Constants
	PRECISION,
	PRECISION_DECIMALS,
	LIQUIDATION_THRESHOLD,
	LIQUIDATION_PRECISION,
	LIQUIDATION_BONUS,
	MIN_HEALTH_FACTOR,
	MAX_HEALTH_FACTOR,
	ORACLE_TIMEOUT_SECONDS,
} from "./core/index.js";

// Oracle - Price feeds
export {
	// Types
	type OracleReading,
	type PriceFeed,
	type PriceOracleOptions,
	// Classes
	PriceOracle,
	StaticPriceFeed,
	// Utilities
	scaleToPrecision,
} from "./oracle/index.js";

// Registry - Supported collateral
export {
	type CollateralAsset,
	type RegisteredAsset,
	AssetRegistry,
} from "./registry/index.js";

// Storage - Ledger persistence
export {
	// Types
	type LedgerSnapshot,
	type LedgerStore,
	type TransactionalLedgerStore,
	// Classes
	MemoryLedgerStore,
	StorageError,
} from "./storage/index.js";

// Ledgers
export { CollateralLedger, DebtLedger } from "./ledger/index.js";

// Risk - Health factors
export {
	type AccountInformation,
	RiskEngine,
	calculateHealthFactor,
	isHealthy,
} from "./risk/index.js";

// Custody - Value movement and reentrancy protection
export {
	// Types
	type LiabilityToken,
	type CollateralTransfer,
	type Interaction,
	type TransferRecord,
	type TransferHook,
	// Classes
	CustodyLayer,
	ReentrancyGuard,
	UnitOfWork,
	MemoryCollateralToken,
	MemoryLiabilityToken,
} from "./custody/index.js";

// Liquidation
export {
	type LiquidationRequest,
	type LiquidationResult,
	LiquidationEngine,
} from "./liquidation/index.js";

// Engine - Exposed operations and events
export {
	// Types
	type DebtEngineConfig,
	type EngineParameters,
	type PositionSummary,
	type CollateralDeposited,
	type CollateralWithdrawn,
	type DebtMinted,
	type DebtBurned,
	type LiquidationExecuted,
	type EngineEvent,
	type EngineEventType,
	type EngineEventListener,
	// Event names
	COLLATERAL_DEPOSITED,
	COLLATERAL_WITHDRAWN,
	DEBT_MINTED,
	DEBT_BURNED,
	LIQUIDATION_EXECUTED,
	// Classes
	DebtEngine,
} from "./engine/index.js";
