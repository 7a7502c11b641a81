/**
 * Debt Engine Types
 */

import { AccountId, AssetId, EngineLogger } from "../core/types.js";
import { LiabilityToken } from "../custody/types.js";
import { PriceFeed } from "../oracle/types.js";
import { CollateralAsset } from "../registry/asset-registry.js";
import { TransactionalLedgerStore } from "../storage/types.js";

/**
 * Configuration for creating a debt engine.
 */
export interface DebtEngineConfig {
	/** Supported collateral assets, paired by position with `priceFeeds` */
	collateral: CollateralAsset[];
	/** One price feed per collateral asset */
	priceFeeds: PriceFeed[];
	/** The liability token the engine mints and burns */
	liabilityToken: LiabilityToken;
	/** Account that holds deposited collateral on the engine's behalf */
	custodyAccount: AccountId;
	/** Percent of collateral value counted toward solvency (default 50) */
	liquidationThreshold?: bigint;
	/** Percent premium paid to liquidators (default 10) */
	liquidationBonus?: bigint;
	/** Maximum age of a price reading in seconds (default 3 hours) */
	oracleTimeoutSeconds?: number;
	/** Clock in Unix seconds, used for staleness checks */
	now?: () => number;
	/** Ledger store (default: a fresh MemoryLedgerStore) */
	store?: TransactionalLedgerStore;
	/** Logger (default: silent) */
	logger?: EngineLogger;
}

/**
 * Protocol parameters of an engine instance.
 */
export interface EngineParameters {
	precision: bigint;
	liquidationThreshold: bigint;
	liquidationBonus: bigint;
	liquidationPrecision: bigint;
	minHealthFactor: bigint;
	oracleTimeoutSeconds: number;
}

/**
 * Everything known about one account.
 */
export interface PositionSummary {
	account: AccountId;
	debtMinted: bigint;
	collateralValueUsd: bigint;
	healthFactor: bigint;
	collateral: Array<{ asset: AssetId; amount: bigint }>;
}
