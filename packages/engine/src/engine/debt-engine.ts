/**
 * Debt Engine
 *
 * The exposed surface of the over-collateralized debt engine. Wires the
 * registry, oracle adapter, ledgers, risk and liquidation engines behind
 * the custody layer's guard.
 */

import {
	AccountId,
	AssetId,
	EngineError,
	EngineLogger,
	silentLogger,
	toError,
} from "../core/types.js";
import {
	LIQUIDATION_BONUS,
	LIQUIDATION_PRECISION,
	LIQUIDATION_THRESHOLD,
	MIN_HEALTH_FACTOR,
	PRECISION,
} from "../core/constants.js";
import { CustodyLayer } from "../custody/custody-layer.js";
import { ReentrancyGuard } from "../custody/reentrancy-guard.js";
import { UnitOfWork } from "../custody/unit-of-work.js";
import { CollateralLedger } from "../ledger/collateral-ledger.js";
import { DebtLedger } from "../ledger/debt-ledger.js";
import { LiquidationEngine } from "../liquidation/liquidation-engine.js";
import { LiquidationResult } from "../liquidation/types.js";
import { PriceOracle } from "../oracle/price-oracle.js";
import { AssetRegistry } from "../registry/asset-registry.js";
import { AccountInformation, RiskEngine } from "../risk/risk-engine.js";
import { MemoryLedgerStore } from "../storage/memory-ledger-store.js";
import { TransactionalLedgerStore } from "../storage/types.js";
import {
	COLLATERAL_DEPOSITED,
	COLLATERAL_WITHDRAWN,
	DEBT_BURNED,
	DEBT_MINTED,
	EngineEvent,
	EngineEventListener,
} from "./events.js";
import {
	DebtEngineConfig,
	EngineParameters,
	PositionSummary,
} from "./types.js";

/**
 * Over-collateralized debt engine.
 *
 * Every mutating operation takes the caller first, runs under the
 * reentrancy guard and is all-or-nothing: ledger changes are applied,
 * health is checked, and only then are tokens moved. Any failure restores
 * the ledgers and compensates token movements already made.
 *
 * @example
 * ```typescript
 * const engine = new DebtEngine({
 *   collateral: [{ id: "weth", token: weth }],
 *   priceFeeds: [new StaticPriceFeed("eth-usd", 8, 2000_00000000n)],
 *   liabilityToken: pusd,
 *   custodyAccount: "engine",
 * });
 *
 * engine.depositCollateralAndMintDebt("alice", "weth", 10n * PRECISION, 10_000n * PRECISION);
 * engine.getHealthFactor("alice"); // 1_000000000000000000n
 * ```
 */
export class DebtEngine {
	private readonly registry: AssetRegistry;
	private readonly store: TransactionalLedgerStore;
	private readonly oracle: PriceOracle;
	private readonly collateral: CollateralLedger;
	private readonly debt: DebtLedger;
	private readonly risk: RiskEngine;
	private readonly custody: CustodyLayer;
	private readonly liquidation: LiquidationEngine;
	private readonly guard = new ReentrancyGuard();
	private readonly logger: EngineLogger;
	private readonly listeners: Set<EngineEventListener> = new Set();

	/**
	 * @throws EngineError CONFIG_MISMATCH on invalid configuration. Nothing
	 *   is created in that case.
	 */
	constructor(config: DebtEngineConfig) {
		const liquidationThreshold =
			config.liquidationThreshold ?? LIQUIDATION_THRESHOLD;
		const liquidationBonus = config.liquidationBonus ?? LIQUIDATION_BONUS;
		validateParameters(config, liquidationThreshold, liquidationBonus);

		this.registry = new AssetRegistry(config.collateral, config.priceFeeds);
		this.logger = config.logger ?? silentLogger;
		this.store = config.store ?? new MemoryLedgerStore();
		this.oracle = new PriceOracle(this.registry, {
			timeoutSeconds: config.oracleTimeoutSeconds,
			now: config.now,
		});
		this.collateral = new CollateralLedger(
			this.store,
			this.registry,
			this.oracle,
		);
		this.debt = new DebtLedger(this.store);
		this.risk = new RiskEngine(
			this.collateral,
			this.debt,
			liquidationThreshold,
		);
		this.custody = new CustodyLayer(
			this.registry,
			config.liabilityToken,
			config.custodyAccount,
			this.logger,
		);
		this.liquidation = new LiquidationEngine(
			this.registry,
			this.oracle,
			this.collateral,
			this.debt,
			this.risk,
			this.custody,
			liquidationBonus,
		);
	}

	// =========================================================================
	// Mutating operations
	// =========================================================================

	/**
	 * Lock `amount` of `asset` as collateral, pulling it from the caller.
	 */
	depositCollateral(caller: AccountId, asset: AssetId, amount: bigint): void {
		this.execute(caller, "depositCollateral", (unit) => {
			this.collateral.deposit(caller, asset, amount);
			unit.queue(this.custody.pullCollateral(caller, asset, amount));
			unit.emit({ type: COLLATERAL_DEPOSITED, account: caller, asset, amount });
		});
	}

	/**
	 * Release `amount` of `asset` back to the caller, if the position stays healthy.
	 */
	withdrawCollateral(caller: AccountId, asset: AssetId, amount: bigint): void {
		this.execute(caller, "withdrawCollateral", (unit) => {
			this.collateral.withdraw(caller, asset, amount);
			this.risk.assertHealthy(caller);
			unit.queue(this.custody.pushCollateral(caller, asset, amount));
			unit.emit({
				type: COLLATERAL_WITHDRAWN,
				from: caller,
				to: caller,
				asset,
				amount,
			});
		});
	}

	/**
	 * Mint `amount` of liability to the caller, if the position stays healthy.
	 */
	mintDebt(caller: AccountId, amount: bigint): void {
		this.execute(caller, "mintDebt", (unit) => {
			this.debt.mint(caller, amount);
			this.risk.assertHealthy(caller);
			unit.queue(this.custody.mintLiability(caller, amount));
			unit.emit({ type: DEBT_MINTED, account: caller, amount });
		});
	}

	/**
	 * Repay `amount` of the caller's debt by burning the caller's liability tokens.
	 */
	burnDebt(caller: AccountId, amount: bigint): void {
		this.execute(caller, "burnDebt", (unit) => {
			this.debt.burn(caller, amount);
			unit.queue(this.custody.burnLiability(caller, amount));
			unit.emit({
				type: DEBT_BURNED,
				onBehalfOf: caller,
				payer: caller,
				amount,
			});
		});
	}

	/**
	 * Deposit collateral and mint against it as one operation. Health is
	 * checked once, after both ledger changes.
	 */
	depositCollateralAndMintDebt(
		caller: AccountId,
		asset: AssetId,
		collateralAmount: bigint,
		mintAmount: bigint,
	): void {
		this.execute(caller, "depositCollateralAndMintDebt", (unit) => {
			this.collateral.deposit(caller, asset, collateralAmount);
			this.debt.mint(caller, mintAmount);
			this.risk.assertHealthy(caller);
			unit.queue(
				this.custody.pullCollateral(caller, asset, collateralAmount),
				this.custody.mintLiability(caller, mintAmount),
			);
			unit.emit({
				type: COLLATERAL_DEPOSITED,
				account: caller,
				asset,
				amount: collateralAmount,
			});
			unit.emit({ type: DEBT_MINTED, account: caller, amount: mintAmount });
		});
	}

	/**
	 * Burn debt and withdraw collateral as one operation. Health is checked
	 * once, after both ledger changes.
	 */
	redeemCollateralForDebt(
		caller: AccountId,
		asset: AssetId,
		collateralAmount: bigint,
		burnAmount: bigint,
	): void {
		this.execute(caller, "redeemCollateralForDebt", (unit) => {
			this.debt.burn(caller, burnAmount);
			this.collateral.withdraw(caller, asset, collateralAmount);
			this.risk.assertHealthy(caller);
			unit.queue(
				this.custody.burnLiability(caller, burnAmount),
				this.custody.pushCollateral(caller, asset, collateralAmount),
			);
			unit.emit({
				type: DEBT_BURNED,
				onBehalfOf: caller,
				payer: caller,
				amount: burnAmount,
			});
			unit.emit({
				type: COLLATERAL_WITHDRAWN,
				from: caller,
				to: caller,
				asset,
				amount: collateralAmount,
			});
		});
	}

	/**
	 * Repay `debtToCover` of `target`'s debt with the caller's liability
	 * tokens and receive the equivalent `asset` collateral plus the bonus.
	 */
	liquidate(
		caller: AccountId,
		target: AccountId,
		asset: AssetId,
		debtToCover: bigint,
	): LiquidationResult {
		const result = this.execute(caller, "liquidate", (unit) =>
			this.liquidation.liquidate(unit, {
				liquidator: caller,
				target,
				asset,
				debtToCover,
			}),
		);
		if (result.stillUndercollateralized) {
			this.logger.warn(
				`${target} remains undercollateralized after liquidation by ${caller}: health factor ${result.endingHealthFactor}`,
			);
		}
		return result;
	}

	// =========================================================================
	// Read-only views
	// =========================================================================

	getHealthFactor(account: AccountId): bigint {
		return this.risk.healthFactor(account);
	}

	getAccountCollateralValue(account: AccountId): bigint {
		return this.collateral.valueUsd(account);
	}

	getAccountInformation(account: AccountId): AccountInformation {
		return this.risk.accountInformation(account);
	}

	getPosition(account: AccountId): PositionSummary {
		const { debtMinted, collateralValueUsd } =
			this.risk.accountInformation(account);
		return {
			account,
			debtMinted,
			collateralValueUsd,
			healthFactor: this.risk.calculateHealthFactor(
				debtMinted,
				collateralValueUsd,
			),
			collateral: Array.from(
				this.collateral.balancesOf(account),
				([asset, amount]) => ({ asset, amount }),
			),
		};
	}

	getCollateralBalance(account: AccountId, asset: AssetId): bigint {
		return this.collateral.balanceOf(account, asset);
	}

	getCollateralBalances(account: AccountId): Map<AssetId, bigint> {
		return this.collateral.balancesOf(account);
	}

	/**
	 * Total of an asset held in custody across all accounts.
	 */
	getTotalCollateral(asset: AssetId): bigint {
		this.registry.get(asset);
		return this.collateral.totalOf(asset);
	}

	getTotalDebt(): bigint {
		return this.debt.totalDebt();
	}

	getPrice(asset: AssetId): bigint {
		this.registry.get(asset);
		return this.oracle.priceOf(asset);
	}

	getUsdValue(asset: AssetId, amount: bigint): bigint {
		this.registry.get(asset);
		return this.oracle.usdValue(asset, amount);
	}

	getTokenAmountFromUsd(asset: AssetId, usdAmount: bigint): bigint {
		this.registry.get(asset);
		return this.oracle.assetAmountFromUsd(asset, usdAmount);
	}

	calculateHealthFactor(debtMinted: bigint, collateralValueUsd: bigint): bigint {
		return this.risk.calculateHealthFactor(debtMinted, collateralValueUsd);
	}

	getCollateralAssets(): AssetId[] {
		return this.registry.ids();
	}

	/**
	 * Identifier of the price feed registered for an asset.
	 */
	getPriceFeed(asset: AssetId): string {
		return this.registry.get(asset).priceFeed.id;
	}

	getCustodyAccount(): AccountId {
		return this.custody.custodyAccount;
	}

	getParameters(): EngineParameters {
		return {
			precision: PRECISION,
			liquidationThreshold: this.risk.liquidationThreshold,
			liquidationBonus: this.liquidation.liquidationBonus,
			liquidationPrecision: LIQUIDATION_PRECISION,
			minHealthFactor: MIN_HEALTH_FACTOR,
			oracleTimeoutSeconds: this.oracle.timeoutSeconds,
		};
	}

	// =========================================================================
	// Events
	// =========================================================================

	/**
	 * Subscribe to events of committed operations.
	 *
	 * @returns Unsubscribe function
	 */
	on(listener: EngineEventListener): () => void {
		this.listeners.add(listener);
		return () => {
			this.listeners.delete(listener);
		};
	}

	// =========================================================================
	// Internals
	// =========================================================================

	private execute<T>(
		caller: AccountId,
		operation: string,
		body: (unit: UnitOfWork<EngineEvent>) => T,
	): T {
		let outcome: { result: T; events: EngineEvent[] };
		try {
			outcome = this.guard.run(caller, operation, () => {
				this.assertNotCustody(caller);
				return this.store.withTransaction(() => {
					const unit = new UnitOfWork<EngineEvent>();
					const result = body(unit);
					this.custody.settle(unit.interactions);
					return { result, events: unit.events };
				});
			});
		} catch (err) {
			const code = err instanceof EngineError ? err.code : "UNEXPECTED";
			this.logger.warn(
				`${operation} by ${caller} reverted (${code}): ${toError(err).message}`,
			);
			throw err;
		}

		this.logger.log(`${operation} by ${caller} committed`);
		this.publish(outcome.events);
		return outcome.result;
	}

	/**
	 * Custody holds collateral for others and never has a position of its own.
	 */
	private assertNotCustody(caller: AccountId): void {
		if (caller === this.custody.custodyAccount) {
			throw new EngineError(
				`The custody account ${caller} cannot call the engine`,
				"CUSTODY_CALLER",
				{ caller },
			);
		}
	}

	private publish(events: EngineEvent[]): void {
		for (const event of events) {
			for (const listener of this.listeners) {
				try {
					listener(event);
				} catch (err) {
					this.logger.error(
						`Listener failed on ${event.type}: ${toError(err).message}`,
					);
				}
			}
		}
	}
}

function validateParameters(
	config: DebtEngineConfig,
	liquidationThreshold: bigint,
	liquidationBonus: bigint,
): void {
	if (liquidationThreshold <= 0n || liquidationThreshold > LIQUIDATION_PRECISION) {
		throw new EngineError(
			`Liquidation threshold must be within 1-100, got ${liquidationThreshold}`,
			"CONFIG_MISMATCH",
			{ liquidationThreshold: liquidationThreshold.toString() },
		);
	}
	if (liquidationBonus < 0n || liquidationBonus >= LIQUIDATION_PRECISION) {
		throw new EngineError(
			`Liquidation bonus must be within 0-99, got ${liquidationBonus}`,
			"CONFIG_MISMATCH",
			{ liquidationBonus: liquidationBonus.toString() },
		);
	}
	if (!config.custodyAccount) {
		throw new EngineError("A custody account is required", "CONFIG_MISMATCH");
	}
	if (
		config.oracleTimeoutSeconds !== undefined &&
		!(config.oracleTimeoutSeconds > 0)
	) {
		throw new EngineError(
			`Oracle timeout must be positive, got ${config.oracleTimeoutSeconds}`,
			"CONFIG_MISMATCH",
			{ oracleTimeoutSeconds: config.oracleTimeoutSeconds },
		);
	}
}
