/**
 * Liquidation Engine
 *
 * Lets a solvent third party repay part or all of an undercollateralized
 * account's debt and seize the matching collateral plus a bonus.
 */

import {
	AssetId,
	EngineError,
	requirePositive,
} from "../core/types.js";
import { LIQUIDATION_PRECISION } from "../core/constants.js";
import { CustodyLayer } from "../custody/custody-layer.js";
import { UnitOfWork } from "../custody/unit-of-work.js";
import {
	COLLATERAL_WITHDRAWN,
	DEBT_BURNED,
	EngineEvent,
	LIQUIDATION_EXECUTED,
} from "../engine/events.js";
import { CollateralLedger } from "../ledger/collateral-ledger.js";
import { DebtLedger } from "../ledger/debt-ledger.js";
import { PriceOracle } from "../oracle/price-oracle.js";
import { AssetRegistry } from "../registry/asset-registry.js";
import { isHealthy } from "../risk/health.js";
import { RiskEngine } from "../risk/risk-engine.js";
import { LiquidationRequest, LiquidationResult } from "./types.js";

export class LiquidationEngine {
	constructor(
		private readonly registry: AssetRegistry,
		private readonly oracle: PriceOracle,
		private readonly collateral: CollateralLedger,
		private readonly debt: DebtLedger,
		private readonly risk: RiskEngine,
		private readonly custody: CustodyLayer,
		readonly liquidationBonus: bigint,
	) {}

	/**
	 * Amount of `asset` a liquidator receives for covering `debtToCover`.
	 */
	collateralToSeize(asset: AssetId, debtToCover: bigint): bigint {
		const base = this.oracle.assetAmountFromUsd(asset, debtToCover);
		return (
			(base * (LIQUIDATION_PRECISION + this.liquidationBonus)) /
			LIQUIDATION_PRECISION
		);
	}

	/**
	 * Ledger phase of a liquidation.
	 *
	 * Applies the debt reduction and the seizure to the ledgers, verifies
	 * both positions, then queues the liability burn and the collateral
	 * payout on the unit.
	 *
	 * @throws EngineError ZERO_AMOUNT, UNSUPPORTED_ASSET, HEALTH_FACTOR_OK,
	 *   INSUFFICIENT_DEBT, INSUFFICIENT_COLLATERAL, HEALTH_FACTOR_NOT_IMPROVED,
	 *   HEALTH_FACTOR_BROKEN
	 */
	liquidate(
		unit: UnitOfWork<EngineEvent>,
		request: LiquidationRequest,
	): LiquidationResult {
		const { liquidator, target, asset, debtToCover } = request;
		requirePositive(debtToCover, "debtToCover");
		this.registry.get(asset);

		const startingHealthFactor = this.risk.healthFactor(target);
		if (isHealthy(startingHealthFactor)) {
			throw new EngineError(
				`${target} is not liquidatable: health factor ${startingHealthFactor}`,
				"HEALTH_FACTOR_OK",
				{ target, healthFactor: startingHealthFactor.toString() },
			);
		}

		const outstanding = this.debt.debtOf(target);
		if (debtToCover > outstanding) {
			throw new EngineError(
				`Cannot cover ${debtToCover}: ${target} owes ${outstanding}`,
				"INSUFFICIENT_DEBT",
				{
					target,
					requested: debtToCover.toString(),
					outstanding: outstanding.toString(),
				},
			);
		}

		const collateralSeized = this.collateralToSeize(asset, debtToCover);
		const available = this.collateral.balanceOf(target, asset);
		if (collateralSeized > available) {
			throw new EngineError(
				`Seizing ${collateralSeized} ${asset} exceeds the ${available} held by ${target}`,
				"INSUFFICIENT_COLLATERAL",
				{
					target,
					asset,
					requested: collateralSeized.toString(),
					available: available.toString(),
				},
			);
		}
		if (collateralSeized === 0n) {
			throw new EngineError(
				`Covering ${debtToCover} seizes no ${asset}`,
				"ZERO_AMOUNT",
				{ debtToCover: debtToCover.toString(), asset },
			);
		}

		this.debt.burn(target, debtToCover);
		this.collateral.withdraw(target, asset, collateralSeized);

		const endingHealthFactor = this.risk.healthFactor(target);
		if (endingHealthFactor < startingHealthFactor) {
			throw new EngineError(
				`Liquidation would worsen ${target}: ${startingHealthFactor} -> ${endingHealthFactor}`,
				"HEALTH_FACTOR_NOT_IMPROVED",
				{
					target,
					startingHealthFactor: startingHealthFactor.toString(),
					endingHealthFactor: endingHealthFactor.toString(),
				},
			);
		}
		this.risk.assertHealthy(liquidator);

		unit.queue(
			this.custody.burnLiability(liquidator, debtToCover),
			this.custody.pushCollateral(liquidator, asset, collateralSeized),
		);

		const stillUndercollateralized = !isHealthy(endingHealthFactor);
		unit.emit({
			type: COLLATERAL_WITHDRAWN,
			from: target,
			to: liquidator,
			asset,
			amount: collateralSeized,
		});
		unit.emit({
			type: DEBT_BURNED,
			onBehalfOf: target,
			payer: liquidator,
			amount: debtToCover,
		});
		unit.emit({
			type: LIQUIDATION_EXECUTED,
			liquidator,
			target,
			asset,
			debtCovered: debtToCover,
			collateralSeized,
			startingHealthFactor,
			endingHealthFactor,
			stillUndercollateralized,
		});

		return {
			collateralSeized,
			startingHealthFactor,
			endingHealthFactor,
			stillUndercollateralized,
		};
	}
}
