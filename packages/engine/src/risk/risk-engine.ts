/**
 * Risk Engine
 *
 * Derives health factors from the two ledgers and the oracle and enforces
 * the solvency invariant.
 */

import { AccountId, EngineError } from "../core/types.js";
import { CollateralLedger } from "../ledger/collateral-ledger.js";
import { DebtLedger } from "../ledger/debt-ledger.js";
import { calculateHealthFactor, isHealthy } from "./health.js";

/**
 * Debt and collateral value of an account.
 */
export interface AccountInformation {
	debtMinted: bigint;
	collateralValueUsd: bigint;
}

export class RiskEngine {
	constructor(
		private readonly collateral: CollateralLedger,
		private readonly debt: DebtLedger,
		readonly liquidationThreshold: bigint,
	) {}

	accountInformation(account: AccountId): AccountInformation {
		return {
			debtMinted: this.debt.debtOf(account),
			collateralValueUsd: this.collateral.valueUsd(account),
		};
	}

	/**
	 * Current health factor of the account.
	 *
	 * An account without debt does not read any price feed.
	 */
	healthFactor(account: AccountId): bigint {
		const debtMinted = this.debt.debtOf(account);
		if (debtMinted === 0n) {
			return calculateHealthFactor(0n, 0n, this.liquidationThreshold);
		}
		return calculateHealthFactor(
			debtMinted,
			this.collateral.valueUsd(account),
			this.liquidationThreshold,
		);
	}

	calculateHealthFactor(debtMinted: bigint, collateralValueUsd: bigint): bigint {
		return calculateHealthFactor(
			debtMinted,
			collateralValueUsd,
			this.liquidationThreshold,
		);
	}

	/**
	 * @returns The account's health factor
	 * @throws EngineError HEALTH_FACTOR_BROKEN when below 1.0
	 */
	assertHealthy(account: AccountId): bigint {
		const healthFactor = this.healthFactor(account);
		if (!isHealthy(healthFactor)) {
			throw new EngineError(
				`Health factor of ${account} would fall to ${healthFactor}`,
				"HEALTH_FACTOR_BROKEN",
				{ account, healthFactor: healthFactor.toString() },
			);
		}
		return healthFactor;
	}
}
