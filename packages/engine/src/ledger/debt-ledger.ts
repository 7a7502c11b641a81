/**
 * Debt Ledger
 *
 * Per-account minted liability, in the 18-decimal peg unit.
 */

import { AccountId, EngineError, requirePositive } from "../core/types.js";
import { LedgerStore } from "../storage/types.js";

export class DebtLedger {
	constructor(private readonly store: LedgerStore) {}

	/**
	 * @returns The account's new debt
	 * @throws EngineError ZERO_AMOUNT
	 */
	mint(account: AccountId, amount: bigint): bigint {
		requirePositive(amount);
		const debt = this.store.getDebt(account) + amount;
		this.store.setDebt(account, debt);
		return debt;
	}

	/**
	 * @returns The account's new debt
	 * @throws EngineError ZERO_AMOUNT, INSUFFICIENT_DEBT
	 */
	burn(account: AccountId, amount: bigint): bigint {
		requirePositive(amount);
		const current = this.store.getDebt(account);
		if (amount > current) {
			throw new EngineError(
				`Cannot burn ${amount}: ${account} owes ${current}`,
				"INSUFFICIENT_DEBT",
				{
					account,
					requested: amount.toString(),
					outstanding: current.toString(),
				},
			);
		}
		const debt = current - amount;
		this.store.setDebt(account, debt);
		return debt;
	}

	debtOf(account: AccountId): bigint {
		return this.store.getDebt(account);
	}

	totalDebt(): bigint {
		return this.store
			.accounts()
			.reduce((sum, account) => sum + this.store.getDebt(account), 0n);
	}
}
