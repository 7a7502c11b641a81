/**
 * In-Memory Ledger Store
 *
 * Map-backed store used by the engine by default. Transactions are
 * implemented by snapshotting the maps on begin and restoring them on
 * rollback.
 */

import { AccountId, AssetId } from "../core/types.js";
import {
	LedgerSnapshot,
	StorageError,
	TransactionalLedgerStore,
} from "./types.js";

/**
 * In-memory ledger store.
 *
 * @example
 * ```typescript
 * const store = new MemoryLedgerStore();
 *
 * store.withTransaction(() => {
 *   store.setCollateral("alice", "weth", 10n);
 *   throw new Error("abort");
 * });
 * // store.getCollateral("alice", "weth") === 0n
 * ```
 */
export class MemoryLedgerStore implements TransactionalLedgerStore {
	private collateral: Map<AccountId, Map<AssetId, bigint>> = new Map();
	private debt: Map<AccountId, bigint> = new Map();
	private pending: LedgerSnapshot | null = null;

	getCollateral(account: AccountId, asset: AssetId): bigint {
		return this.collateral.get(account)?.get(asset) ?? 0n;
	}

	setCollateral(account: AccountId, asset: AssetId, amount: bigint): void {
		assertNonNegative(amount, { account, asset });
		let balances = this.collateral.get(account);
		if (amount === 0n) {
			balances?.delete(asset);
			if (balances?.size === 0) this.collateral.delete(account);
			return;
		}
		if (!balances) {
			balances = new Map();
			this.collateral.set(account, balances);
		}
		balances.set(asset, amount);
	}

	collateralOf(account: AccountId): Map<AssetId, bigint> {
		return new Map(this.collateral.get(account) ?? []);
	}

	getDebt(account: AccountId): bigint {
		return this.debt.get(account) ?? 0n;
	}

	setDebt(account: AccountId, amount: bigint): void {
		assertNonNegative(amount, { account });
		if (amount === 0n) {
			this.debt.delete(account);
			return;
		}
		this.debt.set(account, amount);
	}

	accounts(): AccountId[] {
		return Array.from(
			new Set([...this.collateral.keys(), ...this.debt.keys()]),
		);
	}

	snapshot(): LedgerSnapshot {
		const collateral: LedgerSnapshot["collateral"] = [];
		for (const [account, balances] of this.collateral) {
			for (const [asset, amount] of balances) {
				collateral.push([account, asset, amount]);
			}
		}
		return { collateral, debt: Array.from(this.debt.entries()) };
	}

	beginTransaction(): void {
		if (this.pending) {
			throw new StorageError(
				"A transaction is already active",
				"TRANSACTION_ACTIVE",
			);
		}
		this.pending = this.snapshot();
	}

	commit(): void {
		if (!this.pending) {
			throw new StorageError("No active transaction", "NO_TRANSACTION");
		}
		this.pending = null;
	}

	rollback(): void {
		if (!this.pending) {
			throw new StorageError("No active transaction", "NO_TRANSACTION");
		}
		this.restore(this.pending);
		this.pending = null;
	}

	withTransaction<T>(fn: () => T): T {
		this.beginTransaction();
		try {
			const result = fn();
			this.commit();
			return result;
		} catch (err) {
			this.rollback();
			throw err;
		}
	}

	/**
	 * Whether a transaction is active.
	 */
	inTransaction(): boolean {
		return this.pending !== null;
	}

	/**
	 * Remove every entry.
	 */
	clear(): void {
		this.collateral.clear();
		this.debt.clear();
	}

	private restore(snapshot: LedgerSnapshot): void {
		this.clear();
		for (const [account, asset, amount] of snapshot.collateral) {
			this.setCollateral(account, asset, amount);
		}
		for (const [account, amount] of snapshot.debt) {
			this.setDebt(account, amount);
		}
	}
}

function assertNonNegative(amount: bigint, details: Record<string, string>) {
	if (amount < 0n) {
		throw new StorageError(
			`Ledger entries cannot go below zero (got ${amount})`,
			"NEGATIVE_BALANCE",
			details,
		);
	}
}
