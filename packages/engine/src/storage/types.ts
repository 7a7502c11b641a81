/**
 * Ledger Store Types
 *
 * Defines the interface of the store that backs both ledgers. The engine
 * owns exactly one store; every mutating operation runs inside one of its
 * transactions so a failure discards all ledger changes of the operation.
 */

import { AccountId, AssetId } from "../core/types.js";

/**
 * Point-in-time copy of the whole store.
 */
export interface LedgerSnapshot {
	collateral: Array<[AccountId, AssetId, bigint]>;
	debt: Array<[AccountId, bigint]>;
}

/**
 * Storage for per-account collateral balances and minted debt.
 *
 * Absent entries read as zero. Writing zero removes the entry.
 */
export interface LedgerStore {
	getCollateral(account: AccountId, asset: AssetId): bigint;
	setCollateral(account: AccountId, asset: AssetId, amount: bigint): void;
	/** Non-zero collateral balances of an account */
	collateralOf(account: AccountId): Map<AssetId, bigint>;
	getDebt(account: AccountId): bigint;
	setDebt(account: AccountId, amount: bigint): void;
	/** Accounts with any non-zero entry */
	accounts(): AccountId[];
	snapshot(): LedgerSnapshot;
}

/**
 * Ledger store with transaction support.
 */
export interface TransactionalLedgerStore extends LedgerStore {
	beginTransaction(): void;
	commit(): void;
	rollback(): void;
	/**
	 * Run `fn` inside a transaction.
	 *
	 * If the function throws, the transaction is rolled back and the error
	 * rethrown. Otherwise, it's committed.
	 */
	withTransaction<T>(fn: () => T): T;
}

/**
 * Error thrown by store operations. These indicate engine bugs, not
 * caller mistakes.
 */
export class StorageError extends Error {
	constructor(
		message: string,
		public readonly code?: string,
		public readonly details?: unknown,
	) {
		super(message);
		this.name = "StorageError";
	}
}
