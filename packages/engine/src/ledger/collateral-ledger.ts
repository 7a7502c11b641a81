/**
 * Collateral Ledger
 *
 * Per-account, per-asset deposited balances and their USD valuation.
 * Pure bookkeeping: moving the underlying value is the custody layer's job.
 */

import {
	AccountId,
	AssetId,
	EngineError,
	requirePositive,
} from "../core/types.js";
import { PriceOracle } from "../oracle/price-oracle.js";
import { AssetRegistry } from "../registry/asset-registry.js";
import { LedgerStore } from "../storage/types.js";

export class CollateralLedger {
	constructor(
		private readonly store: LedgerStore,
		private readonly registry: AssetRegistry,
		private readonly oracle: PriceOracle,
	) {}

	/**
	 * Credit `amount` of `asset` to the account.
	 *
	 * @returns The new balance
	 * @throws EngineError ZERO_AMOUNT, UNSUPPORTED_ASSET
	 */
	deposit(account: AccountId, asset: AssetId, amount: bigint): bigint {
		requirePositive(amount);
		this.registry.get(asset);
		const balance = this.store.getCollateral(account, asset) + amount;
		this.store.setCollateral(account, asset, balance);
		return balance;
	}

	/**
	 * Debit `amount` of `asset` from the account.
	 *
	 * @returns The new balance
	 * @throws EngineError ZERO_AMOUNT, UNSUPPORTED_ASSET, INSUFFICIENT_COLLATERAL
	 */
	withdraw(account: AccountId, asset: AssetId, amount: bigint): bigint {
		requirePositive(amount);
		this.registry.get(asset);
		const current = this.store.getCollateral(account, asset);
		if (amount > current) {
			throw new EngineError(
				`Cannot withdraw ${amount} ${asset}: ${account} holds ${current}`,
				"INSUFFICIENT_COLLATERAL",
				{
					account,
					asset,
					requested: amount.toString(),
					available: current.toString(),
				},
			);
		}
		const balance = current - amount;
		this.store.setCollateral(account, asset, balance);
		return balance;
	}

	balanceOf(account: AccountId, asset: AssetId): bigint {
		return this.store.getCollateral(account, asset);
	}

	/**
	 * Balances of every registered asset, zeros included, in registry order.
	 */
	balancesOf(account: AccountId): Map<AssetId, bigint> {
		const held = this.store.collateralOf(account);
		return new Map(
			this.registry.ids().map((asset) => [asset, held.get(asset) ?? 0n]),
		);
	}

	/**
	 * Sum of an asset across all accounts: what custody must hold.
	 */
	totalOf(asset: AssetId): bigint {
		return this.store
			.accounts()
			.reduce((sum, account) => sum + this.store.getCollateral(account, asset), 0n);
	}

	/**
	 * USD value (18 decimals) of everything the account has deposited.
	 *
	 * Assets the account does not hold are skipped without reading their feed.
	 */
	valueUsd(account: AccountId): bigint {
		let total = 0n;
		for (const asset of this.registry.ids()) {
			const amount = this.store.getCollateral(account, asset);
			if (amount === 0n) continue;
			total += this.oracle.usdValue(asset, amount);
		}
		return total;
	}
}
