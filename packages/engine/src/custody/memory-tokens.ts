/**
 * In-Memory Tokens
 *
 * Reference collaborators for tests, development and demos. Data is lost
 * when the process exits.
 */

import { AccountId } from "../core/types.js";
import { CollateralTransfer, LiabilityToken } from "./types.js";

/**
 * A completed balance movement, as seen by a transfer hook.
 */
export interface TransferRecord {
	from: AccountId;
	to: AccountId;
	amount: bigint;
}

/**
 * Called after a collateral token moved balances. Throwing reverts the
 * movement and propagates to the caller of the transfer.
 */
export type TransferHook = (transfer: TransferRecord) => void;

class Balances {
	private readonly entries: Map<AccountId, bigint> = new Map();

	get(account: AccountId): bigint {
		return this.entries.get(account) ?? 0n;
	}

	add(account: AccountId, amount: bigint): void {
		const next = this.get(account) + amount;
		if (next === 0n) {
			this.entries.delete(account);
		} else {
			this.entries.set(account, next);
		}
	}

	total(): bigint {
		let sum = 0n;
		for (const amount of this.entries.values()) sum += amount;
		return sum;
	}
}

/**
 * Collateral token held in memory.
 *
 * `holder` is the account that `transfer` sends from: the engine's
 * custody account. The token trusts its holder, so there are no allowances.
 *
 * @example
 * ```typescript
 * const weth = new MemoryCollateralToken("weth", "engine");
 * weth.mintTo("alice", 10n * PRECISION);
 *
 * // Simulate a token that calls back into the engine on every transfer
 * weth.onTransfer(({ from }) => engine.depositCollateral(from, "weth", 1n));
 * ```
 */
export class MemoryCollateralToken implements CollateralTransfer {
	private readonly balances = new Balances();
	private hook: TransferHook | undefined;

	constructor(
		readonly symbol: string,
		readonly holder: AccountId,
	) {}

	balanceOf(account: AccountId): bigint {
		return this.balances.get(account);
	}

	totalSupply(): bigint {
		return this.balances.total();
	}

	/**
	 * Create new tokens out of thin air (faucet).
	 */
	mintTo(account: AccountId, amount: bigint): void {
		if (amount <= 0n) {
			throw new RangeError(`Mint amount must be positive, got ${amount}`);
		}
		this.balances.add(account, amount);
	}

	/**
	 * Install (or remove, with undefined) the transfer hook.
	 */
	onTransfer(hook: TransferHook | undefined): void {
		this.hook = hook;
	}

	transferFrom(from: AccountId, to: AccountId, amount: bigint): boolean {
		return this.move(from, to, amount);
	}

	transfer(to: AccountId, amount: bigint): boolean {
		return this.move(this.holder, to, amount);
	}

	private move(from: AccountId, to: AccountId, amount: bigint): boolean {
		if (amount < 0n || this.balances.get(from) < amount) {
			return false;
		}
		this.balances.add(from, -amount);
		this.balances.add(to, amount);

		if (this.hook) {
			try {
				this.hook({ from, to, amount });
			} catch (err) {
				this.balances.add(to, -amount);
				this.balances.add(from, amount);
				throw err;
			}
		}
		return true;
	}
}

/**
 * Liability token held in memory. Only the engine should mint and burn;
 * `transfer` lets holders move tokens between themselves.
 */
export class MemoryLiabilityToken implements LiabilityToken {
	private readonly balances = new Balances();

	constructor(readonly symbol: string = "PUSD") {}

	balanceOf(account: AccountId): bigint {
		return this.balances.get(account);
	}

	totalSupply(): bigint {
		return this.balances.total();
	}

	mint(account: AccountId, amount: bigint): boolean {
		if (amount <= 0n) return false;
		this.balances.add(account, amount);
		return true;
	}

	burn(account: AccountId, amount: bigint): boolean {
		if (amount <= 0n || this.balances.get(account) < amount) return false;
		this.balances.add(account, -amount);
		return true;
	}

	transfer(from: AccountId, to: AccountId, amount: bigint): boolean {
		if (amount <= 0n || this.balances.get(from) < amount) return false;
		this.balances.add(from, -amount);
		this.balances.add(to, amount);
		return true;
	}
}
