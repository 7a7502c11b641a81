/**
 * Reentrancy Guard
 *
 * Single-entry lock scoped to one engine instance. A guarded call made
 * while another guarded call is in progress fails immediately.
 */

import { AccountId, EngineError } from "../core/types.js";

interface LockHolder {
	account: AccountId;
	operation: string;
}

export class ReentrancyGuard {
	private holder: LockHolder | null = null;

	/**
	 * Run `fn` holding the lock. The lock is released on every exit path.
	 *
	 * @throws EngineError REENTRANCY_BLOCKED if the lock is already held
	 */
	run<T>(account: AccountId, operation: string, fn: () => T): T {
		if (this.holder) {
			throw new EngineError(
				`${operation} by ${account} blocked: ${this.holder.operation} by ${this.holder.account} is in progress`,
				"REENTRANCY_BLOCKED",
				{
					account,
					operation,
					heldBy: this.holder.account,
					heldFor: this.holder.operation,
				},
			);
		}
		this.holder = { account, operation };
		try {
			return fn();
		} finally {
			this.holder = null;
		}
	}

	isLocked(): boolean {
		return this.holder !== null;
	}
}
