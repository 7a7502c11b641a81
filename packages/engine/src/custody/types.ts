/**
 * Custody Types
 *
 * Interfaces of the value-moving collaborators. Only the custody layer
 * calls these; every other module works on the ledgers alone.
 */

import { AccountId } from "../core/types.js";

/**
 * The mint/burn-capable liability token.
 *
 * Both calls are fallible: returning false is treated like a throw and
 * reverts the operation that issued the call.
 */
export interface LiabilityToken {
	mint(account: AccountId, amount: bigint): boolean;
	burn(account: AccountId, amount: bigint): boolean;
}

/**
 * Value-transfer interface of a collateral asset.
 *
 * `transfer` moves value out of the engine's custody account.
 */
export interface CollateralTransfer {
	transferFrom(from: AccountId, to: AccountId, amount: bigint): boolean;
	transfer(to: AccountId, amount: bigint): boolean;
}

/**
 * A queued external effect, executed after the ledger phase of an
 * operation succeeded.
 */
export interface Interaction {
	/** Human-readable description used in logs and error details */
	description: string;
	/** Perform the effect. false means failure. */
	execute(): boolean;
	/** Undo the effect after a later interaction of the same unit failed */
	compensate?: () => boolean;
}
