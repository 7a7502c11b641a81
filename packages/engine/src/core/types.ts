/**
 * Core types
 *
 * Identifiers, the engine error type and the logger contract shared by
 * every module of the engine.
 */

/**
 * Opaque identity of a caller or position holder.
 */
export type AccountId = string;

/**
 * Opaque identifier of a supported collateral asset.
 */
export type AssetId = string;

/**
 * Error codes raised by the engine.
 *
 * - ZERO_AMOUNT: an amount parameter was zero or negative
 * - UNSUPPORTED_ASSET: the asset is not in the registry
 * - TRANSFER_FAILED: a collaborator reported failure while moving value
 * - HEALTH_FACTOR_BROKEN: the operation would leave a position insolvent
 * - HEALTH_FACTOR_OK: liquidation attempted on a solvent position
 * - HEALTH_FACTOR_NOT_IMPROVED: liquidation would lower the health factor
 * - INSUFFICIENT_COLLATERAL: withdrawal or seizure exceeds the balance
 * - INSUFFICIENT_DEBT: burn or repayment exceeds the recorded debt
 * - ORACLE_ERROR: missing, stale or non-positive price reading
 * - REENTRANCY_BLOCKED: nested call into a guarded entry point
 * - CONFIG_MISMATCH: invalid engine construction parameters
 * - CUSTODY_CALLER: the custody account called a mutating operation
 */
export type EngineErrorCode =
	| "ZERO_AMOUNT"
	| "UNSUPPORTED_ASSET"
	| "TRANSFER_FAILED"
	| "HEALTH_FACTOR_BROKEN"
	| "HEALTH_FACTOR_OK"
	| "HEALTH_FACTOR_NOT_IMPROVED"
	| "INSUFFICIENT_COLLATERAL"
	| "INSUFFICIENT_DEBT"
	| "ORACLE_ERROR"
	| "REENTRANCY_BLOCKED"
	| "CONFIG_MISMATCH"
	| "CUSTODY_CALLER";

/**
 * Error thrown by engine operations.
 *
 * A thrown EngineError always means the whole operation was reverted.
 */
export class EngineError extends Error {
	constructor(
		message: string,
		public readonly code: EngineErrorCode,
		public readonly details?: Record<string, unknown>,
		options?: { cause?: unknown },
	) {
		super(message, options);
		this.name = "EngineError";
	}
}

/**
 * Check whether a value is an EngineError, optionally with a given code.
 */
export function isEngineError(
	err: unknown,
	code?: EngineErrorCode,
): err is EngineError {
	return err instanceof EngineError && (code === undefined || err.code === code);
}

export function toError(err: unknown): Error {
	return err instanceof Error
		? err
		: new Error("Invalid error type", { cause: err });
}

/**
 * Minimal logger accepted by the engine. Compatible with Nest's Logger.
 */
export interface EngineLogger {
	log(message: string): void;
	warn(message: string): void;
	error(message: string): void;
}

export const silentLogger: EngineLogger = {
	log: () => undefined,
	warn: () => undefined,
	error: () => undefined,
};

/**
 * Throw ZERO_AMOUNT unless the amount is strictly positive.
 */
export function requirePositive(amount: bigint, name = "amount"): void {
	if (amount <= 0n) {
		throw new EngineError(
			`${name} must be greater than zero, got ${amount}`,
			"ZERO_AMOUNT",
			{ [name]: amount.toString() },
		);
	}
}
