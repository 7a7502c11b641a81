/**
 * Engine events
 *
 * Observable records of committed operations. Listeners only ever see
 * events of operations that completed; a reverted operation emits nothing.
 */

import { AccountId, AssetId } from "../core/types.js";

export const COLLATERAL_DEPOSITED = "collateral.deposited";
export type CollateralDeposited = {
	type: typeof COLLATERAL_DEPOSITED;
	account: AccountId;
	asset: AssetId;
	amount: bigint;
};

export const COLLATERAL_WITHDRAWN = "collateral.withdrawn";
export type CollateralWithdrawn = {
	type: typeof COLLATERAL_WITHDRAWN;
	/** Account whose ledger balance decreased */
	from: AccountId;
	/** Account that received the value */
	to: AccountId;
	asset: AssetId;
	amount: bigint;
};

export const DEBT_MINTED = "debt.minted";
export type DebtMinted = {
	type: typeof DEBT_MINTED;
	account: AccountId;
	amount: bigint;
};

export const DEBT_BURNED = "debt.burned";
export type DebtBurned = {
	type: typeof DEBT_BURNED;
	/** Account whose debt decreased */
	onBehalfOf: AccountId;
	/** Account whose liability tokens were burned */
	payer: AccountId;
	amount: bigint;
};

export const LIQUIDATION_EXECUTED = "liquidation.executed";
export type LiquidationExecuted = {
	type: typeof LIQUIDATION_EXECUTED;
	liquidator: AccountId;
	target: AccountId;
	asset: AssetId;
	debtCovered: bigint;
	collateralSeized: bigint;
	startingHealthFactor: bigint;
	endingHealthFactor: bigint;
	stillUndercollateralized: boolean;
};

export type EngineEvent =
	| CollateralDeposited
	| CollateralWithdrawn
	| DebtMinted
	| DebtBurned
	| LiquidationExecuted;

export type EngineEventType = EngineEvent["type"];

export type EngineEventListener = (event: EngineEvent) => void;
