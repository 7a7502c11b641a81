import { AccountId, AssetId } from "../core/types.js";

export interface LiquidationRequest {
	/** Account repaying the debt and receiving the collateral */
	liquidator: AccountId;
	/** Undercollateralized account being liquidated */
	target: AccountId;
	/** Collateral asset to seize */
	asset: AssetId;
	/** Debt to repay, in the peg unit */
	debtToCover: bigint;
}

export interface LiquidationResult {
	/** Collateral paid out to the liquidator, bonus included */
	collateralSeized: bigint;
	startingHealthFactor: bigint;
	endingHealthFactor: bigint;
	/** The target is still below a health factor of 1.0 */
	stillUndercollateralized: boolean;
}
