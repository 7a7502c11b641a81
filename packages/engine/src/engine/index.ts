/**
 * Engine module - The exposed debt engine and its events
 */

// Types
export type {
	DebtEngineConfig,
	EngineParameters,
	PositionSummary,
} from "./types.js";
export type {
	CollateralDeposited,
	CollateralWithdrawn,
	DebtMinted,
	DebtBurned,
	LiquidationExecuted,
	EngineEvent,
	EngineEventType,
	EngineEventListener,
} from "./events.js";

// Event names
export {
	COLLATERAL_DEPOSITED,
	COLLATERAL_WITHDRAWN,
	DEBT_MINTED,
	DEBT_BURNED,
	LIQUIDATION_EXECUTED,
} from "./events.js";

// Classes
export { DebtEngine } from "./debt-engine.js";
