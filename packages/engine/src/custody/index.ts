/**
 * Custody module - External value movement and reentrancy protection
 */

// Types
export type {
	LiabilityToken,
	CollateralTransfer,
	Interaction,
} from "./types.js";
export type { TransferRecord, TransferHook } from "./memory-tokens.js";

// Classes
export { CustodyLayer } from "./custody-layer.js";
export { ReentrancyGuard } from "./reentrancy-guard.js";
export { UnitOfWork } from "./unit-of-work.js";

// Reference implementations
export { MemoryCollateralToken, MemoryLiabilityToken } from "./memory-tokens.js";
