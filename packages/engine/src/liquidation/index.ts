/**
 * Liquidation module - Repaying unhealthy positions for a collateral bonus
 */

export type { LiquidationRequest, LiquidationResult } from "./types.js";
export { LiquidationEngine } from "./liquidation-engine.js";
