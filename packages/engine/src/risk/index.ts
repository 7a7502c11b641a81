/**
 * Risk module - Health factors and the solvency invariant
 */

export type { AccountInformation } from "./risk-engine.js";
export { RiskEngine } from "./risk-engine.js";
export { calculateHealthFactor, isHealthy } from "./health.js";
