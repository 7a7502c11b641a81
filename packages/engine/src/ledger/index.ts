/**
 * Ledger module - Collateral and debt bookkeeping
 */

export { CollateralLedger } from "./collateral-ledger.js";
export { DebtLedger } from "./debt-ledger.js";
