/**
 * Registry module - The fixed set of supported collateral assets
 */

export type { CollateralAsset, RegisteredAsset } from "./asset-registry.js";
export { AssetRegistry } from "./asset-registry.js";
