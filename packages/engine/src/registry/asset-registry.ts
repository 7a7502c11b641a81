/**
 * Supported Asset Registry
 *
 * Immutable mapping from collateral asset to its value-transfer capability
 * and its price feed. Fixed when the engine is constructed.
 */

import { AssetId, EngineError } from "../core/types.js";
import { CollateralTransfer } from "../custody/types.js";
import { PriceFeed } from "../oracle/types.js";

/**
 * A collateral asset offered to the registry.
 */
export interface CollateralAsset {
	/** Asset identifier (e.g. "weth") */
	id: AssetId;
	/** Value-transfer capability for the asset */
	token: CollateralTransfer;
}

/**
 * A registered asset with both of its capabilities.
 */
export interface RegisteredAsset {
	id: AssetId;
	token: CollateralTransfer;
	priceFeed: PriceFeed;
}

export class AssetRegistry {
	private readonly assets: ReadonlyMap<AssetId, RegisteredAsset>;
	private readonly order: readonly AssetId[];

	/**
	 * Pair each asset with the price feed at the same position.
	 *
	 * @throws EngineError CONFIG_MISMATCH on length mismatch, an empty list
	 *   or a duplicate asset
	 */
	constructor(collateral: CollateralAsset[], priceFeeds: PriceFeed[]) {
		if (collateral.length !== priceFeeds.length) {
			throw new EngineError(
				`Asset and price feed lists differ in length: ${collateral.length} assets, ${priceFeeds.length} feeds`,
				"CONFIG_MISMATCH",
				{ assets: collateral.length, priceFeeds: priceFeeds.length },
			);
		}
		if (collateral.length === 0) {
			throw new EngineError(
				"At least one collateral asset is required",
				"CONFIG_MISMATCH",
			);
		}

		const assets = new Map<AssetId, RegisteredAsset>();
		collateral.forEach((asset, i) => {
			if (assets.has(asset.id)) {
				throw new EngineError(
					`Duplicate collateral asset "${asset.id}"`,
					"CONFIG_MISMATCH",
					{ asset: asset.id },
				);
			}
			assets.set(asset.id, {
				id: asset.id,
				token: asset.token,
				priceFeed: priceFeeds[i],
			});
		});

		this.assets = assets;
		this.order = collateral.map((a) => a.id);
	}

	has(asset: AssetId): boolean {
		return this.assets.has(asset);
	}

	/**
	 * Look up a registered asset.
	 *
	 * @throws EngineError UNSUPPORTED_ASSET
	 */
	get(asset: AssetId): RegisteredAsset {
		const entry = this.assets.get(asset);
		if (!entry) {
			throw new EngineError(
				`Asset "${asset}" is not supported`,
				"UNSUPPORTED_ASSET",
				{ asset, supported: [...this.order] },
			);
		}
		return entry;
	}

	/**
	 * The price feed of an asset, if it is registered.
	 */
	priceFeedOf(asset: AssetId): PriceFeed | undefined {
		return this.assets.get(asset)?.priceFeed;
	}

	/**
	 * Asset identifiers in registration order.
	 */
	ids(): AssetId[] {
		return [...this.order];
	}
}
