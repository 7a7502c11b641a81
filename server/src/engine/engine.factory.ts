import { Logger } from "@nestjs/common";
import {
	DebtEngine,
	MemoryCollateralToken,
	MemoryLiabilityToken,
	StaticPriceFeed,
} from "@pegvault/engine";
import { FEED_DECIMALS } from "./engine.constants";
import { EngineSettings } from "./engine-settings";

/**
 * The value-moving and price-reporting collaborators the server wires into
 * its engine. In-memory: balances and prices live as long as the process.
 */
export type EngineCollaborators = {
	/** Keyed by asset id */
	tokens: Map<string, MemoryCollateralToken>;
	/** Keyed by feed id */
	feeds: Map<string, StaticPriceFeed>;
	liability: MemoryLiabilityToken;
};

export function createCollaborators(
	settings: EngineSettings,
): EngineCollaborators {
	return {
		tokens: new Map(
			settings.assets.map((asset) => [
				asset,
				new MemoryCollateralToken(asset, settings.custodyAccount),
			]),
		),
		feeds: new Map(
			settings.priceFeeds.map((feed, i) => [
				feed,
				new StaticPriceFeed(feed, FEED_DECIMALS, settings.initialPrices[i]),
			]),
		),
		liability: new MemoryLiabilityToken(),
	};
}

export function createDebtEngine(
	settings: EngineSettings,
	collaborators: EngineCollaborators,
): DebtEngine {
	const logger = new Logger(DebtEngine.name);
	const engine = new DebtEngine({
		collateral: Array.from(collaborators.tokens, ([id, token]) => ({
			id,
			token,
		})),
		priceFeeds: Array.from(collaborators.feeds.values()),
		liabilityToken: collaborators.liability,
		custodyAccount: settings.custodyAccount,
		liquidationThreshold: settings.liquidationThreshold,
		liquidationBonus: settings.liquidationBonus,
		oracleTimeoutSeconds: settings.oracleTimeoutSeconds,
		logger,
	});
	logger.log(
		`Engine ready: ${engine.getCollateralAssets().join(", ")} (threshold ${settings.liquidationThreshold}%, bonus ${settings.liquidationBonus}%)`,
	);
	return engine;
}
