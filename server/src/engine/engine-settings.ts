import { ConfigService } from "@nestjs/config";
import {
	EngineError,
	LIQUIDATION_BONUS,
	LIQUIDATION_THRESHOLD,
	ORACLE_TIMEOUT_SECONDS,
} from "@pegvault/engine";

export type EngineSettings = {
	assets: string[];
	priceFeeds: string[];
	/** Initial feed answers, 8 decimals, one per feed */
	initialPrices: bigint[];
	liquidationThreshold: bigint;
	liquidationBonus: bigint;
	oracleTimeoutSeconds: number;
	custodyAccount: string;
};

const DEFAULTS = {
	COLLATERAL_ASSETS: "weth,wbtc",
	PRICE_FEEDS: "eth-usd,btc-usd",
	INITIAL_PRICES: "200000000000,4000000000000",
	ENGINE_CUSTODY_ACCOUNT: "engine",
};

const list = (value: string): string[] =>
	value
		.split(",")
		.map((item) => item.trim())
		.filter((item) => item.length > 0);

function integer(name: string, value: string): bigint {
	if (!/^\d+$/.test(value)) {
		throw new EngineError(
			`${name} must be a non-negative integer, got "${value}"`,
			"CONFIG_MISMATCH",
			{ [name]: value },
		);
	}
	return BigInt(value);
}

/**
 * Read the engine's settings from the environment.
 *
 * @throws EngineError CONFIG_MISMATCH on malformed values or when the
 *   number of initial prices differs from the number of feeds. A mismatch
 *   between assets and feeds is left to the engine to report.
 */
export function readEngineSettings(config: ConfigService): EngineSettings {
	const get = (key: string, fallback: string): string =>
		config.get<string>(key)?.trim() || fallback;

	const priceFeeds = list(get("PRICE_FEEDS", DEFAULTS.PRICE_FEEDS));
	const initialPrices = list(get("INITIAL_PRICES", DEFAULTS.INITIAL_PRICES)).map(
		(price) => integer("INITIAL_PRICES", price),
	);
	if (initialPrices.length !== priceFeeds.length) {
		throw new EngineError(
			`Expected ${priceFeeds.length} initial prices, got ${initialPrices.length}`,
			"CONFIG_MISMATCH",
			{ priceFeeds: priceFeeds.length, initialPrices: initialPrices.length },
		);
	}

	return {
		assets: list(get("COLLATERAL_ASSETS", DEFAULTS.COLLATERAL_ASSETS)),
		priceFeeds,
		initialPrices,
		liquidationThreshold: integer(
			"LIQUIDATION_THRESHOLD",
			get("LIQUIDATION_THRESHOLD", LIQUIDATION_THRESHOLD.toString()),
		),
		liquidationBonus: integer(
			"LIQUIDATION_BONUS",
			get("LIQUIDATION_BONUS", LIQUIDATION_BONUS.toString()),
		),
		oracleTimeoutSeconds: Number(
			integer(
				"ORACLE_TIMEOUT_SECONDS",
				get("ORACLE_TIMEOUT_SECONDS", ORACLE_TIMEOUT_SECONDS.toString()),
			),
		),
		custodyAccount: get(
			"ENGINE_CUSTODY_ACCOUNT",
			DEFAULTS.ENGINE_CUSTODY_ACCOUNT,
		),
	};
}
