import { ConfigService } from "@nestjs/config";
import { readEngineSettings } from "./engine-settings";
import { errorCodeOf } from "../../test/utils";

describe("readEngineSettings", () => {
	it("falls back to the two-asset defaults", () => {
		const settings = readEngineSettings(new ConfigService({}));

		expect(settings).toEqual({
			assets: ["weth", "wbtc"],
			priceFeeds: ["eth-usd", "btc-usd"],
			initialPrices: [200000000000n, 4000000000000n],
			liquidationThreshold: 50n,
			liquidationBonus: 10n,
			oracleTimeoutSeconds: 10800,
			custodyAccount: "engine",
		});
	});

	it("reads and trims configured lists", () => {
		const settings = readEngineSettings(
			new ConfigService({
				COLLATERAL_ASSETS: " wsol , ,weth ",
				PRICE_FEEDS: "sol-usd,eth-usd",
				INITIAL_PRICES: "15000000000, 250000000000",
				LIQUIDATION_BONUS: "5",
				ORACLE_TIMEOUT_SECONDS: "60",
				ENGINE_CUSTODY_ACCOUNT: "vault",
			}),
		);

		expect(settings.assets).toEqual(["wsol", "weth"]);
		expect(settings.priceFeeds).toEqual(["sol-usd", "eth-usd"]);
		expect(settings.initialPrices).toEqual([15000000000n, 250000000000n]);
		expect(settings.liquidationBonus).toBe(5n);
		expect(settings.liquidationThreshold).toBe(50n);
		expect(settings.oracleTimeoutSeconds).toBe(60);
		expect(settings.custodyAccount).toBe("vault");
	});

	it("rejects a price count that differs from the feed count", () => {
		expect(
			errorCodeOf(() =>
				readEngineSettings(new ConfigService({ INITIAL_PRICES: "200000000000" })),
			),
		).toBe("CONFIG_MISMATCH");
	});

	it.each([
		["LIQUIDATION_THRESHOLD", "fifty"],
		["LIQUIDATION_BONUS", "-1"],
		["ORACLE_TIMEOUT_SECONDS", "1.5"],
		["INITIAL_PRICES", "2000,abc"],
	])("rejects a malformed %s", (key, value) => {
		expect(
			errorCodeOf(() => readEngineSettings(new ConfigService({ [key]: value }))),
		).toBe("CONFIG_MISMATCH");
	});
});
