import { EngineError, isEngineError } from "../core/types.js";
import { ORACLE_TIMEOUT_SECONDS, PRECISION } from "../core/constants.js";
import { MemoryCollateralToken } from "../custody/memory-tokens.js";
import { AssetRegistry } from "../registry/asset-registry.js";
import { PriceOracle, scaleToPrecision } from "./price-oracle.js";
import { StaticPriceFeed } from "./static-price-feed.js";
import { OracleReading, PriceFeed } from "./types.js";
import { catchError, ManualClock, START_TIME } from "../../test/fixtures.js";

class FixedFeed implements PriceFeed {
	constructor(
		readonly id: string,
		private readonly reading: OracleReading,
	) {}

	latestReading(): OracleReading {
		return this.reading;
	}
}

describe("PriceOracle", () => {
	let clock: ManualClock;
	let ethUsd: StaticPriceFeed;

	const oracleFor = (feed: PriceFeed, timeoutSeconds?: number) =>
		new PriceOracle(
			new AssetRegistry(
				[{ id: "weth", token: new MemoryCollateralToken("weth", "engine") }],
				[feed],
			),
			{ now: clock.now, timeoutSeconds },
		);

	beforeEach(() => {
		clock = new ManualClock();
		ethUsd = new StaticPriceFeed("eth-usd", 8, 2000_00000000n, clock.now);
	});

	it("should scale an 8-decimal answer to 18 decimals", () => {
		expect(oracleFor(ethUsd).priceOf("weth")).toBe(2000n * PRECISION);
	});

	it("should value amounts and convert USD back to amounts", () => {
		const oracle = oracleFor(ethUsd);

		expect(oracle.usdValue("weth", 10n * PRECISION)).toBe(20_000n * PRECISION);
		expect(oracle.assetAmountFromUsd("weth", 1000n * PRECISION)).toBe(
			500_000_000_000_000_000n,
		);
	});

	it("should read the feed again on every call", () => {
		const oracle = oracleFor(ethUsd);
		oracle.priceOf("weth");

		ethUsd.updateAnswer(1500_00000000n);

		expect(oracle.priceOf("weth")).toBe(1500n * PRECISION);
	});

	it("should fail for an asset without a feed", () => {
		const err = catchError(() => oracleFor(ethUsd).priceOf("wbtc"));

		expect(isEngineError(err, "ORACLE_ERROR")).toBe(true);
	});

	it("should reject a zero or negative price", () => {
		const oracle = oracleFor(ethUsd);

		ethUsd.updateAnswer(0n);
		expect(isEngineError(catchError(() => oracle.priceOf("weth")), "ORACLE_ERROR")).toBe(true);

		ethUsd.updateAnswer(-1n);
		expect(isEngineError(catchError(() => oracle.priceOf("weth")), "ORACLE_ERROR")).toBe(true);
	});

	it("should accept a reading exactly at the timeout and reject an older one", () => {
		const oracle = oracleFor(ethUsd);

		clock.advance(ORACLE_TIMEOUT_SECONDS);
		expect(oracle.priceOf("weth")).toBe(2000n * PRECISION);

		clock.advance(1);
		const err = catchError(() => oracle.priceOf("weth"));
		expect(isEngineError(err, "ORACLE_ERROR")).toBe(true);
		expect(err instanceof EngineError && err.details).toMatchObject({
			age: ORACLE_TIMEOUT_SECONDS + 1,
		});
	});

	it("should honour a custom timeout", () => {
		const oracle = oracleFor(ethUsd, 60);
		clock.advance(61);

		expect(() => oracle.priceOf("weth")).toThrow(/stale/);
	});

	it("should reject a feed that was never updated", () => {
		const feed = new FixedFeed("eth-usd", {
			price: 2000_00000000n,
			decimals: 8,
			updatedAt: 0,
		});

		expect(() => oracleFor(feed).priceOf("weth")).toThrow(/never been updated/);
	});

	it("should reject an answer carried over from an earlier round", () => {
		const feed = new FixedFeed("eth-usd", {
			price: 2000_00000000n,
			decimals: 8,
			updatedAt: START_TIME,
			roundId: 5n,
			answeredInRound: 4n,
		});

		expect(() => oracleFor(feed).priceOf("weth")).toThrow(/earlier round/);
	});

	it("should wrap a failing feed and keep the cause", () => {
		const failure = new Error("feed offline");
		const feed: PriceFeed = {
			id: "eth-usd",
			latestReading: () => {
				throw failure;
			},
		};

		const err = catchError(() => oracleFor(feed).priceOf("weth"));

		expect(isEngineError(err, "ORACLE_ERROR")).toBe(true);
		expect(err instanceof Error && err.cause).toBe(failure);
	});

	it("should reject a price that scales below one unit of precision", () => {
		const feed = new FixedFeed("dust-usd", {
			price: 1n,
			decimals: 20,
			updatedAt: START_TIME,
		});

		expect(() => oracleFor(feed).priceOf("weth")).toThrow(/resolution/);
	});
});

describe("scaleToPrecision", () => {
	it("should scale up, pass through and scale down", () => {
		expect(scaleToPrecision(123n, 0)).toBe(123n * PRECISION);
		expect(scaleToPrecision(7n, 18)).toBe(7n);
		expect(scaleToPrecision(5n * 10n ** 20n, 20)).toBe(5n * PRECISION);
	});
});
