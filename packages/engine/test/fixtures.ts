import {
	DebtEngine,
	DebtEngineConfig,
	EngineEvent,
	EngineLogger,
	MemoryCollateralToken,
	MemoryLiabilityToken,
	PRECISION,
	StaticPriceFeed,
} from "../src/index.js";

export const CUSTODY = "engine";
export const START_TIME = 1_700_000_000;

/** $2,000 with 8 decimals */
export const ETH_USD = 2000_00000000n;
/** $40,000 with 8 decimals */
export const BTC_USD = 40000_00000000n;

export const units = (n: number | bigint): bigint => BigInt(n) * PRECISION;

export type MockLogger = {
	[K in keyof EngineLogger]: jest.Mock<void, [string]>;
};

export function createLogger(): MockLogger {
	return { log: jest.fn(), warn: jest.fn(), error: jest.fn() };
}

export class ManualClock {
	private current = START_TIME;

	readonly now = (): number => this.current;

	advance(seconds: number): void {
		this.current += seconds;
	}
}

/**
 * A two-asset engine (weth, wbtc) on in-memory collaborators, with a
 * manual clock and a recording listener.
 */
export function createEngine(overrides: Partial<DebtEngineConfig> = {}) {
	const clock = new ManualClock();
	const weth = new MemoryCollateralToken("weth", CUSTODY);
	const wbtc = new MemoryCollateralToken("wbtc", CUSTODY);
	const pusd = new MemoryLiabilityToken();
	const ethUsd = new StaticPriceFeed("eth-usd", 8, ETH_USD, clock.now);
	const btcUsd = new StaticPriceFeed("btc-usd", 8, BTC_USD, clock.now);
	const logger = createLogger();

	const engine = new DebtEngine({
		collateral: [
			{ id: "weth", token: weth },
			{ id: "wbtc", token: wbtc },
		],
		priceFeeds: [ethUsd, btcUsd],
		liabilityToken: pusd,
		custodyAccount: CUSTODY,
		now: clock.now,
		logger,
		...overrides,
	});

	const events: EngineEvent[] = [];
	engine.on((event) => {
		events.push(event);
	});

	return { engine, clock, weth, wbtc, pusd, ethUsd, btcUsd, logger, events };
}

export type EngineFixture = ReturnType<typeof createEngine>;

/**
 * Run `fn` and return the error it throws.
 */
export function catchError(fn: () => unknown): unknown {
	try {
		fn();
	} catch (err) {
		return err;
	}
	throw new Error("Expected function to throw");
}
