import { silentLogger } from "../core/types.js";
import { CustodyLayer } from "../custody/custody-layer.js";
import { MemoryCollateralToken, MemoryLiabilityToken } from "../custody/memory-tokens.js";
import { UnitOfWork } from "../custody/unit-of-work.js";
import { EngineEvent } from "../engine/events.js";
import { CollateralLedger } from "../ledger/collateral-ledger.js";
import { DebtLedger } from "../ledger/debt-ledger.js";
import { PriceOracle } from "../oracle/price-oracle.js";
import { StaticPriceFeed } from "../oracle/static-price-feed.js";
import { AssetRegistry } from "../registry/asset-registry.js";
import { RiskEngine } from "../risk/risk-engine.js";
import { MemoryLedgerStore } from "../storage/memory-ledger-store.js";
import { START_TIME, units } from "../../test/fixtures.js";
import { LiquidationEngine } from "./liquidation-engine.js";

describe("LiquidationEngine", () => {
	let ethUsd: StaticPriceFeed;
	let collateral: CollateralLedger;
	let debt: DebtLedger;

	const engineWithBonus = (bonus: bigint) => {
		const now = () => START_TIME;
		ethUsd = new StaticPriceFeed("eth-usd", 8, 2000_00000000n, now);
		const registry = new AssetRegistry(
			[{ id: "weth", token: new MemoryCollateralToken("weth", "engine") }],
			[ethUsd],
		);
		const oracle = new PriceOracle(registry, { now });
		const store = new MemoryLedgerStore();
		collateral = new CollateralLedger(store, registry, oracle);
		debt = new DebtLedger(store);
		const risk = new RiskEngine(collateral, debt, 50n);
		const custody = new CustodyLayer(
			registry,
			new MemoryLiabilityToken(),
			"engine",
			silentLogger,
		);
		return new LiquidationEngine(registry, oracle, collateral, debt, risk, custody, bonus);
	};

	it("should add the bonus to the collateral equivalent of the debt", () => {
		expect(engineWithBonus(10n).collateralToSeize("weth", units(1000))).toBe(
			550_000000000000000n,
		);
		expect(engineWithBonus(0n).collateralToSeize("weth", units(1000))).toBe(
			500_000000000000000n,
		);
	});

	it("should only queue interactions and events, leaving settlement to the caller", () => {
		const liquidation = engineWithBonus(10n);
		collateral.deposit("alice", "weth", units(10));
		debt.mint("alice", units(10_000));
		ethUsd.updateAnswer(1500_00000000n);
		const unit = new UnitOfWork<EngineEvent>();

		liquidation.liquidate(unit, {
			liquidator: "bob",
			target: "alice",
			asset: "weth",
			debtToCover: units(2000),
		});

		expect(unit.interactions.map((i) => i.description)).toEqual([
			"burn 2000000000000000000000 liability from bob",
			"push 1466666666666666666 weth to bob",
		]);
		expect(unit.events).toHaveLength(3);
		expect(debt.debtOf("alice")).toBe(units(8000));
	});
});
