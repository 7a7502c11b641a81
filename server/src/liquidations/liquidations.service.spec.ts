import { Test } from "@nestjs/testing";
import { DebtEngine } from "@pegvault/engine";
import { DEBT_ENGINE } from "../engine/engine.constants";
import { EngineCollaborators } from "../engine/engine.factory";
import { LiquidationsService } from "./liquidations.service";
import {
	createTestEngine,
	e18,
	errorCodeOf,
	feedOf,
	tokenOf,
} from "../../test/utils";

describe("LiquidationsService", () => {
	let service: LiquidationsService;
	let engine: DebtEngine;
	let collaborators: EngineCollaborators;

	beforeEach(async () => {
		({ engine, collaborators } = createTestEngine());
		tokenOf(collaborators, "weth").mintTo("alice", 10n * 10n ** 18n);
		tokenOf(collaborators, "wbtc").mintTo("bob", 10n ** 18n);
		engine.depositCollateralAndMintDebt(
			"alice",
			"weth",
			10n * 10n ** 18n,
			10_000n * 10n ** 18n,
		);
		engine.depositCollateralAndMintDebt(
			"bob",
			"wbtc",
			10n ** 18n,
			5_000n * 10n ** 18n,
		);

		const module = await Test.createTestingModule({
			providers: [
				LiquidationsService,
				{ provide: DEBT_ENGINE, useValue: engine },
			],
		}).compile();

		service = module.get(LiquidationsService);
	});

	it("refuses to liquidate a healthy account", () => {
		expect(
			errorCodeOf(() =>
				service.liquidate("bob", {
					target: "alice",
					asset: "weth",
					debtToCover: e18(1000),
				}),
			),
		).toBe("HEALTH_FACTOR_OK");
	});

	it("covers part of an undercollateralized position", () => {
		feedOf(collaborators, "eth-usd").updateAnswer(1500_00000000n);

		const result = service.liquidate("bob", {
			target: "alice",
			asset: "weth",
			debtToCover: e18(2000),
		});

		expect(result).toEqual({
			liquidator: "bob",
			target: "alice",
			asset: "weth",
			debtCovered: e18(2000),
			collateralSeized: "1466666666666666666",
			startingHealthFactor: "750000000000000000",
			endingHealthFactor: "800000000000000000",
			stillUndercollateralized: true,
		});
		expect(engine.getPosition("alice").debtMinted).toBe(8_000n * 10n ** 18n);
		expect(tokenOf(collaborators, "weth").balanceOf("bob")).toBe(
			1466666666666666666n,
		);
		expect(collaborators.liability.balanceOf("bob")).toBe(3_000n * 10n ** 18n);
	});

	it("echoes the covered debt without leading zeros", () => {
		feedOf(collaborators, "eth-usd").updateAnswer(1500_00000000n);

		const result = service.liquidate("bob", {
			target: "alice",
			asset: "weth",
			debtToCover: `000${e18(2000)}`,
		});

		expect(result.debtCovered).toBe(e18(2000));
	});
});
