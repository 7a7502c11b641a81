import { Test } from "@nestjs/testing";
import { MAX_HEALTH_FACTOR } from "@pegvault/engine";
import { DEBT_ENGINE, ENGINE_COLLABORATORS } from "../engine/engine.constants";
import { PositionsService } from "./positions.service";
import {
	createTestEngine,
	e18,
	errorCodeOf,
	tokenOf,
} from "../../test/utils";

describe("PositionsService", () => {
	let service: PositionsService;

	beforeEach(async () => {
		const { engine, collaborators } = createTestEngine();
		tokenOf(collaborators, "weth").mintTo("alice", 10n * 10n ** 18n);
		tokenOf(collaborators, "wbtc").mintTo("alice", 10n ** 18n);

		const module = await Test.createTestingModule({
			providers: [
				PositionsService,
				{ provide: DEBT_ENGINE, useValue: engine },
				{ provide: ENGINE_COLLABORATORS, useValue: collaborators },
			],
		}).compile();

		service = module.get(PositionsService);
	});

	it("reports an empty position for an unknown account", () => {
		expect(service.getPosition("carol")).toEqual({
			account: "carol",
			debtMinted: "0",
			collateralValueUsd: "0",
			healthFactor: MAX_HEALTH_FACTOR.toString(),
			collateral: [
				{ asset: "weth", amount: "0" },
				{ asset: "wbtc", amount: "0" },
			],
			liabilityBalance: "0",
		});
	});

	it("opens a position with deposit and mint", () => {
		const position = service.depositAndMint("alice", {
			asset: "weth",
			collateralAmount: e18(10),
			mintAmount: e18(5000),
		});

		expect(position).toEqual({
			account: "alice",
			debtMinted: e18(5000),
			collateralValueUsd: e18(20000),
			healthFactor: e18(2),
			collateral: [
				{ asset: "weth", amount: e18(10) },
				{ asset: "wbtc", amount: "0" },
			],
			liabilityBalance: e18(5000),
		});
	});

	it("redeems collateral for debt", () => {
		service.depositAndMint("alice", {
			asset: "weth",
			collateralAmount: e18(10),
			mintAmount: e18(5000),
		});

		const position = service.redeemForDebt("alice", {
			asset: "weth",
			collateralAmount: e18(5),
			burnAmount: e18(2500),
		});

		expect(position.debtMinted).toBe(e18(2500));
		expect(position.collateralValueUsd).toBe(e18(10000));
		expect(position.healthFactor).toBe(e18(2));
		expect(position.liabilityBalance).toBe(e18(2500));
	});

	it("deposits, mints, burns and withdraws step by step", () => {
		service.depositCollateral("alice", { asset: "wbtc", amount: e18(1) });
		service.mintDebt("alice", { amount: e18(4000) });
		expect(service.getHealthFactor("alice")).toEqual({
			account: "alice",
			healthFactor: e18(5),
		});

		service.burnDebt("alice", { amount: e18(4000) });
		const position = service.withdrawCollateral("alice", {
			asset: "wbtc",
			amount: e18(1),
		});

		expect(position.debtMinted).toBe("0");
		expect(position.collateralValueUsd).toBe("0");
		expect(position.liabilityBalance).toBe("0");
	});

	it("values collateral in USD", () => {
		service.depositCollateral("alice", { asset: "wbtc", amount: e18(1) });

		expect(service.getCollateralValue("alice")).toEqual({
			account: "alice",
			collateralValueUsd: e18(40000),
		});
	});

	it("refuses to mint past the collateral's capacity", () => {
		service.depositAndMint("alice", {
			asset: "weth",
			collateralAmount: e18(10),
			mintAmount: e18(10000),
		});

		expect(errorCodeOf(() => service.mintDebt("alice", { amount: "1" }))).toBe(
			"HEALTH_FACTOR_BROKEN",
		);
		expect(service.getPosition("alice").debtMinted).toBe(e18(10000));
	});

	it("refuses zero amounts and unknown assets", () => {
		expect(
			errorCodeOf(() =>
				service.depositCollateral("alice", { asset: "weth", amount: "0" }),
			),
		).toBe("ZERO_AMOUNT");
		expect(
			errorCodeOf(() =>
				service.depositCollateral("alice", { asset: "doge", amount: e18(1) }),
			),
		).toBe("UNSUPPORTED_ASSET");
	});
});
