import type { INestApplication } from "@nestjs/common";
import request from "supertest";
import { createTestApp } from "./utils";

describe("Health and market", () => {
	let app: INestApplication;

	beforeAll(async () => {
		app = await createTestApp();
	});

	afterAll(async () => {
		await app.close();
	});

	it("answers the liveness probe", async () => {
		const res = await request(app.getHttpServer())
			.get("/api/v1/health")
			.expect(200);
		expect(res.body.status).toBe("ok");
		expect(res.body.assets).toBe(2);
	});

	it("describes the market", async () => {
		const res = await request(app.getHttpServer())
			.get("/api/v1/market")
			.expect(200);
		expect(res.body.data).toEqual({
			assets: [
				{
					asset: "weth",
					priceFeed: "eth-usd",
					priceUsd: "2000000000000000000000",
					totalCollateral: "0",
				},
				{
					asset: "wbtc",
					priceFeed: "btc-usd",
					priceUsd: "40000000000000000000000",
					totalCollateral: "0",
				},
			],
			parameters: {
				precision: "1000000000000000000",
				liquidationThreshold: "50",
				liquidationBonus: "10",
				liquidationPrecision: "100",
				minHealthFactor: "1000000000000000000",
				oracleTimeoutSeconds: 10800,
			},
			totalDebt: "0",
		});
	});
});
