import { ConfigService } from "@nestjs/config";
import type { INestApplication } from "@nestjs/common";
import { Test, type TestingModule } from "@nestjs/testing";
import { MemoryCollateralToken, StaticPriceFeed } from "@pegvault/engine";
import request from "supertest";
import { AppModule } from "../src/app.module";
import { configureApp } from "../src/app.setup";
import { readEngineSettings } from "../src/engine/engine-settings";
import {
	createCollaborators,
	createDebtEngine,
	EngineCollaborators,
} from "../src/engine/engine.factory";

export const ADMIN_USER = "admin";
export const ADMIN_PASS = "test-secret";

/** Decimal string of `n` whole units with 18 decimals */
export const e18 = (n: number | bigint): string =>
	(BigInt(n) * 10n ** 18n).toString();

/**
 * An engine on the default settings (weth at $2,000, wbtc at $40,000),
 * without Nest.
 */
export function createTestEngine(values: Record<string, string> = {}) {
	const settings = readEngineSettings(new ConfigService(values));
	const collaborators = createCollaborators(settings);
	const engine = createDebtEngine(settings, collaborators);
	return { settings, collaborators, engine };
}

export function tokenOf(
	collaborators: EngineCollaborators,
	asset: string,
): MemoryCollateralToken {
	const token = collaborators.tokens.get(asset);
	if (!token) throw new Error(`No token for ${asset}`);
	return token;
}

export function feedOf(
	collaborators: EngineCollaborators,
	feedId: string,
): StaticPriceFeed {
	const feed = collaborators.feeds.get(feedId);
	if (!feed) throw new Error(`No feed ${feedId}`);
	return feed;
}

/**
 * The `code` of the error `fn` throws.
 */
export function errorCodeOf(fn: () => unknown): unknown {
	try {
		fn();
	} catch (error) {
		return error instanceof Error && "code" in error ? error.code : error;
	}
	throw new Error("Expected the call to throw");
}

export async function createTestApp(): Promise<INestApplication> {
	process.env.BACKOFFICE_BASIC_USER = ADMIN_USER;
	process.env.BACKOFFICE_BASIC_PASS = ADMIN_PASS;

	const moduleFixture: TestingModule = await Test.createTestingModule({
		imports: [AppModule],
	}).compile();

	const app = configureApp(moduleFixture.createNestApplication());
	await app.init();
	return app;
}

export async function faucet(
	app: INestApplication,
	account: string,
	asset: string,
	amount: string,
): Promise<void> {
	await request(app.getHttpServer())
		.post("/api/admin/v1/faucet")
		.auth(ADMIN_USER, ADMIN_PASS)
		.send({ account, asset, amount })
		.expect(201);
}

export async function setPrice(
	app: INestApplication,
	asset: string,
	answer: string,
): Promise<void> {
	await request(app.getHttpServer())
		.put(`/api/admin/v1/feeds/${asset}`)
		.auth(ADMIN_USER, ADMIN_PASS)
		.send({ answer })
		.expect(200);
}
