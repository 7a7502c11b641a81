import {
	COLLATERAL_WITHDRAWN,
	DEBT_BURNED,
	DEBT_MINTED,
	LIQUIDATION_EXECUTED,
} from "@pegvault/engine";
import {
	accountsOf,
	type DebtMinted,
	type PositionEvent,
	toPositionEvent,
} from "./position.event";
import { ServerSentEventsService } from "./server-sent-events.service";

const OCCURRED_AT = new Date("2024-05-01T12:00:00.000Z");

const minted = (account: string, eventId: string): DebtMinted => ({
	type: DEBT_MINTED,
	eventId,
	occurredAt: OCCURRED_AT.toISOString(),
	account,
	amount: "1000",
});

describe("toPositionEvent", () => {
	it("stamps the event and renders amounts as strings", () => {
		expect(
			toPositionEvent(
				{ type: DEBT_BURNED, onBehalfOf: "alice", payer: "bob", amount: 25n },
				"evt-1",
				OCCURRED_AT,
			),
		).toEqual({
			type: DEBT_BURNED,
			eventId: "evt-1",
			occurredAt: "2024-05-01T12:00:00.000Z",
			onBehalfOf: "alice",
			payer: "bob",
			amount: "25",
		});
	});

	it("renders every figure of a liquidation", () => {
		const event = toPositionEvent(
			{
				type: LIQUIDATION_EXECUTED,
				liquidator: "bob",
				target: "alice",
				asset: "weth",
				debtCovered: 2000n,
				collateralSeized: 11n,
				startingHealthFactor: 750n,
				endingHealthFactor: 800n,
				stillUndercollateralized: true,
			},
			"evt-2",
			OCCURRED_AT,
		);

		expect(event).toMatchObject({
			debtCovered: "2000",
			collateralSeized: "11",
			startingHealthFactor: "750",
			endingHealthFactor: "800",
			stillUndercollateralized: true,
		});
		expect(accountsOf(event)).toEqual(["bob", "alice"]);
	});

	it("lists both sides of a withdrawal", () => {
		const event = toPositionEvent(
			{
				type: COLLATERAL_WITHDRAWN,
				from: "alice",
				to: "bob",
				asset: "weth",
				amount: 1n,
			},
			"evt-3",
		);

		expect(accountsOf(event)).toEqual(["alice", "bob"]);
	});
});

describe("ServerSentEventsService", () => {
	it("streams every event without a filter", () => {
		const service = new ServerSentEventsService();
		const received: PositionEvent[] = [];
		const subscription = service.positionEvents().subscribe((e) => received.push(e));

		service.onDebtMinted(minted("alice", "a"));
		service.onDebtMinted(minted("bob", "b"));
		subscription.unsubscribe();

		expect(received.map((e) => e.eventId)).toEqual(["a", "b"]);
	});

	it("streams only the events touching an account", () => {
		const service = new ServerSentEventsService();
		const received: PositionEvent[] = [];
		const subscription = service
			.positionEvents("alice")
			.subscribe((e) => received.push(e));

		service.onDebtMinted(minted("bob", "b"));
		service.onDebtMinted(minted("alice", "a"));
		service.onDebtBurned({
			type: DEBT_BURNED,
			eventId: "c",
			occurredAt: OCCURRED_AT.toISOString(),
			onBehalfOf: "carol",
			payer: "alice",
			amount: "1",
		});
		subscription.unsubscribe();

		expect(received.map((e) => e.eventId)).toEqual(["a", "c"]);
	});
});
