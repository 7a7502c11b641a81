import {
	COLLATERAL_DEPOSITED,
	COLLATERAL_WITHDRAWN,
	DEBT_BURNED,
	DEBT_MINTED,
	EngineEvent,
	LIQUIDATION_EXECUTED,
} from "@pegvault/engine";

export {
	COLLATERAL_DEPOSITED,
	COLLATERAL_WITHDRAWN,
	DEBT_BURNED,
	DEBT_MINTED,
	LIQUIDATION_EXECUTED,
};

type Notification = {
	eventId: string;
	occurredAt: string; // ISO timestamp
};

export type CollateralDeposited = Notification & {
	type: typeof COLLATERAL_DEPOSITED;
	account: string;
	asset: string;
	amount: string;
};

export type CollateralWithdrawn = Notification & {
	type: typeof COLLATERAL_WITHDRAWN;
	from: string;
	to: string;
	asset: string;
	amount: string;
};

export type DebtMinted = Notification & {
	type: typeof DEBT_MINTED;
	account: string;
	amount: string;
};

export type DebtBurned = Notification & {
	type: typeof DEBT_BURNED;
	onBehalfOf: string;
	payer: string;
	amount: string;
};

export type LiquidationExecuted = Notification & {
	type: typeof LIQUIDATION_EXECUTED;
	liquidator: string;
	target: string;
	asset: string;
	debtCovered: string;
	collateralSeized: string;
	startingHealthFactor: string;
	endingHealthFactor: string;
	stillUndercollateralized: boolean;
};

export type PositionEvent =
	| CollateralDeposited
	| CollateralWithdrawn
	| DebtMinted
	| DebtBurned
	| LiquidationExecuted;

/**
 * JSON-safe copy of an engine event, stamped for the event bus.
 */
export function toPositionEvent(
	event: EngineEvent,
	eventId: string,
	occurredAt: Date = new Date(),
): PositionEvent {
	const stamp = { eventId, occurredAt: occurredAt.toISOString() };
	switch (event.type) {
		case COLLATERAL_DEPOSITED:
			return { ...stamp, ...event, amount: event.amount.toString() };
		case COLLATERAL_WITHDRAWN:
			return { ...stamp, ...event, amount: event.amount.toString() };
		case DEBT_MINTED:
			return { ...stamp, ...event, amount: event.amount.toString() };
		case DEBT_BURNED:
			return { ...stamp, ...event, amount: event.amount.toString() };
		case LIQUIDATION_EXECUTED:
			return {
				...stamp,
				...event,
				debtCovered: event.debtCovered.toString(),
				collateralSeized: event.collateralSeized.toString(),
				startingHealthFactor: event.startingHealthFactor.toString(),
				endingHealthFactor: event.endingHealthFactor.toString(),
			};
	}
}

/**
 * Accounts whose position an event touches.
 */
export function accountsOf(event: PositionEvent): string[] {
	switch (event.type) {
		case COLLATERAL_DEPOSITED:
		case DEBT_MINTED:
			return [event.account];
		case COLLATERAL_WITHDRAWN:
			return [event.from, event.to];
		case DEBT_BURNED:
			return [event.onBehalfOf, event.payer];
		case LIQUIDATION_EXECUTED:
			return [event.liquidator, event.target];
	}
}
