import { Injectable } from "@nestjs/common";
import { OnEvent } from "@nestjs/event-emitter";
import { filter, Observable, Subject } from "rxjs";
import {
	accountsOf,
	COLLATERAL_DEPOSITED,
	COLLATERAL_WITHDRAWN,
	type CollateralDeposited,
	type CollateralWithdrawn,
	DEBT_BURNED,
	DEBT_MINTED,
	type DebtBurned,
	type DebtMinted,
	LIQUIDATION_EXECUTED,
	type LiquidationExecuted,
	type PositionEvent,
} from "./position.event";

export type SseEvent<T> = {
	data: T;
};

@Injectable()
export class ServerSentEventsService {
	private readonly events$ = new Subject<PositionEvent>();

	/**
	 * Stream of position events, optionally limited to those touching one account.
	 */
	positionEvents(account?: string): Observable<PositionEvent> {
		if (account) {
			return this.events$.pipe(filter((e) => accountsOf(e).includes(account)));
		}
		return this.events$.asObservable();
	}

	@OnEvent(COLLATERAL_DEPOSITED)
	onCollateralDeposited(evt: CollateralDeposited) {
		this.events$.next(evt);
	}

	@OnEvent(COLLATERAL_WITHDRAWN)
	onCollateralWithdrawn(evt: CollateralWithdrawn) {
		this.events$.next(evt);
	}

	@OnEvent(DEBT_MINTED)
	onDebtMinted(evt: DebtMinted) {
		this.events$.next(evt);
	}

	@OnEvent(DEBT_BURNED)
	onDebtBurned(evt: DebtBurned) {
		this.events$.next(evt);
	}

	@OnEvent(LIQUIDATION_EXECUTED)
	onLiquidationExecuted(evt: LiquidationExecuted) {
		this.events$.next(evt);
	}
}
