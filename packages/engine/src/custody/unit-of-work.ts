import { Interaction } from "./types.js";

/**
 * Collects the external effects and events of one operation while its
 * ledger phase runs. Nothing collected here happens until the ledger phase
 * and every health check succeeded.
 */
export class UnitOfWork<TEvent> {
	readonly interactions: Interaction[] = [];
	readonly events: TEvent[] = [];

	queue(...interactions: Interaction[]): void {
		this.interactions.push(...interactions);
	}

	emit(event: TEvent): void {
		this.events.push(event);
	}
}
