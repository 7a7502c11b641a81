/**
 * Static Price Feed
 *
 * A settable in-memory price feed for tests, development and demos.
 * Behaves like a round-based aggregator: every update opens a new round.
 */

import { OracleReading, PriceFeed } from "./types.js";

export class StaticPriceFeed implements PriceFeed {
	private answer: bigint;
	private updatedAt: number;
	private roundId = 1n;

	/**
	 * @param id - Oracle identifier
	 * @param decimals - Fractional digits of the answer (8 for USD pairs)
	 * @param initialAnswer - First answer
	 * @param now - Clock used to stamp updates (Unix seconds)
	 */
	constructor(
		readonly id: string,
		readonly decimals: number,
		initialAnswer: bigint,
		private readonly now: () => number = () => Math.floor(Date.now() / 1000),
	) {
		this.answer = initialAnswer;
		this.updatedAt = this.now();
	}

	latestReading(): OracleReading {
		return {
			price: this.answer,
			decimals: this.decimals,
			updatedAt: this.updatedAt,
			roundId: this.roundId,
			answeredInRound: this.roundId,
		};
	}

	/**
	 * Publish a new answer in a new round.
	 */
	updateAnswer(answer: bigint, updatedAt: number = this.now()): void {
		this.answer = answer;
		this.updatedAt = updatedAt;
		this.roundId += 1n;
	}

	/**
	 * Current answer, unscaled.
	 */
	latestAnswer(): bigint {
		return this.answer;
	}
}
