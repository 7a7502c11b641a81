import { MAX_HEALTH_FACTOR, PRECISION } from "../core/constants.js";
import { calculateHealthFactor, isHealthy } from "./health.js";

describe("calculateHealthFactor", () => {
	it("should be exactly 1.0 for $20,000 against $10,000 at 50%", () => {
		expect(calculateHealthFactor(10_000n * PRECISION, 20_000n * PRECISION)).toBe(PRECISION);
	});

	it("should be 0.5 once the collateral halves", () => {
		expect(calculateHealthFactor(10_000n * PRECISION, 10_000n * PRECISION)).toBe(
			500_000_000_000_000_000n,
		);
	});

	it("should report the maximum without debt", () => {
		expect(calculateHealthFactor(0n, 0n)).toBe(MAX_HEALTH_FACTOR);
		expect(calculateHealthFactor(0n, 5n * PRECISION)).toBe(MAX_HEALTH_FACTOR);
	});

	it("should apply a custom threshold", () => {
		expect(
			calculateHealthFactor(10_000n * PRECISION, 20_000n * PRECISION, 80n),
		).toBe(1_600_000_000_000_000_000n);
	});
});

describe("isHealthy", () => {
	it("should accept exactly 1.0 and reject anything below", () => {
		expect(isHealthy(PRECISION)).toBe(true);
		expect(isHealthy(PRECISION - 1n)).toBe(false);
		expect(isHealthy(MAX_HEALTH_FACTOR)).toBe(true);
	});
});
