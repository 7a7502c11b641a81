import { applyDecorators } from "@nestjs/common";
import { ApiProperty } from "@nestjs/swagger";
import { IsString, Matches } from "class-validator";

/** Unsigned integer, at most 78 digits (fits in 256 bits' worth of decimal) */
export const AMOUNT_PATTERN = /^\d{1,78}$/;

/**
 * Validates an 18-decimal fixed-point amount sent as a decimal string.
 * Zero passes validation; the engine rejects it with ZERO_AMOUNT.
 */
export function IsAmount(description: string, example = "1000000000000000000") {
	return applyDecorators(
		ApiProperty({ description, example, pattern: AMOUNT_PATTERN.source }),
		IsString(),
		Matches(AMOUNT_PATTERN, {
			message: "$property must be a non-negative integer string",
		}),
	);
}

export const toAmount = (value: string): bigint => BigInt(value);

export const fromAmount = (value: bigint): string => value.toString();
