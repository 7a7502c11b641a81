import { ApiProperty } from "@nestjs/swagger";
import { IsNotEmpty, IsString, Matches } from "class-validator";
import { ACCOUNT_PATTERN } from "../../common/account";
import { IsAmount } from "../../common/amounts";

export class LiquidateInDto {
	@ApiProperty({ example: "alice", description: "Undercollateralized account" })
	@IsString()
	@Matches(ACCOUNT_PATTERN, { message: "target must be a valid account" })
	target!: string;

	@ApiProperty({ example: "weth", description: "Collateral asset to seize" })
	@IsString()
	@IsNotEmpty()
	asset!: string;

	@IsAmount("Debt to repay in the peg unit, 18 decimals", "2000000000000000000000")
	debtToCover!: string;
}

export class LiquidateOutDto {
	@ApiProperty({ example: "bob" })
	liquidator!: string;

	@ApiProperty({ example: "alice" })
	target!: string;

	@ApiProperty({ example: "weth" })
	asset!: string;

	@ApiProperty({ example: "2000000000000000000000" })
	debtCovered!: string;

	@ApiProperty({
		description: "Collateral paid to the liquidator, bonus included",
		example: "1466666666666666666",
	})
	collateralSeized!: string;

	@ApiProperty({ example: "750000000000000000" })
	startingHealthFactor!: string;

	@ApiProperty({ example: "800000000000000000" })
	endingHealthFactor!: string;

	@ApiProperty({
		description: "The target is still below a health factor of 1.0",
	})
	stillUndercollateralized!: boolean;
}
