import { ApiProperty } from "@nestjs/swagger";

export class CollateralBalanceDto {
	@ApiProperty({ example: "weth" })
	asset!: string;

	@ApiProperty({ example: "10000000000000000000" })
	amount!: string;
}

export class GetPositionDto {
	@ApiProperty({ example: "alice" })
	account!: string;

	@ApiProperty({ description: "Minted debt, 18 decimals", example: "10000000000000000000000" })
	debtMinted!: string;

	@ApiProperty({
		description: "USD value of all collateral, 18 decimals",
		example: "20000000000000000000000",
	})
	collateralValueUsd!: string;

	@ApiProperty({
		description: "Health factor, 18 decimals. 1000000000000000000 is the minimum.",
		example: "1000000000000000000",
	})
	healthFactor!: string;

	@ApiProperty({ type: [CollateralBalanceDto] })
	collateral!: CollateralBalanceDto[];

	@ApiProperty({
		description: "Liability tokens held by the account, 18 decimals",
		example: "10000000000000000000000",
	})
	liabilityBalance!: string;
}

export class GetHealthFactorDto {
	@ApiProperty({ example: "alice" })
	account!: string;

	@ApiProperty({ example: "1000000000000000000" })
	healthFactor!: string;
}

export class GetCollateralValueDto {
	@ApiProperty({ example: "alice" })
	account!: string;

	@ApiProperty({ example: "20000000000000000000000" })
	collateralValueUsd!: string;
}
