import { ApiProperty } from "@nestjs/swagger";

export class MarketAssetDto {
	@ApiProperty({ example: "weth" })
	asset!: string;

	@ApiProperty({ example: "eth-usd" })
	priceFeed!: string;

	@ApiProperty({
		description: "USD price of one whole unit, 18 decimals",
		example: "2000000000000000000000",
	})
	priceUsd!: string;

	@ApiProperty({
		description: "Amount held in custody across all positions, 18 decimals",
		example: "10000000000000000000",
	})
	totalCollateral!: string;
}

export class MarketParametersDto {
	@ApiProperty({ example: "1000000000000000000" })
	precision!: string;

	@ApiProperty({ description: "Percent of collateral value counted", example: "50" })
	liquidationThreshold!: string;

	@ApiProperty({ description: "Percent paid to liquidators", example: "10" })
	liquidationBonus!: string;

	@ApiProperty({ example: "100" })
	liquidationPrecision!: string;

	@ApiProperty({ example: "1000000000000000000" })
	minHealthFactor!: string;

	@ApiProperty({ example: 10800 })
	oracleTimeoutSeconds!: number;
}

export class GetMarketDto {
	@ApiProperty({ type: [MarketAssetDto] })
	assets!: MarketAssetDto[];

	@ApiProperty({ type: MarketParametersDto })
	parameters!: MarketParametersDto;

	@ApiProperty({ description: "Total minted debt, 18 decimals" })
	totalDebt!: string;
}
