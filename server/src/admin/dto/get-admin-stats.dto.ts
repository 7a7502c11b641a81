import { ApiProperty } from "@nestjs/swagger";

export class AssetStatsDto {
	@ApiProperty({ example: "weth" })
	asset!: string;

	@ApiProperty({ description: "Sum of all ledger balances" })
	totalCollateral!: string;

	@ApiProperty({ description: "Tokens held by the custody account" })
	custodyBalance!: string;
}

export default class GetAdminStatsDto {
	@ApiProperty({ type: [AssetStatsDto] })
	assets!: AssetStatsDto[];

	@ApiProperty({ description: "Sum of all recorded debt" })
	totalDebt!: string;

	@ApiProperty({ description: "Liability tokens in circulation" })
	liabilitySupply!: string;
}
