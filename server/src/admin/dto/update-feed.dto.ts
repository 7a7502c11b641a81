import { ApiProperty } from "@nestjs/swagger";
import { IsAmount } from "../../common/amounts";
import { FEED_DECIMALS } from "../../engine/engine.constants";

export class UpdateFeedInDto {
	@IsAmount(
		`New feed answer: USD price with ${FEED_DECIMALS} decimals`,
		"150000000000",
	)
	answer!: string;
}

export class UpdateFeedOutDto {
	@ApiProperty({ example: "weth" })
	asset!: string;

	@ApiProperty({ example: "eth-usd" })
	priceFeed!: string;

	@ApiProperty({ example: "150000000000" })
	answer!: string;

	@ApiProperty({ example: FEED_DECIMALS })
	decimals!: number;

	@ApiProperty({ example: "2" })
	roundId!: string;

	@ApiProperty({ description: "Unix seconds", example: 1732690234 })
	updatedAt!: number;
}
