import { ApiProperty } from "@nestjs/swagger";
import { IsNotEmpty, IsString, Matches } from "class-validator";
import { ACCOUNT_PATTERN } from "../../common/account";
import { IsAmount } from "../../common/amounts";

export class FaucetInDto {
	@ApiProperty({ example: "alice" })
	@IsString()
	@Matches(ACCOUNT_PATTERN, { message: "account must be a valid account" })
	account!: string;

	@ApiProperty({ example: "weth" })
	@IsString()
	@IsNotEmpty()
	asset!: string;

	@IsAmount("Amount of collateral tokens to create, 18 decimals", "10000000000000000000")
	amount!: string;
}

export class FaucetOutDto {
	@ApiProperty({ example: "alice" })
	account!: string;

	@ApiProperty({ example: "weth" })
	asset!: string;

	@ApiProperty({ description: "The account's new token balance" })
	balance!: string;
}
