import { ApiProperty } from "@nestjs/swagger";
import { IsNotEmpty, IsString } from "class-validator";
import { IsAmount } from "../../common/amounts";

export class CollateralInDto {
	@ApiProperty({ example: "weth", description: "Collateral asset id" })
	@IsString()
	@IsNotEmpty()
	asset!: string;

	@IsAmount("Collateral amount, 18 decimals", "10000000000000000000")
	amount!: string;
}

export class DebtInDto {
	@IsAmount("Debt amount in the peg unit, 18 decimals", "1000000000000000000000")
	amount!: string;
}

export class DepositAndMintInDto {
	@ApiProperty({ example: "weth", description: "Collateral asset id" })
	@IsString()
	@IsNotEmpty()
	asset!: string;

	@IsAmount("Collateral to deposit, 18 decimals", "10000000000000000000")
	collateralAmount!: string;

	@IsAmount("Debt to mint, 18 decimals", "10000000000000000000000")
	mintAmount!: string;
}

export class RedeemForDebtInDto {
	@ApiProperty({ example: "weth", description: "Collateral asset id" })
	@IsString()
	@IsNotEmpty()
	asset!: string;

	@IsAmount("Collateral to withdraw, 18 decimals", "1000000000000000000")
	collateralAmount!: string;

	@IsAmount("Debt to burn, 18 decimals", "1000000000000000000000")
	burnAmount!: string;
}
