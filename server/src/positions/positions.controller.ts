import {
	Body,
	Controller,
	Get,
	HttpCode,
	HttpStatus,
	Param,
	Post,
	UseGuards,
} from "@nestjs/common";
import {
	ApiBadGatewayResponse,
	ApiBadRequestResponse,
	ApiBody,
	ApiExtraModels,
	ApiHeader,
	ApiOkResponse,
	ApiOperation,
	ApiTags,
	ApiUnauthorizedResponse,
	ApiUnprocessableEntityResponse,
} from "@nestjs/swagger";
import { Account, AccountGuard } from "../common/account";
import {
	type ApiEnvelope,
	ApiEnvelopeShellDto,
	ApiErrorDto,
	envelope,
	getSchemaPathForDto,
} from "../common/dto/envelopes";
import { ParseAccountPipe } from "../common/pipes/account.pipe";
import {
	GetCollateralValueDto,
	GetHealthFactorDto,
	GetPositionDto,
} from "./dto/get-position.dto";
import {
	CollateralInDto,
	DebtInDto,
	DepositAndMintInDto,
	RedeemForDebtInDto,
} from "./dto/position-operations.dto";
import { PositionsService } from "./positions.service";

@ApiTags("1 - Positions")
@ApiExtraModels(
	ApiEnvelopeShellDto,
	GetPositionDto,
	GetHealthFactorDto,
	GetCollateralValueDto,
)
@ApiBadRequestResponse({ description: "Invalid input", type: ApiErrorDto })
@ApiBadGatewayResponse({
	description: "A price feed or token failed",
	type: ApiErrorDto,
})
@Controller("api/v1/positions")
export class PositionsController {
	constructor(private readonly positionsService: PositionsService) {}

	@Post("collateral/deposit")
	@HttpCode(HttpStatus.OK)
	@UseGuards(AccountGuard)
	@ApiHeader({ name: "X-Account", required: true })
	@ApiOperation({ summary: "Lock collateral, pulling it from the caller" })
	@ApiBody({ type: CollateralInDto })
	@ApiOkResponse({
		description: "The caller's position",
		schema: getSchemaPathForDto(GetPositionDto),
	})
	@ApiUnauthorizedResponse({ description: "Missing X-Account header" })
	depositCollateral(
		@Account() account: string,
		@Body() dto: CollateralInDto,
	): ApiEnvelope<GetPositionDto> {
		return envelope(this.positionsService.depositCollateral(account, dto));
	}

	@Post("collateral/withdraw")
	@HttpCode(HttpStatus.OK)
	@UseGuards(AccountGuard)
	@ApiHeader({ name: "X-Account", required: true })
	@ApiOperation({
		summary: "Withdraw collateral if the position stays healthy",
	})
	@ApiBody({ type: CollateralInDto })
	@ApiOkResponse({
		description: "The caller's position",
		schema: getSchemaPathForDto(GetPositionDto),
	})
	@ApiUnprocessableEntityResponse({
		description: "Health factor would break or balance is insufficient",
		type: ApiErrorDto,
	})
	withdrawCollateral(
		@Account() account: string,
		@Body() dto: CollateralInDto,
	): ApiEnvelope<GetPositionDto> {
		return envelope(this.positionsService.withdrawCollateral(account, dto));
	}

	@Post("debt/mint")
	@HttpCode(HttpStatus.OK)
	@UseGuards(AccountGuard)
	@ApiHeader({ name: "X-Account", required: true })
	@ApiOperation({ summary: "Mint liability tokens against the collateral" })
	@ApiBody({ type: DebtInDto })
	@ApiOkResponse({
		description: "The caller's position",
		schema: getSchemaPathForDto(GetPositionDto),
	})
	@ApiUnprocessableEntityResponse({
		description: "Health factor would break",
		type: ApiErrorDto,
	})
	mintDebt(
		@Account() account: string,
		@Body() dto: DebtInDto,
	): ApiEnvelope<GetPositionDto> {
		return envelope(this.positionsService.mintDebt(account, dto));
	}

	@Post("debt/burn")
	@HttpCode(HttpStatus.OK)
	@UseGuards(AccountGuard)
	@ApiHeader({ name: "X-Account", required: true })
	@ApiOperation({ summary: "Repay debt by burning the caller's liability tokens" })
	@ApiBody({ type: DebtInDto })
	@ApiOkResponse({
		description: "The caller's position",
		schema: getSchemaPathForDto(GetPositionDto),
	})
	@ApiUnprocessableEntityResponse({
		description: "More than the recorded debt",
		type: ApiErrorDto,
	})
	burnDebt(
		@Account() account: string,
		@Body() dto: DebtInDto,
	): ApiEnvelope<GetPositionDto> {
		return envelope(this.positionsService.burnDebt(account, dto));
	}

	@Post("deposit-and-mint")
	@HttpCode(HttpStatus.OK)
	@UseGuards(AccountGuard)
	@ApiHeader({ name: "X-Account", required: true })
	@ApiOperation({ summary: "Deposit collateral and mint in one operation" })
	@ApiBody({ type: DepositAndMintInDto })
	@ApiOkResponse({
		description: "The caller's position",
		schema: getSchemaPathForDto(GetPositionDto),
	})
	@ApiUnprocessableEntityResponse({
		description: "Health factor would break",
		type: ApiErrorDto,
	})
	depositAndMint(
		@Account() account: string,
		@Body() dto: DepositAndMintInDto,
	): ApiEnvelope<GetPositionDto> {
		return envelope(this.positionsService.depositAndMint(account, dto));
	}

	@Post("redeem-for-debt")
	@HttpCode(HttpStatus.OK)
	@UseGuards(AccountGuard)
	@ApiHeader({ name: "X-Account", required: true })
	@ApiOperation({ summary: "Burn debt and withdraw collateral in one operation" })
	@ApiBody({ type: RedeemForDebtInDto })
	@ApiOkResponse({
		description: "The caller's position",
		schema: getSchemaPathForDto(GetPositionDto),
	})
	@ApiUnprocessableEntityResponse({
		description: "Health factor would break or balances are insufficient",
		type: ApiErrorDto,
	})
	redeemForDebt(
		@Account() account: string,
		@Body() dto: RedeemForDebtInDto,
	): ApiEnvelope<GetPositionDto> {
		return envelope(this.positionsService.redeemForDebt(account, dto));
	}

	@Get(":account")
	@ApiOperation({ summary: "Debt, collateral and health factor of an account" })
	@ApiOkResponse({
		description: "The account's position",
		schema: getSchemaPathForDto(GetPositionDto),
	})
	getPosition(
		@Param("account", ParseAccountPipe) account: string,
	): ApiEnvelope<GetPositionDto> {
		return envelope(this.positionsService.getPosition(account));
	}

	@Get(":account/health-factor")
	@ApiOperation({ summary: "Health factor of an account" })
	@ApiOkResponse({
		description: "The account's health factor",
		schema: getSchemaPathForDto(GetHealthFactorDto),
	})
	getHealthFactor(
		@Param("account", ParseAccountPipe) account: string,
	): ApiEnvelope<GetHealthFactorDto> {
		return envelope(this.positionsService.getHealthFactor(account));
	}

	@Get(":account/collateral-value")
	@ApiOperation({ summary: "USD value of an account's collateral" })
	@ApiOkResponse({
		description: "The account's collateral value",
		schema: getSchemaPathForDto(GetCollateralValueDto),
	})
	getCollateralValue(
		@Param("account", ParseAccountPipe) account: string,
	): ApiEnvelope<GetCollateralValueDto> {
		return envelope(this.positionsService.getCollateralValue(account));
	}
}
