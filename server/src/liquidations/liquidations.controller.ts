import {
	Body,
	Controller,
	HttpCode,
	HttpStatus,
	Post,
	UseGuards,
} from "@nestjs/common";
import {
	ApiBody,
	ApiExtraModels,
	ApiHeader,
	ApiOkResponse,
	ApiOperation,
	ApiTags,
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
import { LiquidateInDto, LiquidateOutDto } from "./dto/liquidate.dto";
import { LiquidationsService } from "./liquidations.service";

@ApiTags("2 - Liquidations")
@ApiExtraModels(ApiEnvelopeShellDto, LiquidateOutDto)
@Controller("api/v1/liquidations")
export class LiquidationsController {
	constructor(private readonly liquidationsService: LiquidationsService) {}

	@Post()
	@HttpCode(HttpStatus.OK)
	@UseGuards(AccountGuard)
	@ApiHeader({ name: "X-Account", required: true, description: "The liquidator" })
	@ApiOperation({
		summary:
			"Repay part of an undercollateralized account's debt and receive its collateral plus the bonus",
	})
	@ApiBody({ type: LiquidateInDto })
	@ApiOkResponse({
		description: "The liquidation outcome",
		schema: getSchemaPathForDto(LiquidateOutDto),
	})
	@ApiUnprocessableEntityResponse({
		description:
			"Target is healthy, the liquidation would worsen it, or balances are insufficient",
		type: ApiErrorDto,
	})
	liquidate(
		@Account() liquidator: string,
		@Body() dto: LiquidateInDto,
	): ApiEnvelope<LiquidateOutDto> {
		return envelope(this.liquidationsService.liquidate(liquidator, dto));
	}
}
