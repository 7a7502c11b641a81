import { Controller, Get } from "@nestjs/common";
import {
	ApiBadGatewayResponse,
	ApiExtraModels,
	ApiOkResponse,
	ApiOperation,
	ApiTags,
} from "@nestjs/swagger";
import {
	type ApiEnvelope,
	ApiEnvelopeShellDto,
	ApiErrorDto,
	envelope,
	getSchemaPathForDto,
} from "../common/dto/envelopes";
import { GetMarketDto } from "./dto/get-market.dto";
import { MarketService } from "./market.service";

@ApiTags("3 - Market")
@ApiExtraModels(ApiEnvelopeShellDto, GetMarketDto)
@Controller("api/v1/market")
export class MarketController {
	constructor(private readonly marketService: MarketService) {}

	@Get()
	@ApiOperation({
		summary: "Supported collateral, current prices and protocol parameters",
	})
	@ApiOkResponse({
		description: "The market",
		schema: getSchemaPathForDto(GetMarketDto),
	})
	@ApiBadGatewayResponse({ description: "A price feed is stale", type: ApiErrorDto })
	getMarket(): ApiEnvelope<GetMarketDto> {
		return envelope(this.marketService.getMarket());
	}
}
