import { Body, Controller, Get, Param, Post, Put } from "@nestjs/common";
import {
	ApiBasicAuth,
	ApiBody,
	ApiExtraModels,
	ApiOkResponse,
	ApiOperation,
	ApiTags,
} from "@nestjs/swagger";
import {
	type ApiEnvelope,
	ApiEnvelopeShellDto,
	envelope,
	getSchemaPathForDto,
} from "../common/dto/envelopes";
import { AdminService } from "./admin.service";
import { FaucetInDto, FaucetOutDto } from "./dto/faucet.dto";
import GetAdminStatsDto from "./dto/get-admin-stats.dto";
import { UpdateFeedInDto, UpdateFeedOutDto } from "./dto/update-feed.dto";

@ApiTags("Admin")
@ApiBasicAuth()
@ApiExtraModels(
	ApiEnvelopeShellDto,
	UpdateFeedOutDto,
	FaucetOutDto,
	GetAdminStatsDto,
)
@Controller("api/admin/v1")
export class AdminController {
	constructor(private readonly adminService: AdminService) {}

	@ApiOperation({ summary: "Statistics for the engine" })
	@ApiOkResponse({
		description: "Totals per asset, debt and liability supply",
		schema: getSchemaPathForDto(GetAdminStatsDto),
	})
	@Get("stats")
	stats(): ApiEnvelope<GetAdminStatsDto> {
		return envelope(this.adminService.getStats());
	}

	@ApiOperation({ summary: "Publish a new answer on an asset's price feed" })
	@ApiBody({ type: UpdateFeedInDto })
	@ApiOkResponse({
		description: "The feed's latest reading",
		schema: getSchemaPathForDto(UpdateFeedOutDto),
	})
	@Put("feeds/:asset")
	updateFeed(
		@Param("asset") asset: string,
		@Body() dto: UpdateFeedInDto,
	): ApiEnvelope<UpdateFeedOutDto> {
		return envelope(this.adminService.updateFeed(asset, dto));
	}

	@ApiOperation({ summary: "Create collateral tokens for an account" })
	@ApiBody({ type: FaucetInDto })
	@ApiOkResponse({
		description: "The account's new balance",
		schema: getSchemaPathForDto(FaucetOutDto),
	})
	@Post("faucet")
	faucet(@Body() dto: FaucetInDto): ApiEnvelope<FaucetOutDto> {
		return envelope(this.adminService.faucet(dto));
	}
}
