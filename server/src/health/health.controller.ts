import { Controller, Get, Inject } from "@nestjs/common";
import { ApiOkResponse, ApiOperation, ApiTags } from "@nestjs/swagger";
import { DebtEngine } from "@pegvault/engine";
import { DEBT_ENGINE } from "../engine/engine.constants";

export type HealthStatus = {
	status: "ok";
	uptimeSeconds: number;
	assets: number;
};

@ApiTags("Health")
@Controller("api/v1/health")
export class HealthController {
	constructor(@Inject(DEBT_ENGINE) private readonly engine: DebtEngine) {}

	@ApiOperation({ summary: "Liveness probe" })
	@ApiOkResponse({ description: "The server is up" })
	@Get()
	check(): HealthStatus {
		return {
			status: "ok",
			uptimeSeconds: Math.floor(process.uptime()),
			assets: this.engine.getCollateralAssets().length,
		};
	}
}
