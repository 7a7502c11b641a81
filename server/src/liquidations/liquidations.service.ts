import { Inject, Injectable, Logger } from "@nestjs/common";
import { DebtEngine } from "@pegvault/engine";
import { fromAmount, toAmount } from "../common/amounts";
import { DEBT_ENGINE } from "../engine/engine.constants";
import { LiquidateInDto, LiquidateOutDto } from "./dto/liquidate.dto";

@Injectable()
export class LiquidationsService {
	private readonly logger = new Logger(LiquidationsService.name);

	constructor(@Inject(DEBT_ENGINE) private readonly engine: DebtEngine) {}

	liquidate(liquidator: string, dto: LiquidateInDto): LiquidateOutDto {
		const debtToCover = toAmount(dto.debtToCover);
		const result = this.engine.liquidate(
			liquidator,
			dto.target,
			dto.asset,
			debtToCover,
		);
		this.logger.log(
			`${liquidator} liquidated ${debtToCover} of ${dto.target}'s debt for ${result.collateralSeized} ${dto.asset}`,
		);
		return {
			liquidator,
			target: dto.target,
			asset: dto.asset,
			debtCovered: fromAmount(debtToCover),
			collateralSeized: fromAmount(result.collateralSeized),
			startingHealthFactor: fromAmount(result.startingHealthFactor),
			endingHealthFactor: fromAmount(result.endingHealthFactor),
			stillUndercollateralized: result.stillUndercollateralized,
		};
	}
}
