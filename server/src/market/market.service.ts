import { Inject, Injectable } from "@nestjs/common";
import { DebtEngine } from "@pegvault/engine";
import { fromAmount } from "../common/amounts";
import { DEBT_ENGINE } from "../engine/engine.constants";
import { GetMarketDto } from "./dto/get-market.dto";

@Injectable()
export class MarketService {
	constructor(@Inject(DEBT_ENGINE) private readonly engine: DebtEngine) {}

	getMarket(): GetMarketDto {
		const parameters = this.engine.getParameters();
		return {
			assets: this.engine.getCollateralAssets().map((asset) => ({
				asset,
				priceFeed: this.engine.getPriceFeed(asset),
				priceUsd: fromAmount(this.engine.getPrice(asset)),
				totalCollateral: fromAmount(this.engine.getTotalCollateral(asset)),
			})),
			parameters: {
				precision: fromAmount(parameters.precision),
				liquidationThreshold: fromAmount(parameters.liquidationThreshold),
				liquidationBonus: fromAmount(parameters.liquidationBonus),
				liquidationPrecision: fromAmount(parameters.liquidationPrecision),
				minHealthFactor: fromAmount(parameters.minHealthFactor),
				oracleTimeoutSeconds: parameters.oracleTimeoutSeconds,
			},
			totalDebt: fromAmount(this.engine.getTotalDebt()),
		};
	}
}
