import { Inject, Injectable, Logger } from "@nestjs/common";
import { DebtEngine } from "@pegvault/engine";
import { fromAmount, toAmount } from "../common/amounts";
import { ENGINE_COLLABORATORS, DEBT_ENGINE } from "../engine/engine.constants";
import { EngineCollaborators } from "../engine/engine.factory";
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

@Injectable()
export class PositionsService {
	private readonly logger = new Logger(PositionsService.name);

	constructor(
		@Inject(DEBT_ENGINE) private readonly engine: DebtEngine,
		@Inject(ENGINE_COLLABORATORS)
		private readonly collaborators: EngineCollaborators,
	) {}

	depositCollateral(account: string, dto: CollateralInDto): GetPositionDto {
		this.engine.depositCollateral(account, dto.asset, toAmount(dto.amount));
		return this.getPosition(account);
	}

	withdrawCollateral(account: string, dto: CollateralInDto): GetPositionDto {
		this.engine.withdrawCollateral(account, dto.asset, toAmount(dto.amount));
		return this.getPosition(account);
	}

	mintDebt(account: string, dto: DebtInDto): GetPositionDto {
		this.engine.mintDebt(account, toAmount(dto.amount));
		return this.getPosition(account);
	}

	burnDebt(account: string, dto: DebtInDto): GetPositionDto {
		this.engine.burnDebt(account, toAmount(dto.amount));
		return this.getPosition(account);
	}

	depositAndMint(account: string, dto: DepositAndMintInDto): GetPositionDto {
		this.engine.depositCollateralAndMintDebt(
			account,
			dto.asset,
			toAmount(dto.collateralAmount),
			toAmount(dto.mintAmount),
		);
		this.logger.log(`${account} opened ${dto.mintAmount} against ${dto.asset}`);
		return this.getPosition(account);
	}

	redeemForDebt(account: string, dto: RedeemForDebtInDto): GetPositionDto {
		this.engine.redeemCollateralForDebt(
			account,
			dto.asset,
			toAmount(dto.collateralAmount),
			toAmount(dto.burnAmount),
		);
		return this.getPosition(account);
	}

	getPosition(account: string): GetPositionDto {
		const position = this.engine.getPosition(account);
		return {
			account,
			debtMinted: fromAmount(position.debtMinted),
			collateralValueUsd: fromAmount(position.collateralValueUsd),
			healthFactor: fromAmount(position.healthFactor),
			collateral: position.collateral.map(({ asset, amount }) => ({
				asset,
				amount: fromAmount(amount),
			})),
			liabilityBalance: fromAmount(
				this.collaborators.liability.balanceOf(account),
			),
		};
	}

	getHealthFactor(account: string): GetHealthFactorDto {
		return {
			account,
			healthFactor: fromAmount(this.engine.getHealthFactor(account)),
		};
	}

	getCollateralValue(account: string): GetCollateralValueDto {
		return {
			account,
			collateralValueUsd: fromAmount(
				this.engine.getAccountCollateralValue(account),
			),
		};
	}
}
