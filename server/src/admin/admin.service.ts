import {
	BadRequestException,
	Inject,
	Injectable,
	InternalServerErrorException,
	Logger,
} from "@nestjs/common";
import { DebtEngine } from "@pegvault/engine";
import { fromAmount, toAmount } from "../common/amounts";
import {
	DEBT_ENGINE,
	ENGINE_COLLABORATORS,
} from "../engine/engine.constants";
import { EngineCollaborators } from "../engine/engine.factory";
import { FaucetInDto, FaucetOutDto } from "./dto/faucet.dto";
import GetAdminStatsDto from "./dto/get-admin-stats.dto";
import { UpdateFeedInDto, UpdateFeedOutDto } from "./dto/update-feed.dto";

/**
 * Operates the in-memory collaborators: sets feed answers and creates
 * collateral tokens. Development only.
 */
@Injectable()
export class AdminService {
	private readonly logger = new Logger(AdminService.name);

	constructor(
		@Inject(DEBT_ENGINE) private readonly engine: DebtEngine,
		@Inject(ENGINE_COLLABORATORS)
		private readonly collaborators: EngineCollaborators,
	) {}

	updateFeed(asset: string, dto: UpdateFeedInDto): UpdateFeedOutDto {
		const feedId = this.engine.getPriceFeed(asset);
		const feed = this.collaborators.feeds.get(feedId);
		if (!feed) {
			throw new InternalServerErrorException(`Feed ${feedId} is not managed`);
		}

		feed.updateAnswer(toAmount(dto.answer));
		const reading = feed.latestReading();
		this.logger.log(`Feed ${feedId} answered ${reading.price}`);
		return {
			asset,
			priceFeed: feedId,
			answer: fromAmount(reading.price),
			decimals: reading.decimals,
			roundId: String(reading.roundId ?? 0n),
			updatedAt: reading.updatedAt,
		};
	}

	faucet(dto: FaucetInDto): FaucetOutDto {
		const amount = toAmount(dto.amount);
		if (amount === 0n) {
			throw new BadRequestException("amount must be greater than zero");
		}
		if (dto.account === this.engine.getCustodyAccount()) {
			throw new BadRequestException("Cannot fund the custody account");
		}
		// Resolves the asset, or throws UNSUPPORTED_ASSET
		this.engine.getPriceFeed(dto.asset);
		const token = this.collaborators.tokens.get(dto.asset);
		if (!token) {
			throw new InternalServerErrorException(`Token ${dto.asset} is not managed`);
		}

		token.mintTo(dto.account, amount);
		this.logger.log(`Faucet sent ${amount} ${dto.asset} to ${dto.account}`);
		return {
			account: dto.account,
			asset: dto.asset,
			balance: fromAmount(token.balanceOf(dto.account)),
		};
	}

	getStats(): GetAdminStatsDto {
		const custody = this.engine.getCustodyAccount();
		return {
			assets: this.engine.getCollateralAssets().map((asset) => ({
				asset,
				totalCollateral: fromAmount(this.engine.getTotalCollateral(asset)),
				custodyBalance: fromAmount(
					this.collaborators.tokens.get(asset)?.balanceOf(custody) ?? 0n,
				),
			})),
			totalDebt: fromAmount(this.engine.getTotalDebt()),
			liabilitySupply: fromAmount(this.collaborators.liability.totalSupply()),
		};
	}
}
