import {
	BadRequestException,
	CanActivate,
	createParamDecorator,
	ExecutionContext,
	ForbiddenException,
	Inject,
	Injectable,
	UnauthorizedException,
} from "@nestjs/common";
import type { Request } from "express";
import { DebtEngine } from "@pegvault/engine";
import { DEBT_ENGINE } from "../engine/engine.constants";

/** Header carrying the caller's account id */
export const ACCOUNT_HEADER = "x-account";

export const ACCOUNT_PATTERN = /^[A-Za-z0-9._:-]{1,64}$/;

function accountOf(req: Request): string | undefined {
	return req.header(ACCOUNT_HEADER)?.trim() || undefined;
}

/**
 * Requires a well-formed `X-Account` header naming any account but the
 * engine's own custody account.
 */
@Injectable()
export class AccountGuard implements CanActivate {
	constructor(@Inject(DEBT_ENGINE) private readonly engine: DebtEngine) {}

	canActivate(context: ExecutionContext): boolean {
		const account = accountOf(context.switchToHttp().getRequest<Request>());
		if (!account) {
			throw new UnauthorizedException("Missing X-Account header");
		}
		if (!ACCOUNT_PATTERN.test(account)) {
			throw new BadRequestException("Malformed X-Account header");
		}
		if (account === this.engine.getCustodyAccount()) {
			throw new ForbiddenException("The custody account cannot call the engine");
		}
		return true;
	}
}

/**
 * The calling account, as validated by AccountGuard.
 */
export const Account = createParamDecorator(
	(_: unknown, context: ExecutionContext): string => {
		const account = accountOf(context.switchToHttp().getRequest<Request>());
		if (!account) {
			throw new UnauthorizedException("Missing X-Account header");
		}
		return account;
	},
);
