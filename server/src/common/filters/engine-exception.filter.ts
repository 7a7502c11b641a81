import {
	ArgumentsHost,
	Catch,
	ExceptionFilter,
	HttpException,
	HttpStatus,
	Logger,
} from "@nestjs/common";
import type { Response } from "express";
import { EngineError, EngineErrorCode, toError } from "@pegvault/engine";

const STATUS_BY_CODE: Record<EngineErrorCode, HttpStatus> = {
	ZERO_AMOUNT: HttpStatus.BAD_REQUEST,
	UNSUPPORTED_ASSET: HttpStatus.BAD_REQUEST,
	HEALTH_FACTOR_BROKEN: HttpStatus.UNPROCESSABLE_ENTITY,
	HEALTH_FACTOR_OK: HttpStatus.UNPROCESSABLE_ENTITY,
	HEALTH_FACTOR_NOT_IMPROVED: HttpStatus.UNPROCESSABLE_ENTITY,
	INSUFFICIENT_COLLATERAL: HttpStatus.UNPROCESSABLE_ENTITY,
	INSUFFICIENT_DEBT: HttpStatus.UNPROCESSABLE_ENTITY,
	REENTRANCY_BLOCKED: HttpStatus.CONFLICT,
	TRANSFER_FAILED: HttpStatus.BAD_GATEWAY,
	ORACLE_ERROR: HttpStatus.BAD_GATEWAY,
	CONFIG_MISMATCH: HttpStatus.INTERNAL_SERVER_ERROR,
	CUSTODY_CALLER: HttpStatus.FORBIDDEN,
};

export function statusForEngineError(code: EngineErrorCode): HttpStatus {
	return STATUS_BY_CODE[code];
}

type ErrorBody = {
	statusCode: number;
	error: string;
	message: string | string[];
};

/**
 * Renders engine errors, Nest HTTP exceptions and anything unexpected as
 * `{ statusCode, error, message }`.
 */
@Catch()
export class EngineExceptionFilter implements ExceptionFilter {
	private readonly logger = new Logger(EngineExceptionFilter.name);

	catch(exception: unknown, host: ArgumentsHost) {
		const res = host.switchToHttp().getResponse<Response>();
		const body = this.toBody(exception);
		res.status(body.statusCode).json(body);
	}

	private toBody(exception: unknown): ErrorBody {
		if (exception instanceof EngineError) {
			const statusCode = statusForEngineError(exception.code);
			if (statusCode >= HttpStatus.INTERNAL_SERVER_ERROR) {
				this.logger.error(
					`${exception.code}: ${exception.message}`,
					exception.cause instanceof Error ? exception.cause.stack : undefined,
				);
			}
			return { statusCode, error: exception.code, message: exception.message };
		}

		if (exception instanceof HttpException) {
			const statusCode = exception.getStatus();
			const response = exception.getResponse();
			if (typeof response === "object" && "message" in response) {
				const { message } = response;
				return {
					statusCode,
					error: exception.name,
					message:
						typeof message === "string" || Array.isArray(message)
							? message
							: exception.message,
				};
			}
			return { statusCode, error: exception.name, message: exception.message };
		}

		const error = toError(exception);
		this.logger.error(`Unhandled error: ${error.message}`, error.stack);
		return {
			statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
			error: "INTERNAL_SERVER_ERROR",
			message: "Internal server error",
		};
	}
}
