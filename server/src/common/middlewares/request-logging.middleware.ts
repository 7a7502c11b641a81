import { Injectable, Logger, NestMiddleware } from "@nestjs/common";
import type { NextFunction, Request, Response } from "express";

@Injectable()
export class RequestLoggingMiddleware implements NestMiddleware {
	private readonly logger = new Logger("HTTP");

	use(req: Request, res: Response, next: NextFunction) {
		const started = Date.now();
		res.on("finish", () => {
			const account = req.header("x-account");
			this.logger.log(
				`${req.method} ${req.originalUrl} ${res.statusCode} ${Date.now() - started}ms${account ? ` [${account}]` : ""}`,
			);
		});
		next();
	}
}
