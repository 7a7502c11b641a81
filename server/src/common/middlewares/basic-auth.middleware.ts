import { Injectable, NestMiddleware } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import type { NextFunction, Request, Response } from "express";
import { timingSafeEqual as constantTimeEqual } from "node:crypto";

/**
 * Guards the admin routes with HTTP basic auth against
 * BACKOFFICE_BASIC_USER / BACKOFFICE_BASIC_PASS. Without a configured
 * user every request is refused.
 */
@Injectable()
export class BasicAuthMiddleware implements NestMiddleware {
	constructor(private readonly config: ConfigService) {}

	use(req: Request, res: Response, next: NextFunction) {
		const expectedUser = this.config.get<string>("BACKOFFICE_BASIC_USER") ?? "";
		const expectedPass = this.config.get<string>("BACKOFFICE_BASIC_PASS") ?? "";
		if (!expectedUser) {
			return unauthorized(res, "Admin access is disabled");
		}

		const header = req.header("authorization");
		if (!header || !header.startsWith("Basic ")) {
			return unauthorized(res, "Authentication required");
		}

		const decoded = Buffer.from(
			header.slice("Basic ".length).trim(),
			"base64",
		).toString("utf8");
		const sep = decoded.indexOf(":");
		const username = sep >= 0 ? decoded.slice(0, sep) : "";
		const password = sep >= 0 ? decoded.slice(sep + 1) : "";

		const ok =
			timingSafeEqual(username, expectedUser) &&
			timingSafeEqual(password, expectedPass);
		if (!ok) {
			return unauthorized(res, "Unauthorized");
		}

		return next();
	}
}

function unauthorized(res: Response, message: string) {
	res.setHeader("WWW-Authenticate", 'Basic realm="Restricted"');
	res.status(401).json({ statusCode: 401, error: "Unauthorized", message });
}

function timingSafeEqual(a: string, b: string): boolean {
	const ab = Buffer.from(a);
	const bb = Buffer.from(b);
	if (ab.length !== bb.length) {
		// Same-length comparison so the timing does not depend on the input
		constantTimeEqual(ab, ab);
		return false;
	}
	return constantTimeEqual(ab, bb);
}
