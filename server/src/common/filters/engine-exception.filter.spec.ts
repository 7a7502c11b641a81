import {
	BadRequestException,
	HttpStatus,
	NotFoundException,
} from "@nestjs/common";
import { ExecutionContextHost } from "@nestjs/core/helpers/execution-context-host";
import { EngineError } from "@pegvault/engine";
import {
	EngineExceptionFilter,
	statusForEngineError,
} from "./engine-exception.filter";

class FakeResponse {
	statusCode = 0;
	body: unknown;

	status(code: number) {
		this.statusCode = code;
		return this;
	}

	json(body: unknown) {
		this.body = body;
		return this;
	}
}

function render(exception: unknown): FakeResponse {
	const res = new FakeResponse();
	new EngineExceptionFilter().catch(
		exception,
		new ExecutionContextHost([{}, res]),
	);
	return res;
}

describe("EngineExceptionFilter", () => {
	it("maps engine error codes to statuses", () => {
		expect(statusForEngineError("ZERO_AMOUNT")).toBe(HttpStatus.BAD_REQUEST);
		expect(statusForEngineError("HEALTH_FACTOR_OK")).toBe(
			HttpStatus.UNPROCESSABLE_ENTITY,
		);
		expect(statusForEngineError("REENTRANCY_BLOCKED")).toBe(HttpStatus.CONFLICT);
		expect(statusForEngineError("ORACLE_ERROR")).toBe(HttpStatus.BAD_GATEWAY);
		expect(statusForEngineError("CUSTODY_CALLER")).toBe(HttpStatus.FORBIDDEN);
	});

	it("renders an engine error with its code", () => {
		const res = render(
			new EngineError("Health factor 0.9 is below 1.0", "HEALTH_FACTOR_BROKEN"),
		);

		expect(res.statusCode).toBe(422);
		expect(res.body).toEqual({
			statusCode: 422,
			error: "HEALTH_FACTOR_BROKEN",
			message: "Health factor 0.9 is below 1.0",
		});
	});

	it("keeps the message of an HTTP exception", () => {
		const res = render(new NotFoundException("No such account"));

		expect(res.body).toEqual({
			statusCode: 404,
			error: "NotFoundException",
			message: "No such account",
		});
	});

	it("keeps validation messages as a list", () => {
		const res = render(
			new BadRequestException(["amount must be a non-negative integer string"]),
		);

		expect(res.body).toEqual({
			statusCode: 400,
			error: "BadRequestException",
			message: ["amount must be a non-negative integer string"],
		});
	});

	it("hides the details of unexpected errors", () => {
		const res = render(new TypeError("Cannot read properties of undefined"));

		expect(res.body).toEqual({
			statusCode: 500,
			error: "INTERNAL_SERVER_ERROR",
			message: "Internal server error",
		});
	});
});
