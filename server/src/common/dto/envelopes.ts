import { ApiProperty, getSchemaPath } from "@nestjs/swagger";

export type ApiEnvelope<T> = {
	data: T;
};

export const envelope = <T>(data: T): ApiEnvelope<T> => ({ data });

/** Placeholder “envelope” shell; `data` is overridden per-endpoint in controller schemas. */
export class ApiEnvelopeShellDto<T> {
	@ApiProperty({
		description: "Payload for this endpoint (shape varies by route)",
	})
	data!: T;
}

export function getSchemaPathForDto(dto: Parameters<typeof getSchemaPath>[0]) {
	return {
		allOf: [
			{ $ref: getSchemaPath(ApiEnvelopeShellDto) },
			{
				type: "object",
				properties: {
					data: { $ref: getSchemaPath(dto) },
				},
				required: ["data"],
			},
		],
	};
}

/**
 * Error body returned for every failed request.
 */
export class ApiErrorDto {
	@ApiProperty({ example: 422 })
	statusCode!: number;

	@ApiProperty({
		description: "Engine error code, or the HTTP error name",
		example: "HEALTH_FACTOR_BROKEN",
	})
	error!: string;

	@ApiProperty({ example: "Health factor of alice would fall to 999999999999999999" })
	message!: string | string[];
}
