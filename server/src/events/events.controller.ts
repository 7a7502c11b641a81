import { Controller, Query, Sse } from "@nestjs/common";
import { ApiOperation, ApiQuery, ApiTags } from "@nestjs/swagger";
import { map, Observable } from "rxjs";
import {
	ServerSentEventsService,
	SseEvent,
} from "../common/server-sent-events.service";
import { PositionEvent } from "../common/position.event";

@ApiTags("4 - Events")
@Controller("api/v1/events")
export class EventsController {
	constructor(private readonly sseService: ServerSentEventsService) {}

	@Sse()
	@ApiOperation({ summary: "Server-sent stream of committed engine events" })
	@ApiQuery({
		name: "account",
		required: false,
		description: "Only events touching this account",
	})
	stream(@Query("account") account?: string): Observable<SseEvent<PositionEvent>> {
		return this.sseService
			.positionEvents(account)
			.pipe(map((event) => ({ data: event })));
	}
}
