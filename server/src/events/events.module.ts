import { Module } from "@nestjs/common";
import { ServerSentEventsService } from "../common/server-sent-events.service";
import { EventsController } from "./events.controller";

@Module({
	controllers: [EventsController],
	providers: [ServerSentEventsService],
	exports: [ServerSentEventsService],
})
export class EventsModule {}
