import {
	Inject,
	Injectable,
	Logger,
	OnModuleDestroy,
	OnModuleInit,
} from "@nestjs/common";
import { EventEmitter2 } from "@nestjs/event-emitter";
import { DebtEngine, EngineEvent } from "@pegvault/engine";
import { nanoid } from "nanoid";
import { toPositionEvent } from "../common/position.event";
import { DEBT_ENGINE } from "./engine.constants";

/**
 * Republishes committed engine events on the Nest event bus, under the
 * engine's event names.
 */
@Injectable()
export class EngineEventsBridge implements OnModuleInit, OnModuleDestroy {
	private readonly logger = new Logger(EngineEventsBridge.name);
	private unsubscribe?: () => void;

	constructor(
		@Inject(DEBT_ENGINE) private readonly engine: DebtEngine,
		private readonly events: EventEmitter2,
	) {}

	onModuleInit() {
		this.unsubscribe = this.engine.on((event) => this.forward(event));
	}

	onModuleDestroy() {
		this.unsubscribe?.();
	}

	private forward(event: EngineEvent) {
		const payload = toPositionEvent(event, nanoid(8));
		this.logger.debug(`${payload.type} ${payload.eventId}`);
		this.events.emit(payload.type, payload);
	}
}
