import { ConfigModule } from "@nestjs/config";
import {
	MiddlewareConsumer,
	Module,
	NestModule,
	RequestMethod,
} from "@nestjs/common";
import { EventEmitterModule } from "@nestjs/event-emitter";

import { AdminController } from "./admin/admin.controller";
import { AdminModule } from "./admin/admin.module";
import { BasicAuthMiddleware } from "./common/middlewares/basic-auth.middleware";
import { RequestLoggingMiddleware } from "./common/middlewares/request-logging.middleware";
import { EngineModule } from "./engine/engine.module";
import { EventsModule } from "./events/events.module";
import { HealthModule } from "./health/health.module";
import { LiquidationsModule } from "./liquidations/liquidations.module";
import { MarketModule } from "./market/market.module";
import { PositionsModule } from "./positions/positions.module";

@Module({
	imports: [
		EventEmitterModule.forRoot(),
		ConfigModule.forRoot({ isGlobal: true }),
		EngineModule,
		EventsModule,
		PositionsModule,
		LiquidationsModule,
		MarketModule,
		AdminModule,
		HealthModule,
	],
})
export class AppModule implements NestModule {
	configure(consumer: MiddlewareConsumer) {
		consumer.apply(BasicAuthMiddleware).forRoutes(AdminController);

		consumer
			.apply(RequestLoggingMiddleware)
			.exclude({ path: "api/v1/health", method: RequestMethod.ALL })
			.forRoutes({ path: "*", method: RequestMethod.ALL });
	}
}
