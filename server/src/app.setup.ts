import { INestApplication, ValidationPipe } from "@nestjs/common";
import { EngineExceptionFilter } from "./common/filters/engine-exception.filter";

/**
 * Global pipes, filters and CORS, shared by the server and the e2e tests.
 */
export function configureApp(app: INestApplication): INestApplication {
	app.useGlobalPipes(
		new ValidationPipe({
			whitelist: true,
			forbidNonWhitelisted: true,
			transform: true,
		}),
	);
	app.useGlobalFilters(new EngineExceptionFilter());
	app.enableCors();
	return app;
}
