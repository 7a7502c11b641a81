import "reflect-metadata";
import { Logger } from "@nestjs/common";
import { NestFactory } from "@nestjs/core";
import { DocumentBuilder, SwaggerModule } from "@nestjs/swagger";
import * as dotenv from "dotenv";
import { AppModule } from "./app.module";
import { configureApp } from "./app.setup";

dotenv.config();

async function bootstrap() {
	const app = configureApp(await NestFactory.create(AppModule));

	const config = new DocumentBuilder()
		.setTitle("Pegvault API")
		.setDescription(
			"Callers identify themselves with the `X-Account` header. Admin routes use basic auth.",
		)
		.setVersion("0.1.0")
		.addApiKey({ type: "apiKey", name: "X-Account", in: "header" }, "account")
		.addBasicAuth()
		.build();
	const doc = SwaggerModule.createDocument(app, config);
	SwaggerModule.setup("api/v1/docs", app, doc, {
		swaggerOptions: {
			tagsSorter: "alpha",
			operationsSorter: "alpha",
			persistAuthorization: true,
		},
	});

	const port = parseInt(process.env.PORT ?? "3000", 10);
	await app.listen(port, "0.0.0.0");
	new Logger("Bootstrap").log(`API listening on http://0.0.0.0:${port}`);
}

bootstrap().catch((error: unknown) => {
	new Logger("Bootstrap").error(
		"Failed to start",
		error instanceof Error ? error.stack : String(error),
	);
	process.exit(1);
});
