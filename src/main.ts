import "reflect-metadata";
import { Logger } from "@nestjs/common";
import { NestFactory } from "@nestjs/core";
import type { NestExpressApplication } from "@nestjs/platform-express";
import { DocumentBuilder, SwaggerModule } from "@nestjs/swagger";
import * as dotenv from "dotenv";
import { AppModule } from "./app.module";
import { configureApp } from "./app.setup";
import { ROOM_SESSION_HEADER } from "./rooms/room-session.guard";

dotenv.config();

async function bootstrap() {
	const app = configureApp(
		await NestFactory.create<NestExpressApplication>(AppModule),
	);
	app.enableShutdownHooks();

	const config = new DocumentBuilder()
		.setTitle("Escrow Rooms API")
		.setDescription(
			`Participants authenticate with the \`${ROOM_SESSION_HEADER}\` header issued on join; the arbiter uses HTTP Basic.`,
		)
		.setVersion("0.1.0")
		.addBasicAuth()
		.build();
	const doc = SwaggerModule.createDocument(app, config);
	SwaggerModule.setup("api/v1/docs", app, doc, {
		swaggerOptions: {
			tagsSorter: "alpha",
			operationsSorter: "alpha",
		},
	});

	const port = parseInt(process.env.PORT ?? "3000", 10);
	await app.listen(port, "0.0.0.0");
	Logger.log(`API listening on http://0.0.0.0:${port}`, "Bootstrap");
}

bootstrap().catch((e: unknown) => {
	Logger.error(
		"Failed to start",
		e instanceof Error ? e.stack : String(e),
		"Bootstrap",
	);
	process.exit(1);
});
