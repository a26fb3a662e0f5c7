import { ValidationPipe } from "@nestjs/common";
import type { NestExpressApplication } from "@nestjs/platform-express";
import { HttpExceptionFilter } from "./common/filters/http-exception.filter";

/** Pipes, filters and parsers shared by the server and the e2e tests. */
export function configureApp(app: NestExpressApplication): NestExpressApplication {
	// evidence arrives base64 encoded in JSON bodies
	app.useBodyParser("json", { limit: "12mb" });
	app.useGlobalPipes(
		new ValidationPipe({
			whitelist: true,
			forbidNonWhitelisted: true,
			transform: true,
		}),
	);
	app.useGlobalFilters(new HttpExceptionFilter());
	app.enableCors();
	return app;
}
