import {
	ArgumentsHost,
	Catch,
	ExceptionFilter,
	HttpException,
	HttpStatus,
	Logger,
} from "@nestjs/common";
import type { Request, Response } from "express";
import { toError } from "../errors";

type ErrorBody = {
	statusCode: number;
	message: string | string[];
	kind?: string;
	error?: string;
	path: string;
	timestamp: string;
};

/**
 * Gives every error response the same shape. Outcome failures carry their
 * `kind`, validation errors keep Nest's message list.
 */
@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
	private readonly logger = new Logger(HttpExceptionFilter.name);

	catch(exception: unknown, host: ArgumentsHost) {
		const ctx = host.switchToHttp();
		const res = ctx.getResponse<Response>();
		const req = ctx.getRequest<Request>();

		const body: ErrorBody = {
			statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
			message: "Internal server error",
			path: req.url,
			timestamp: new Date().toISOString(),
		};

		if (exception instanceof HttpException) {
			body.statusCode = exception.getStatus();
			const response = exception.getResponse();
			if (typeof response === "string") {
				body.message = response;
			} else {
				if ("message" in response) {
					const message = response.message;
					if (typeof message === "string" || Array.isArray(message)) {
						body.message = message;
					}
				}
				if ("kind" in response && typeof response.kind === "string") {
					body.kind = response.kind;
				}
				if ("error" in response && typeof response.error === "string") {
					body.error = response.error;
				}
			}
		} else {
			const error = toError(exception);
			this.logger.error(
				`Unhandled error on ${req.method} ${req.url}: ${error.message}`,
				error.stack,
			);
		}

		res.status(body.statusCode).json(body);
	}
}
