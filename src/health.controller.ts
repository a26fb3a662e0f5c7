import { Controller, Get, ServiceUnavailableException } from "@nestjs/common";
import { ApiTags, ApiOperation, ApiResponse } from "@nestjs/swagger";
import { ConfigService } from "@nestjs/config";
import { DataSource } from "typeorm";

@ApiTags("Health")
@Controller("api/v1/health")
export class HealthController {
	constructor(
		private readonly configService: ConfigService,
		private readonly dataSource: DataSource,
	) {}

	@Get()
	@ApiOperation({ summary: "Health check endpoint" })
	@ApiResponse({
		status: 200,
		description: "Application and database are reachable",
		schema: {
			type: "object",
			properties: {
				status: { type: "string", example: "ok" },
				database: { type: "string", example: "up" },
				timestamp: { type: "string", example: "2025-08-26T10:00:00.000Z" },
				uptime: { type: "number", example: 12345 },
				environment: { type: "string", example: "production" },
			},
		},
	})
	@ApiResponse({ status: 503, description: "Database unreachable" })
	async healthCheck() {
		try {
			await this.dataSource.query("SELECT 1");
		} catch {
			throw new ServiceUnavailableException({
				status: "error",
				database: "down",
			});
		}
		return {
			status: "ok",
			database: "up",
			timestamp: new Date().toISOString(),
			uptime: process.uptime(),
			environment: this.configService.get<string>("NODE_ENV", "development"),
		};
	}
}
