import { Module } from "@nestjs/common";
import { ConfigModule } from "@nestjs/config";
import { TypeOrmModule } from "@nestjs/typeorm";
import { EventEmitterModule } from "@nestjs/event-emitter";

import { CommonModule } from "./common/common.module";
import { AuthModule } from "./auth/auth.module";
import { AuditModule } from "./audit/audit.module";
import { RoomsModule } from "./rooms/rooms.module";
import { EscrowsModule } from "./escrows/escrows.module";
import { ChatModule } from "./chat/chat.module";
import { AdminModule } from "./admin/api/admin.module";
import { HealthController } from "./health.controller";

const isTest = process.env.NODE_ENV === "test";

@Module({
	imports: [
		EventEmitterModule.forRoot(),
		ConfigModule.forRoot({ isGlobal: true }),
		TypeOrmModule.forRootAsync({
			useFactory: () => ({
				type: "better-sqlite3",
				database: isTest
					? ":memory:"
					: (process.env.SQLITE_DB_PATH ?? "escrow-rooms.sqlite"),
				synchronize: true,
				autoLoadEntities: true,
			}),
		}),
		CommonModule,
		AuthModule,
		AuditModule,
		RoomsModule,
		EscrowsModule,
		ChatModule,
		AdminModule,
	],
	controllers: [HealthController],
})
export class AppModule {}
