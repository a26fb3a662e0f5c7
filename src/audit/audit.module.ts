import { Module } from "@nestjs/common";
import { TypeOrmModule } from "@nestjs/typeorm";
import { RoomActivityLog } from "./room-activity-log.entity";
import { AuditService } from "./audit.service";

@Module({
	imports: [TypeOrmModule.forFeature([RoomActivityLog])],
	providers: [AuditService],
	exports: [AuditService],
})
export class AuditModule {}
