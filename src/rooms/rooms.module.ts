import { Module } from "@nestjs/common";
import { TypeOrmModule } from "@nestjs/typeorm";
import { Room } from "./room.entity";
import { RoomOccupant } from "./room-occupant.entity";
import { RoomsService } from "./rooms.service";
import { RoomOccupancyService } from "./room-occupancy.service";
import { SessionSweeper } from "./session-sweeper.service";
import { RoomSessionGuard } from "./room-session.guard";
import { RoomsController } from "./rooms.controller";
import { AuditModule } from "../audit/audit.module";
import { EscrowTransaction } from "../escrows/transactions/escrow-transaction.entity";

@Module({
	imports: [
		TypeOrmModule.forFeature([Room, RoomOccupant, EscrowTransaction]),
		AuditModule,
	],
	controllers: [RoomsController],
	providers: [
		RoomsService,
		RoomOccupancyService,
		SessionSweeper,
		RoomSessionGuard,
	],
	exports: [RoomsService, RoomOccupancyService, RoomSessionGuard],
})
export class RoomsModule {}
