import { Module } from "@nestjs/common";
import { TypeOrmModule } from "@nestjs/typeorm";
import { RoomMessage } from "./room-message.entity";
import { RoomMessagesService } from "./room-messages.service";
import { ChatController } from "./chat.controller";
import { AuditModule } from "../audit/audit.module";
import { RoomsModule } from "../rooms/rooms.module";

@Module({
	imports: [TypeOrmModule.forFeature([RoomMessage]), AuditModule, RoomsModule],
	controllers: [ChatController],
	providers: [RoomMessagesService],
	exports: [RoomMessagesService],
})
export class ChatModule {}
