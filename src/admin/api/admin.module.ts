import { Module } from "@nestjs/common";
import { AdminController } from "./admin.controller";
import { RoomsModule } from "../../rooms/rooms.module";
import { EscrowsModule } from "../../escrows/escrows.module";
import { AuditModule } from "../../audit/audit.module";
import { ChatModule } from "../../chat/chat.module";

@Module({
	imports: [RoomsModule, EscrowsModule, AuditModule, ChatModule],
	controllers: [AdminController],
})
export class AdminModule {}
