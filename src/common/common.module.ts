import { Global, Module } from "@nestjs/common";
import { RoomUnitOfWork } from "./room-unit-of-work";
import { ServerSentEventsService } from "./server-sent-events.service";

@Global()
@Module({
	providers: [RoomUnitOfWork, ServerSentEventsService],
	exports: [RoomUnitOfWork, ServerSentEventsService],
})
export class CommonModule {}
