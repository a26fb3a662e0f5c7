import {
	Body,
	Controller,
	DefaultValuePipe,
	Get,
	Param,
	ParseIntPipe,
	Post,
	Query,
	UseGuards,
} from "@nestjs/common";
import {
	ApiBody,
	ApiCreatedResponse,
	ApiHeader,
	ApiOkResponse,
	ApiOperation,
	ApiQuery,
	ApiTags,
	ApiUnauthorizedResponse,
} from "@nestjs/swagger";
import { RoomMessagesService } from "./room-messages.service";
import {
	RoomMessageDto,
	SendMessageInDto,
	toRoomMessageDto,
} from "./dto/room-message.dto";
import {
	RoomSessionGuard,
	ROOM_SESSION_HEADER,
} from "../rooms/room-session.guard";
import { Occupant } from "../rooms/occupant.decorator";
import { RoomOccupant } from "../rooms/room-occupant.entity";
import {
	ApiEnvelope,
	envelope,
	getSchemaPathForDto,
} from "../common/dto/envelopes";
import { unwrap } from "../common/outcome-http";

@ApiTags("3 - Chat")
@ApiHeader({
	name: ROOM_SESSION_HEADER,
	description: "Session token issued when joining the room",
	required: true,
})
@ApiUnauthorizedResponse({ description: "Missing/invalid room session" })
@UseGuards(RoomSessionGuard)
@Controller("api/v1/rooms/:roomId/messages")
export class ChatController {
	constructor(private readonly messages: RoomMessagesService) {}

	@Get("")
	@ApiOperation({ summary: "Latest messages of the room, oldest first" })
	@ApiQuery({ name: "limit", required: false, schema: { type: "integer" } })
	@ApiOkResponse({ type: RoomMessageDto, isArray: true })
	async list(
		@Param("roomId") roomId: string,
		@Query("limit", new DefaultValuePipe(100), ParseIntPipe) limit: number,
	): Promise<ApiEnvelope<RoomMessageDto[]>> {
		return envelope(await this.messages.list(roomId, limit));
	}

	@Post("")
	@ApiOperation({ summary: "Send a chat message to the room" })
	@ApiBody({ type: SendMessageInDto })
	@ApiCreatedResponse({ schema: getSchemaPathForDto(RoomMessageDto) })
	async send(
		@Param("roomId") roomId: string,
		@Occupant() occupant: RoomOccupant,
		@Body() dto: SendMessageInDto,
	): Promise<ApiEnvelope<RoomMessageDto>> {
		return envelope(
			toRoomMessageDto(
				unwrap(await this.messages.send(roomId, occupant, dto.message)),
			),
		);
	}
}
