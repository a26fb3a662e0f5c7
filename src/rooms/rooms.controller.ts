import {
	Body,
	Controller,
	DefaultValuePipe,
	Get,
	HttpCode,
	HttpStatus,
	NotFoundException,
	Param,
	ParseIntPipe,
	ParseEnumPipe,
	Post,
	Query,
	Sse,
	UseGuards,
} from "@nestjs/common";
import {
	ApiBody,
	ApiConflictResponse,
	ApiCreatedResponse,
	ApiHeader,
	ApiNotFoundResponse,
	ApiOkResponse,
	ApiOperation,
	ApiParam,
	ApiQuery,
	ApiTags,
	ApiUnauthorizedResponse,
} from "@nestjs/swagger";
import { map, Observable } from "rxjs";
import { RoomsService } from "./rooms.service";
import { RoomOccupancyService } from "./room-occupancy.service";
import { RoomSessionGuard, ROOM_SESSION_HEADER } from "./room-session.guard";
import { Occupant } from "./occupant.decorator";
import { RoomOccupant } from "./room-occupant.entity";
import { GetRoomDto } from "./dto/get-room.dto";
import { JoinRoomInDto, JoinRoomOutDto } from "./dto/join-room.dto";
import { OccupantDto, toOccupantDto } from "./dto/occupant.dto";
import { AvailabilityDto, LeaveRoomOutDto } from "./dto/availability.dto";
import {
	ApiEnvelope,
	ApiPaginatedEnvelope,
	Cursor,
	envelope,
	getSchemaPathForDto,
	getSchemaPathForPaginatedDto,
	paginatedEnvelope,
} from "../common/dto/envelopes";
import { ParseCursorPipe } from "../common/pipes/cursor.pipe";
import { unwrap } from "../common/outcome-http";
import {
	ServerSentEventsService,
	SseEvent,
} from "../common/server-sent-events.service";
import { SlotRole } from "../common/room.event";

enum RoleParam {
	buyer = "buyer",
	seller = "seller",
}

const SESSION_HEADER_DOC = {
	name: ROOM_SESSION_HEADER,
	description: "Session token issued when joining the room",
	required: true,
};

@ApiTags("1 - Rooms")
@Controller("api/v1/rooms")
export class RoomsController {
	constructor(
		private readonly rooms: RoomsService,
		private readonly occupancy: RoomOccupancyService,
		private readonly sseService: ServerSentEventsService,
	) {}

	@Get("")
	@ApiOperation({ summary: "List rooms with their slot availability" })
	@ApiQuery({
		name: "limit",
		required: false,
		description: "Max items to return (1–100)",
		schema: { type: "integer", minimum: 1, maximum: 100, example: 20 },
	})
	@ApiQuery({
		name: "cursor",
		required: false,
		description: "Opaque cursor from previous page",
		schema: { type: "string" },
	})
	@ApiOkResponse({
		description: "A page of rooms",
		schema: getSchemaPathForPaginatedDto(GetRoomDto),
	})
	async list(
		@Query("limit", new DefaultValuePipe(20), ParseIntPipe) limit: number,
		@Query("cursor", ParseCursorPipe) cursor: Cursor,
	): Promise<ApiPaginatedEnvelope<GetRoomDto[]>> {
		const { items, nextCursor, total } = await this.rooms.list(limit, cursor);
		return paginatedEnvelope(items, { total, nextCursor });
	}

	@Get(":roomId")
	@ApiOperation({ summary: "Room status, occupants and availability" })
	@ApiParam({ name: "roomId", description: "Room external id" })
	@ApiOkResponse({ schema: getSchemaPathForDto(GetRoomDto) })
	@ApiNotFoundResponse({ description: "Room not found" })
	async details(
		@Param("roomId") roomId: string,
	): Promise<ApiEnvelope<GetRoomDto>> {
		const room = await this.rooms.details(roomId);
		if (!room) throw new NotFoundException("Room not found");
		return envelope(room);
	}

	@Get(":roomId/availability")
	@ApiOperation({ summary: "Whether a role can currently be joined" })
	@ApiQuery({ name: "role", enum: RoleParam })
	@ApiOkResponse({ schema: getSchemaPathForDto(AvailabilityDto) })
	async availability(
		@Param("roomId") roomId: string,
		@Query("role", new ParseEnumPipe(RoleParam)) role: SlotRole,
	): Promise<ApiEnvelope<AvailabilityDto>> {
		const available = await this.occupancy.isAvailable(roomId, role);
		return envelope({ role, available });
	}

	@Post(":roomId/join")
	@ApiOperation({ summary: "Take the buyer or seller slot of a room" })
	@ApiBody({ type: JoinRoomInDto })
	@ApiCreatedResponse({
		description: "The slot was assigned; keep the session token",
		schema: getSchemaPathForDto(JoinRoomOutDto),
	})
	@ApiConflictResponse({ description: "Slot taken or caller already seated" })
	async join(
		@Param("roomId") roomId: string,
		@Body() dto: JoinRoomInDto,
	): Promise<ApiEnvelope<JoinRoomOutDto>> {
		const occupant = unwrap(
			await this.occupancy.join(roomId, dto.role, {
				name: dto.name.trim(),
				contact: dto.contact.trim(),
				sessionToken: dto.sessionToken,
			}),
		);
		return envelope({
			occupant: toOccupantDto(occupant),
			sessionToken: occupant.sessionToken,
		});
	}

	@Post(":roomId/leave")
	@UseGuards(RoomSessionGuard)
	@HttpCode(HttpStatus.OK)
	@ApiHeader(SESSION_HEADER_DOC)
	@ApiOperation({ summary: "Give up the caller's slot" })
	@ApiOkResponse({ schema: getSchemaPathForDto(LeaveRoomOutDto) })
	@ApiUnauthorizedResponse({ description: "Missing/invalid room session" })
	async leave(
		@Param("roomId") roomId: string,
		@Occupant() occupant: RoomOccupant,
	): Promise<ApiEnvelope<LeaveRoomOutDto>> {
		return envelope(
			unwrap(await this.occupancy.leave(roomId, occupant.externalId)),
		);
	}

	@Post(":roomId/heartbeat")
	@UseGuards(RoomSessionGuard)
	@HttpCode(HttpStatus.OK)
	@ApiHeader(SESSION_HEADER_DOC)
	@ApiOperation({ summary: "Keep the caller's session online" })
	@ApiOkResponse({ schema: getSchemaPathForDto(OccupantDto) })
	@ApiUnauthorizedResponse({ description: "Missing/invalid room session" })
	heartbeat(@Occupant() occupant: RoomOccupant): ApiEnvelope<OccupantDto> {
		return envelope(toOccupantDto(occupant, true));
	}

	@Sse(":roomId/events")
	@ApiOperation({ summary: "Live updates for one room" })
	events(@Param("roomId") roomId: string): Observable<SseEvent> {
		return this.sseService.roomEvents(roomId).pipe(
			map((event) => ({
				data: event,
			})),
		);
	}
}
