import { ApiProperty, ApiPropertyOptional } from "@nestjs/swagger";
import { SLOT_ROLE, SlotRole } from "../../common/room.event";
import { RoomOccupant } from "../room-occupant.entity";

export class OccupantDto {
	@ApiProperty({ example: "k2m9x7q1v4b8n3c5" })
	externalId!: string;

	@ApiProperty({ example: "q3f7p9n4z81k6c0b", description: "The Room ID" })
	roomId!: string;

	@ApiProperty({ enum: SLOT_ROLE })
	role!: SlotRole;

	@ApiProperty({ example: "Alice" })
	name!: string;

	@ApiPropertyOptional({
		description: "Only shown to the arbiter",
		example: "+62 812 0000 0000",
	})
	contact?: string;

	@ApiProperty()
	isOnline!: boolean;

	@ApiProperty({ description: "Unix epoch in milliseconds" })
	joinedAt!: number;

	@ApiProperty({ description: "Unix epoch in milliseconds" })
	lastSeenAt!: number;
}

export function toOccupantDto(
	occupant: RoomOccupant,
	withContact = false,
): OccupantDto {
	return {
		externalId: occupant.externalId,
		roomId: occupant.roomId,
		role: occupant.role,
		name: occupant.name,
		contact: withContact ? occupant.contact : undefined,
		isOnline: occupant.isOnline,
		joinedAt: occupant.joinedAt.getTime(),
		lastSeenAt: occupant.lastSeenAt.getTime(),
	};
}
