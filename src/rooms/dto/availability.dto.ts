import { ApiProperty } from "@nestjs/swagger";
import { SLOT_ROLE, SlotRole } from "../../common/room.event";

export class AvailabilityDto {
	@ApiProperty({ enum: SLOT_ROLE })
	role!: SlotRole;

	@ApiProperty()
	available!: boolean;
}

export class LeaveRoomOutDto {
	@ApiProperty({ example: "q3f7p9n4z81k6c0b" })
	roomId!: string;

	@ApiProperty({ example: "k2m9x7q1v4b8n3c5" })
	occupantId!: string;

	@ApiProperty({ enum: SLOT_ROLE })
	role!: SlotRole;

	@ApiProperty({ enum: ["free", "in_use"] })
	roomStatus!: "free" | "in_use";
}
