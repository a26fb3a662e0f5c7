import { ApiProperty, ApiPropertyOptional } from "@nestjs/swagger";
import { ROOM_STATUS, RoomStatus } from "../room.entity";
import { OccupantDto } from "./occupant.dto";

export class RoomAvailabilityDto {
	@ApiProperty()
	buyer!: boolean;

	@ApiProperty()
	seller!: boolean;
}

export class GetRoomDto {
	@ApiProperty({ example: "q3f7p9n4z81k6c0b", description: "The Room ID" })
	externalId!: string;

	@ApiProperty({ example: 101 })
	roomNumber!: number;

	@ApiProperty({ enum: ROOM_STATUS })
	status!: RoomStatus;

	@ApiProperty({ description: "Unix epoch in milliseconds" })
	expiresAt!: number;

	@ApiProperty()
	isExpired!: boolean;

	@ApiPropertyOptional({ type: () => OccupantDto })
	buyer?: OccupantDto;

	@ApiPropertyOptional({ type: () => OccupantDto })
	seller?: OccupantDto;

	@ApiProperty({ type: () => RoomAvailabilityDto })
	availability!: RoomAvailabilityDto;

	@ApiProperty({ description: "Unix epoch in milliseconds" })
	createdAt!: number;
}
