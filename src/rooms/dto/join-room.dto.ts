import { ApiProperty, ApiPropertyOptional } from "@nestjs/swagger";
import {
	IsIn,
	IsNotEmpty,
	IsOptional,
	IsString,
	Length,
	MaxLength,
} from "class-validator";
import { SLOT_ROLE, SlotRole } from "../../common/room.event";
import { OccupantDto } from "./occupant.dto";

export class JoinRoomInDto {
	@ApiProperty({ enum: SLOT_ROLE, example: "buyer" })
	@IsIn(SLOT_ROLE)
	role!: SlotRole;

	@ApiProperty({ example: "Alice", maxLength: 255 })
	@IsString()
	@IsNotEmpty()
	@MaxLength(255)
	name!: string;

	@ApiProperty({
		description: "Phone number or other contact",
		example: "+62 812 0000 0000",
		maxLength: 20,
	})
	@IsString()
	@IsNotEmpty()
	@MaxLength(20)
	contact!: string;

	@ApiPropertyOptional({
		description:
			"Session token already held by the caller, if any. Used to refuse a second slot.",
	})
	@IsOptional()
	@IsString()
	@Length(32, 32)
	sessionToken?: string;
}

export class JoinRoomOutDto {
	@ApiProperty({ type: () => OccupantDto })
	occupant!: OccupantDto;

	@ApiProperty({
		description: "Send as X-Room-Session on participant requests",
	})
	sessionToken!: string;
}
