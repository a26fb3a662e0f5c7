import { ApiPropertyOptional, ApiProperty } from "@nestjs/swagger";
import {
	IsInt,
	IsNotEmpty,
	IsOptional,
	IsString,
	Max,
	MaxLength,
	Min,
} from "class-validator";

export class ProvisionRoomInDto {
	@ApiPropertyOptional({
		description: "Display number; defaults to the next free number",
		example: 101,
	})
	@IsOptional()
	@IsInt()
	@Min(1)
	roomNumber?: number;
}

export class ExtendRoomInDto {
	@ApiPropertyOptional({
		description: "Hours to add; defaults to ROOM_EXTENSION_HOURS",
		example: 24,
	})
	@IsOptional()
	@IsInt()
	@Min(1)
	@Max(24 * 30)
	hours?: number;
}

export class ResetRoomInDto {
	@ApiProperty({ description: "Why the room is reset", example: "Abandoned" })
	@IsString()
	@IsNotEmpty()
	@MaxLength(500)
	reason!: string;
}
