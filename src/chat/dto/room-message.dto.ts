import { ApiProperty } from "@nestjs/swagger";
import { IsNotEmpty, IsString, MaxLength } from "class-validator";
import { ACTOR_ROLE, ActorRole } from "../../audit/room-activity-log.entity";
import { MESSAGE_TYPE, MessageType, RoomMessage } from "../room-message.entity";

export class SendMessageInDto {
	@ApiProperty({ example: "Parcel goes out tomorrow morning" })
	@IsString()
	@IsNotEmpty()
	@MaxLength(1000)
	message!: string;
}

export class RoomMessageDto {
	@ApiProperty({ example: "m4x8k2p0q7w1z5c3" })
	externalId!: string;

	@ApiProperty({ example: "q3f7p9n4z81k6c0b", description: "The Room ID" })
	roomId!: string;

	@ApiProperty({ enum: ACTOR_ROLE })
	senderRole!: ActorRole;

	@ApiProperty({ example: "Alice" })
	senderName!: string;

	@ApiProperty()
	message!: string;

	@ApiProperty({ enum: MESSAGE_TYPE })
	type!: MessageType;

	@ApiProperty({ description: "Unix epoch in milliseconds" })
	sentAt!: number;
}

export function toRoomMessageDto(row: RoomMessage): RoomMessageDto {
	return {
		externalId: row.externalId,
		roomId: row.roomId,
		senderRole: row.senderRole,
		senderName: row.senderName,
		message: row.message,
		type: row.type,
		sentAt: row.createdAt.getTime(),
	};
}
