import { ApiProperty } from "@nestjs/swagger";
import {
	ACTOR_ROLE,
	ActorRole,
	AUDIT_ACTION,
	AuditAction,
} from "../room-activity-log.entity";

export class GetActivityLogDto {
	@ApiProperty({ example: "q3f7p9n4z81k6c0b", description: "The Room ID" })
	roomId!: string;

	@ApiProperty({ description: "Position in the room's log, starting at 1" })
	sequence!: number;

	@ApiProperty({ enum: AUDIT_ACTION })
	action!: AuditAction;

	@ApiProperty({ example: "Alice" })
	actorName!: string;

	@ApiProperty({ enum: ACTOR_ROLE })
	actorRole!: ActorRole;

	@ApiProperty({ example: "Alice joined as buyer" })
	description!: string;

	@ApiProperty({ description: "Unix epoch in milliseconds" })
	recordedAt!: number;
}
