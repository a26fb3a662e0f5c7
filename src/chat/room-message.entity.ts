import {
	Column,
	CreateDateColumn,
	Entity,
	Index,
	PrimaryGeneratedColumn,
	Unique,
} from "typeorm";
import type { ActorRole } from "../audit/room-activity-log.entity";

export const MESSAGE_TYPE = ["text", "system"] as const;
export type MessageType = (typeof MESSAGE_TYPE)[number];

@Entity("room_messages")
@Unique("uq_room_messages_external_id", ["externalId"])
export class RoomMessage {
	@PrimaryGeneratedColumn()
	id!: number;

	@Column({ type: "text" })
	externalId!: string;

	@Index()
	@Column({ type: "text" })
	roomId!: string;

	@Column({ type: "text" })
	senderRole!: ActorRole;

	@Column({ type: "text" })
	senderName!: string;

	@Column({ type: "text" })
	message!: string;

	@Column({ type: "text", default: "text" })
	type!: MessageType;

	@CreateDateColumn()
	createdAt!: Date;
}
