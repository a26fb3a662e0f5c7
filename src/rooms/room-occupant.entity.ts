import {
	Column,
	Entity,
	Index,
	PrimaryGeneratedColumn,
	Unique,
} from "typeorm";
import type { SlotRole } from "../common/room.event";

@Entity("room_occupants")
@Unique("uq_room_occupants_external_id", ["externalId"])
// one buyer and one seller per room, enforced by storage
@Unique("uq_room_occupants_room_role", ["roomId", "role"])
@Unique("uq_room_occupants_session_token", ["sessionToken"])
export class RoomOccupant {
	@PrimaryGeneratedColumn()
	id!: number;

	@Column({ type: "text" })
	externalId!: string;

	@Index()
	@Column({ type: "text" })
	roomId!: string;

	@Column({ type: "text" })
	role!: SlotRole;

	@Column({ type: "text" })
	name!: string;

	@Column({ type: "text" })
	contact!: string;

	@Column({ type: "text" })
	sessionToken!: string;

	@Column({ type: "boolean", default: true })
	isOnline!: boolean;

	@Column({ type: "datetime" })
	joinedAt!: Date;

	@Index()
	@Column({ type: "datetime" })
	lastSeenAt!: Date;
}
