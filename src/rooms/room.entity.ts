import {
	Column,
	CreateDateColumn,
	Entity,
	PrimaryGeneratedColumn,
	Unique,
	UpdateDateColumn,
} from "typeorm";

export const ROOM_STATUS = ["free", "in_use"] as const;
export type RoomStatus = (typeof ROOM_STATUS)[number];

@Entity("rooms")
@Unique("uq_rooms_external_id", ["externalId"])
@Unique("uq_rooms_room_number", ["roomNumber"])
export class Room {
	@PrimaryGeneratedColumn()
	id!: number;

	@Column({ type: "text" })
	externalId!: string;

	@Column({ type: "integer" })
	roomNumber!: number;

	// free iff no slot is occupied
	@Column({ type: "text", default: "free" })
	status!: RoomStatus;

	@Column({ type: "datetime" })
	expiresAt!: Date;

	@CreateDateColumn()
	createdAt!: Date;

	@UpdateDateColumn()
	updatedAt!: Date;
}
