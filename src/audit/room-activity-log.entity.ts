import {
	Column,
	CreateDateColumn,
	Entity,
	Index,
	PrimaryGeneratedColumn,
	Unique,
} from "typeorm";

export const AUDIT_ACTION = [
	"room_provisioned",
	"room_extended",
	"room_reset",
	"joined_room",
	"left_room",
	"session_evicted",
	"transaction_opened",
	"terms_updated",
	"notes_updated",
	"evidence_submitted",
	"payment_verified",
	"payment_rejected",
	"shipping_verified",
	"shipping_rejected",
	"identity_verified",
	"identity_rejected",
	"goods_received",
	"funds_released",
	"transaction_cancelled",
	"transaction_disputed",
	"dispute_raised",
	"evidence_withdrawn",
	"gm_message_sent",
] as const;
export type AuditAction = (typeof AUDIT_ACTION)[number];

export const ACTOR_ROLE = ["buyer", "seller", "gm", "system"] as const;
export type ActorRole = (typeof ACTOR_ROLE)[number];

/** Append-only; rows are never updated or deleted. */
@Entity("room_activity_logs")
@Unique("uq_room_activity_logs_room_sequence", ["roomId", "sequence"])
export class RoomActivityLog {
	@PrimaryGeneratedColumn()
	id!: number;

	@Index()
	@Column({ type: "text" })
	roomId!: string;

	@Column({ type: "integer" })
	sequence!: number;

	@Column({ type: "text" })
	action!: AuditAction;

	@Column({ type: "text" })
	actorName!: string;

	@Column({ type: "text" })
	actorRole!: ActorRole;

	@Column({ type: "text" })
	description!: string;

	@CreateDateColumn()
	recordedAt!: Date;
}
