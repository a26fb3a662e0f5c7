import {
	Column,
	CreateDateColumn,
	Entity,
	Index,
	PrimaryGeneratedColumn,
	Unique,
	UpdateDateColumn,
} from "typeorm";
import type { SlotRole } from "../../common/room.event";

export const EVIDENCE_TYPE = [
	"payment_proof",
	"shipping_receipt",
	"identity_document",
] as const;
export type EvidenceType = (typeof EVIDENCE_TYPE)[number];

export const EVIDENCE_STATUS = ["pending", "verified", "rejected"] as const;
export type EvidenceStatus = (typeof EVIDENCE_STATUS)[number];

@Entity("evidence_files")
@Unique("uq_evidence_files_external_id", ["externalId"])
// single-flight: one pending record per transaction and type
@Index("uq_evidence_files_pending", ["transactionId", "fileType"], {
	unique: true,
	where: "status = 'pending'",
})
export class EvidenceFile {
	@PrimaryGeneratedColumn()
	id!: number;

	@Column({ type: "text" })
	externalId!: string;

	@Index()
	@Column({ type: "text" })
	roomId!: string;

	@Index()
	@Column({ type: "text" })
	transactionId!: string;

	@Column({ type: "text" })
	fileType!: EvidenceType;

	@Column({ type: "text" })
	fileName!: string;

	@Column({ type: "text" })
	blobRef!: string;

	@Column({ type: "integer" })
	fileSize!: number;

	@Column({ type: "text" })
	mimeType!: string;

	@Column({ type: "text" })
	uploadedBy!: string;

	@Column({ type: "text" })
	uploaderRole!: SlotRole;

	@Index()
	@Column({ type: "text", default: "pending" })
	status!: EvidenceStatus;

	@Column({ type: "text", nullable: true })
	verifiedBy?: string | null;

	@Column({ type: "datetime", nullable: true })
	verifiedAt?: Date | null;

	@Column({ type: "text", nullable: true })
	rejectionReason?: string | null;

	@CreateDateColumn()
	createdAt!: Date;

	@UpdateDateColumn()
	updatedAt!: Date;
}
