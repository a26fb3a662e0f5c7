import {
	Column,
	CreateDateColumn,
	Entity,
	Index,
	PrimaryGeneratedColumn,
	Unique,
	UpdateDateColumn,
} from "typeorm";

export const TRANSACTION_STATUS = [
	"pending_payment",
	"awaiting_payment_verification",
	"payment_rejected",
	"paid",
	"awaiting_shipping_verification",
	"shipping_rejected",
	"shipped",
	"goods_received",
	"delivered",
	"completed",
	"cancelled",
	"disputed",
] as const;
export type TransactionStatus = (typeof TRANSACTION_STATUS)[number];

export const TERMINAL_STATUS = [
	"completed",
	"cancelled",
	"disputed",
] as const satisfies readonly TransactionStatus[];

@Entity("escrow_transactions")
@Unique("uq_escrow_transactions_external_id", ["externalId"])
@Unique("uq_escrow_transactions_number", ["transactionNumber"])
// at most one transaction per room that is not terminal
@Index("uq_escrow_transactions_active_room", ["roomId"], {
	unique: true,
	where: "status NOT IN ('completed', 'cancelled', 'disputed')",
})
export class EscrowTransaction {
	@PrimaryGeneratedColumn()
	id!: number;

	@Column({ type: "text" })
	externalId!: string;

	@Column({ type: "text" })
	transactionNumber!: string;

	@Column({ type: "text" })
	roomId!: string;

	@Column({ type: "text" })
	buyerId!: string;

	@Column({ type: "text", nullable: true })
	sellerId?: string | null;

	// Amounts are integer minor units of `currency`.
	@Column({ type: "integer", default: 0 })
	amount!: number;

	@Column({ type: "integer", default: 0 })
	commission!: number;

	@Column({ type: "integer", default: 0 })
	fee!: number;

	@Column({ type: "integer", default: 0 })
	totalAmount!: number;

	@Column({ type: "text" })
	currency!: string;

	@Index()
	@Column({ type: "text" })
	status!: TransactionStatus;

	@Column({ type: "text", nullable: true })
	paymentRejectionReason?: string | null;

	@Column({ type: "text", nullable: true })
	shippingRejectionReason?: string | null;

	@Column({ type: "text", nullable: true })
	gmNotes?: string | null;

	@Column({ type: "text", nullable: true })
	buyerNotes?: string | null;

	@Column({ type: "text", nullable: true })
	closingReason?: string | null;

	@Column({ type: "text", nullable: true })
	paymentVerifiedBy?: string | null;

	@Column({ type: "datetime", nullable: true })
	paymentVerifiedAt?: Date | null;

	@Column({ type: "text", nullable: true })
	shippingVerifiedBy?: string | null;

	@Column({ type: "datetime", nullable: true })
	shippingVerifiedAt?: Date | null;

	@Column({ type: "text", nullable: true })
	fundsReleasedBy?: string | null;

	@Column({ type: "datetime", nullable: true })
	fundsReleasedAt?: Date | null;

	@Column({ type: "datetime", nullable: true })
	receivedAt?: Date | null;

	@Column({ type: "datetime", nullable: true })
	completedAt?: Date | null;

	@Column({ type: "datetime", nullable: true })
	cancelledAt?: Date | null;

	@Column({ type: "datetime", nullable: true })
	disputedAt?: Date | null;

	@CreateDateColumn()
	createdAt!: Date;

	@UpdateDateColumn()
	updatedAt!: Date;
}
