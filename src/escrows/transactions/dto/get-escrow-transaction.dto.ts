import { ApiProperty, ApiPropertyOptional } from "@nestjs/swagger";
import {
	EscrowTransaction,
	TRANSACTION_STATUS,
	TransactionStatus,
} from "../escrow-transaction.entity";
import {
	allowedActions,
	currentAction,
	progressPercentage,
	TRANSACTION_ACTION,
	TransactionAction,
} from "../transaction-lifecycle";

export class GetEscrowTransactionDto {
	@ApiProperty({ example: "t8c2v6n1m4x9z7q3" })
	externalId!: string;

	@ApiProperty({ example: "TRX-20250101-7H2K9QXA" })
	transactionNumber!: string;

	@ApiProperty({ example: "q3f7p9n4z81k6c0b", description: "The Room ID" })
	roomId!: string;

	@ApiProperty({ description: "Occupant id of the buyer" })
	buyerId!: string;

	@ApiPropertyOptional({ description: "Occupant id of the seller" })
	sellerId?: string;

	@ApiProperty({ description: "Minor units", example: 150000 })
	amount!: number;

	@ApiProperty({ description: "Minor units", example: 1500 })
	commission!: number;

	@ApiProperty({ description: "Minor units", example: 500 })
	fee!: number;

	@ApiProperty({ description: "amount + commission + fee", example: 152000 })
	totalAmount!: number;

	@ApiProperty({ example: "IDR" })
	currency!: string;

	@ApiProperty({ enum: TRANSACTION_STATUS })
	status!: TransactionStatus;

	@ApiProperty({ minimum: 0, maximum: 100, example: 33 })
	progressPercentage!: number;

	@ApiProperty({ example: "Seller uploads shipping receipt" })
	currentAction!: string;

	@ApiProperty({ enum: TRANSACTION_ACTION, isArray: true })
	allowedActions!: TransactionAction[];

	@ApiPropertyOptional()
	paymentRejectionReason?: string;

	@ApiPropertyOptional()
	shippingRejectionReason?: string;

	@ApiPropertyOptional()
	closingReason?: string;

	@ApiPropertyOptional({ description: "Only shown to the arbiter" })
	gmNotes?: string;

	@ApiPropertyOptional()
	buyerNotes?: string;

	@ApiPropertyOptional()
	paymentVerifiedBy?: string;

	@ApiPropertyOptional({ description: "Unix epoch in milliseconds" })
	paymentVerifiedAt?: number;

	@ApiPropertyOptional()
	shippingVerifiedBy?: string;

	@ApiPropertyOptional({ description: "Unix epoch in milliseconds" })
	shippingVerifiedAt?: number;

	@ApiPropertyOptional()
	fundsReleasedBy?: string;

	@ApiPropertyOptional({ description: "Unix epoch in milliseconds" })
	fundsReleasedAt?: number;

	@ApiPropertyOptional({ description: "Unix epoch in milliseconds" })
	receivedAt?: number;

	@ApiPropertyOptional({ description: "Unix epoch in milliseconds" })
	completedAt?: number;

	@ApiPropertyOptional({ description: "Unix epoch in milliseconds" })
	cancelledAt?: number;

	@ApiPropertyOptional({ description: "Unix epoch in milliseconds" })
	disputedAt?: number;

	@ApiProperty({ description: "Unix epoch in milliseconds" })
	createdAt!: number;

	@ApiProperty({ description: "Unix epoch in milliseconds" })
	updatedAt!: number;
}

const epoch = (date?: Date | null) => (date ? date.getTime() : undefined);
const optional = (value?: string | null) => value ?? undefined;

export function toTransactionDto(
	tx: EscrowTransaction,
	forArbiter = false,
): GetEscrowTransactionDto {
	return {
		externalId: tx.externalId,
		transactionNumber: tx.transactionNumber,
		roomId: tx.roomId,
		buyerId: tx.buyerId,
		sellerId: optional(tx.sellerId),
		amount: tx.amount,
		commission: tx.commission,
		fee: tx.fee,
		totalAmount: tx.totalAmount,
		currency: tx.currency,
		status: tx.status,
		progressPercentage: progressPercentage(tx.status),
		currentAction: currentAction(tx.status),
		allowedActions: allowedActions(tx.status),
		paymentRejectionReason: optional(tx.paymentRejectionReason),
		shippingRejectionReason: optional(tx.shippingRejectionReason),
		closingReason: optional(tx.closingReason),
		gmNotes: forArbiter ? optional(tx.gmNotes) : undefined,
		buyerNotes: optional(tx.buyerNotes),
		paymentVerifiedBy: optional(tx.paymentVerifiedBy),
		paymentVerifiedAt: epoch(tx.paymentVerifiedAt),
		shippingVerifiedBy: optional(tx.shippingVerifiedBy),
		shippingVerifiedAt: epoch(tx.shippingVerifiedAt),
		fundsReleasedBy: optional(tx.fundsReleasedBy),
		fundsReleasedAt: epoch(tx.fundsReleasedAt),
		receivedAt: epoch(tx.receivedAt),
		completedAt: epoch(tx.completedAt),
		cancelledAt: epoch(tx.cancelledAt),
		disputedAt: epoch(tx.disputedAt),
		createdAt: tx.createdAt.getTime(),
		updatedAt: tx.updatedAt.getTime(),
	};
}
