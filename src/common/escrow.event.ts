import type { RoomId } from "./room.event";

export type TransactionId = string;

export const EVIDENCE_SUBMITTED_ID = "evidence.submitted";
export type EvidenceSubmitted = {
	eventId: string;
	roomId: RoomId;
	transactionId: TransactionId;
	evidenceId: string;
	fileType: string;
	submittedAt: string; // ISO timestamp
};

export const EVIDENCE_VERIFIED_ID = "evidence.verified";
export type EvidenceVerified = {
	eventId: string;
	roomId: RoomId;
	transactionId: TransactionId;
	evidenceId: string;
	fileType: string;
	verifiedBy: string;
	verifiedAt: string; // ISO timestamp
};

export const EVIDENCE_REJECTED_ID = "evidence.rejected";
export type EvidenceRejected = {
	eventId: string;
	roomId: RoomId;
	transactionId: TransactionId;
	evidenceId: string;
	fileType: string;
	reason: string;
	rejectedAt: string; // ISO timestamp
};

export const FUNDS_RELEASED_ID = "funds.released";
export type FundsReleased = {
	eventId: string;
	roomId: RoomId;
	transactionId: TransactionId;
	releasedBy: string;
	releasedAt: string; // ISO timestamp
};

export const TRANSACTION_UPDATED_ID = "transaction.updated";
export type TransactionUpdated = {
	eventId: string;
	roomId: RoomId;
	transactionId: TransactionId;
	status: string;
	updatedAt: string; // ISO timestamp
};
