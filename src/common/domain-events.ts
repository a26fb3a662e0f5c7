import {
	EVIDENCE_REJECTED_ID,
	EVIDENCE_SUBMITTED_ID,
	EVIDENCE_VERIFIED_ID,
	EvidenceRejected,
	EvidenceSubmitted,
	EvidenceVerified,
	FUNDS_RELEASED_ID,
	FundsReleased,
	TRANSACTION_UPDATED_ID,
	TransactionUpdated,
} from "./escrow.event";
import {
	MESSAGE_SENT_ID,
	MessageSent,
	SLOT_ASSIGNED_ID,
	SLOT_RELEASED_ID,
	SlotAssigned,
	SlotReleased,
} from "./room.event";

export type DomainEvents = {
	[SLOT_ASSIGNED_ID]: SlotAssigned;
	[SLOT_RELEASED_ID]: SlotReleased;
	[MESSAGE_SENT_ID]: MessageSent;
	[EVIDENCE_SUBMITTED_ID]: EvidenceSubmitted;
	[EVIDENCE_VERIFIED_ID]: EvidenceVerified;
	[EVIDENCE_REJECTED_ID]: EvidenceRejected;
	[FUNDS_RELEASED_ID]: FundsReleased;
	[TRANSACTION_UPDATED_ID]: TransactionUpdated;
};

export type DomainEventId = keyof DomainEvents;
