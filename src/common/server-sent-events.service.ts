import { Injectable } from "@nestjs/common";
import { OnEvent } from "@nestjs/event-emitter";
import { filter, Observable, Subject } from "rxjs";
import {
	MESSAGE_SENT_ID,
	SLOT_ASSIGNED_ID,
	SLOT_RELEASED_ID,
	type MessageSent,
	type SlotAssigned,
	type SlotReleased,
} from "./room.event";
import {
	EVIDENCE_REJECTED_ID,
	EVIDENCE_SUBMITTED_ID,
	EVIDENCE_VERIFIED_ID,
	FUNDS_RELEASED_ID,
	TRANSACTION_UPDATED_ID,
	type EvidenceRejected,
	type EvidenceSubmitted,
	type EvidenceVerified,
	type FundsReleased,
	type TransactionUpdated,
} from "./escrow.event";

export type RoomSse = {
	type:
		| "slot_assigned"
		| "slot_released"
		| "message_sent"
		| "evidence_submitted"
		| "evidence_processed"
		| "transaction_updated"
		| "funds_released";
	roomId: string;
	externalId: string;
};

export type SseEvent<T = RoomSse> = {
	data: T;
};

@Injectable()
export class ServerSentEventsService {
	private readonly events$ = new Subject<RoomSse>();

	get adminEvents(): Observable<RoomSse> {
		return this.events$.asObservable();
	}

	roomEvents(roomId?: string): Observable<RoomSse> {
		if (roomId) {
			return this.events$.pipe(filter((e) => e.roomId === roomId));
		}
		return this.events$.asObservable();
	}

	@OnEvent(SLOT_ASSIGNED_ID)
	onSlotAssigned(evt: SlotAssigned) {
		this.events$.next({
			type: "slot_assigned",
			roomId: evt.roomId,
			externalId: evt.occupantId,
		});
	}

	@OnEvent(SLOT_RELEASED_ID)
	onSlotReleased(evt: SlotReleased) {
		this.events$.next({
			type: "slot_released",
			roomId: evt.roomId,
			externalId: evt.occupantId,
		});
	}

	@OnEvent(MESSAGE_SENT_ID)
	onMessageSent(evt: MessageSent) {
		this.events$.next({
			type: "message_sent",
			roomId: evt.roomId,
			externalId: evt.messageId,
		});
	}

	@OnEvent(EVIDENCE_SUBMITTED_ID)
	onEvidenceSubmitted(evt: EvidenceSubmitted) {
		this.events$.next({
			type: "evidence_submitted",
			roomId: evt.roomId,
			externalId: evt.evidenceId,
		});
	}

	@OnEvent(EVIDENCE_VERIFIED_ID)
	onEvidenceVerified(evt: EvidenceVerified) {
		this.events$.next({
			type: "evidence_processed",
			roomId: evt.roomId,
			externalId: evt.evidenceId,
		});
	}

	@OnEvent(EVIDENCE_REJECTED_ID)
	onEvidenceRejected(evt: EvidenceRejected) {
		this.events$.next({
			type: "evidence_processed",
			roomId: evt.roomId,
			externalId: evt.evidenceId,
		});
	}

	@OnEvent(TRANSACTION_UPDATED_ID)
	onTransactionUpdated(evt: TransactionUpdated) {
		this.events$.next({
			type: "transaction_updated",
			roomId: evt.roomId,
			externalId: evt.transactionId,
		});
	}

	@OnEvent(FUNDS_RELEASED_ID)
	onFundsReleased(evt: FundsReleased) {
		this.events$.next({
			type: "funds_released",
			roomId: evt.roomId,
			externalId: evt.transactionId,
		});
	}
}
