import { Injectable, Logger } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { InjectRepository } from "@nestjs/typeorm";
import { Brackets, In, Not, Repository } from "typeorm";
import { customAlphabet, nanoid } from "nanoid";

import {
	EscrowTransaction,
	TERMINAL_STATUS,
	TransactionStatus,
} from "./escrow-transaction.entity";
import {
	INITIAL_STATUS,
	isTerminal,
	nextStatus,
	TransactionAction,
} from "./transaction-lifecycle";
import { GetEscrowTransactionDto, toTransactionDto } from "./dto/get-escrow-transaction.dto";
import { AuditService } from "../../audit/audit.service";
import { ActorRole, AuditAction } from "../../audit/room-activity-log.entity";
import { ArbiterIdentity } from "../../auth/arbiter";
import { RoomUnitOfWork, UnitContext } from "../../common/room-unit-of-work";
import { Failed, failure, Outcome, success } from "../../common/outcome";
import {
	Cursor,
	cursorToString,
	emptyCursor,
} from "../../common/dto/envelopes";
import {
	FUNDS_RELEASED_ID,
	FundsReleased,
	TRANSACTION_UPDATED_ID,
	TransactionUpdated,
} from "../../common/escrow.event";
import { RoomOccupant } from "../../rooms/room-occupant.entity";
import { Room } from "../../rooms/room.entity";
import { RoomMessagesService } from "../../chat/room-messages.service";
import { EvidenceFile } from "../evidence/evidence-file.entity";
import { STEP_ROUTES, StepRoute } from "../evidence/evidence-routing";

export type TransactionTerms = {
	amount: number;
	commission?: number;
	fee?: number;
	currency?: string;
};

type Actor = { name: string; role: ActorRole };

type TransitionOptions = {
	actor: Actor;
	audit: { action: AuditAction; description: string };
	patch?: Partial<EscrowTransaction>;
	/** Failure returned when the lifecycle does not allow the action. */
	otherwise: Failed;
};

const transactionSuffix = customAlphabet("0123456789ABCDEFGHJKLMNPQRSTUVWXYZ", 8);

export function newTransactionNumber(now: Date = new Date()): string {
	const day = now.toISOString().slice(0, 10).replace(/-/g, "");
	return `TRX-${day}-${transactionSuffix()}`;
}

const asGm = (arbiter: ArbiterIdentity): Actor => ({
	name: arbiter.name,
	role: "gm",
});

const isBlank = (value: string | undefined) =>
	value === undefined || value.trim() === "";

@Injectable()
export class EscrowTransactionsService {
	private readonly logger = new Logger(EscrowTransactionsService.name);
	private readonly defaultCurrency: string;

	constructor(
		configService: ConfigService,
		@InjectRepository(EscrowTransaction)
		private readonly transactionRepository: Repository<EscrowTransaction>,
		private readonly unit: RoomUnitOfWork,
		private readonly audit: AuditService,
		private readonly messages: RoomMessagesService,
	) {
		this.defaultCurrency =
			configService.get<string>("DEFAULT_CURRENCY") ?? "IDR";
	}

	// ---------------------------------------------------------------------
	// Arbiter and participant operations, each one atomic unit
	// ---------------------------------------------------------------------

	verifyPayment(
		transactionId: string,
		arbiter: ArbiterIdentity,
	): Promise<Outcome<EscrowTransaction>> {
		return this.withTransaction(transactionId, (ctx, tx) =>
			this.verifyIn(ctx, tx, STEP_ROUTES.payment, arbiter),
		);
	}

	rejectPayment(
		transactionId: string,
		arbiter: ArbiterIdentity,
		reason: string,
	): Promise<Outcome<EscrowTransaction>> {
		return this.withTransaction(transactionId, (ctx, tx) =>
			this.rejectIn(ctx, tx, STEP_ROUTES.payment, arbiter, reason),
		);
	}

	verifyShipping(
		transactionId: string,
		arbiter: ArbiterIdentity,
	): Promise<Outcome<EscrowTransaction>> {
		return this.withTransaction(transactionId, (ctx, tx) =>
			this.verifyIn(ctx, tx, STEP_ROUTES.shipping, arbiter),
		);
	}

	rejectShipping(
		transactionId: string,
		arbiter: ArbiterIdentity,
		reason: string,
	): Promise<Outcome<EscrowTransaction>> {
		return this.withTransaction(transactionId, (ctx, tx) =>
			this.rejectIn(ctx, tx, STEP_ROUTES.shipping, arbiter, reason),
		);
	}

	/**
	 * Only the buyer the transaction was opened for, still seated in its
	 * room, and only once shipped.
	 */
	confirmReceipt(
		transactionId: string,
		buyer: RoomOccupant,
		notes?: string,
	): Promise<Outcome<EscrowTransaction>> {
		return this.withTransaction(transactionId, async (ctx, tx) => {
			const seated = await ctx.manager.findOne(RoomOccupant, {
				where: { externalId: buyer.externalId, roomId: tx.roomId },
			});
			if (
				!seated ||
				seated.role !== "buyer" ||
				seated.externalId !== tx.buyerId
			) {
				return failure(
					"NotBuyer",
					"Only the buyer of this transaction can confirm receipt",
				);
			}
			const moved = await this.transition(ctx, tx, "confirm_receipt", {
				actor: { name: seated.name, role: "buyer" },
				audit: {
					action: "goods_received",
					description: `${seated.name} confirmed receipt of the goods`,
				},
				patch: {
					receivedAt: new Date(),
					buyerNotes: isBlank(notes) ? tx.buyerNotes : notes?.trim(),
				},
				otherwise: failure(
					"NotShipped",
					`Receipt can only be confirmed once shipped, transaction is ${tx.status}`,
				),
			});
			if (moved.ok) {
				this.publishUpdated(ctx, moved.value);
			}
			return moved;
		});
	}

	/**
	 * Final transition to `completed`. Succeeds at most once per transaction:
	 * a repeated call finds the transaction completed and is refused.
	 */
	releaseFunds(
		transactionId: string,
		arbiter: ArbiterIdentity,
		notes?: string,
	): Promise<Outcome<EscrowTransaction>> {
		return this.withTransaction(transactionId, (ctx, tx) =>
			this.releaseFundsIn(ctx, tx, arbiter, notes),
		);
	}

	cancel(
		transactionId: string,
		arbiter: ArbiterIdentity,
		reason: string,
	): Promise<Outcome<EscrowTransaction>> {
		return this.withTransaction(transactionId, (ctx, tx) =>
			this.closeIn(ctx, tx, "cancel", asGm(arbiter), reason, (why) => ({
				action: "transaction_cancelled",
				description: `${arbiter.name} cancelled the transaction: ${why}`,
			})),
		);
	}

	dispute(
		transactionId: string,
		arbiter: ArbiterIdentity,
		reason: string,
	): Promise<Outcome<EscrowTransaction>> {
		return this.withTransaction(transactionId, (ctx, tx) =>
			this.closeIn(ctx, tx, "dispute", asGm(arbiter), reason, (why) => ({
				action: "transaction_disputed",
				description: `${arbiter.name} marked the transaction disputed: ${why}`,
			})),
		);
	}

	/** A buyer or seller of the transaction escalates it to the arbiter. */
	raiseDispute(
		transactionId: string,
		participant: RoomOccupant,
		reason: string,
	): Promise<Outcome<EscrowTransaction>> {
		return this.withTransaction(transactionId, async (ctx, tx) => {
			if (!isPartyOf(tx, participant)) {
				return failure(
					"NotTransactionParty",
					"Only the buyer or seller of this transaction can raise a dispute",
				);
			}
			return this.closeIn(
				ctx,
				tx,
				"dispute",
				{ name: participant.name, role: participant.role },
				reason,
				(why) => ({
					action: "dispute_raised",
					description: `${participant.name} raised a dispute: ${why}`,
				}),
			);
		});
	}

	/** Appends to the arbiter's notes. */
	updateNotes(
		transactionId: string,
		arbiter: ArbiterIdentity,
		notes: string,
	): Promise<Outcome<EscrowTransaction>> {
		return this.withTransaction(transactionId, async (ctx, tx) => {
			if (isTerminal(tx.status)) {
				return failure(
					"TransactionClosed",
					`Transaction ${tx.transactionNumber} is ${tx.status}`,
				);
			}
			if (isBlank(notes)) {
				return failure("MissingReason", "Notes must not be empty");
			}
			tx.gmNotes = appendNote(tx.gmNotes, notes.trim());
			const saved = await ctx.manager.save(tx);
			await this.audit.record(ctx.manager, {
				roomId: tx.roomId,
				action: "notes_updated",
				actorName: arbiter.name,
				actorRole: "gm",
				description: `Notes updated on ${tx.transactionNumber}`,
			});
			return success(saved);
		});
	}

	/** Amount, commission and fee can change until payment is verified. */
	setTerms(
		transactionId: string,
		arbiter: ArbiterIdentity,
		terms: TransactionTerms,
	): Promise<Outcome<EscrowTransaction>> {
		return this.withTransaction(transactionId, async (ctx, tx) => {
			if (isTerminal(tx.status)) {
				return failure(
					"TransactionClosed",
					`Transaction ${tx.transactionNumber} is ${tx.status}`,
				);
			}
			if (!TERMS_OPEN.includes(tx.status)) {
				return failure(
					"TermsLocked",
					"Terms cannot change once payment has been verified",
				);
			}
			applyTerms(tx, terms, tx.currency);
			const saved = await ctx.manager.save(tx);
			await this.audit.record(ctx.manager, {
				roomId: tx.roomId,
				action: "terms_updated",
				actorName: arbiter.name,
				actorRole: "gm",
				description: `Terms set to ${saved.totalAmount} ${saved.currency} (amount ${saved.amount}, commission ${saved.commission}, fee ${saved.fee})`,
			});
			this.publishUpdated(ctx, saved);
			return success(saved);
		});
	}

	// ---------------------------------------------------------------------
	// Reads
	// ---------------------------------------------------------------------

	findByExternalId(transactionId: string): Promise<EscrowTransaction | null> {
		return this.transactionRepository.findOne({
			where: { externalId: transactionId },
		});
	}

	findActiveForRoom(roomId: string): Promise<EscrowTransaction | null> {
		return this.transactionRepository.findOne({
			where: { roomId, status: Not(In(TERMINAL_STATUS)) },
		});
	}

	/** The active transaction of the room, or else its most recent one. */
	async findLatestForRoom(roomId: string): Promise<EscrowTransaction | null> {
		return (
			(await this.findActiveForRoom(roomId)) ??
			this.transactionRepository.findOne({
				where: { roomId },
				order: { createdAt: "DESC", id: "DESC" },
			})
		);
	}

	async list(
		filter: { status?: TransactionStatus; roomId?: string },
		limit: number,
		cursor: Cursor = emptyCursor,
	): Promise<{
		items: GetEscrowTransactionDto[];
		nextCursor?: string;
		total: number;
	}> {
		const take = Math.min(Math.max(limit, 1), 100);
		const qb = this.transactionRepository.createQueryBuilder("tx");
		const totalQb = this.transactionRepository.createQueryBuilder("tx");
		for (const q of [qb, totalQb]) {
			q.where("1 = 1");
			if (filter.status) {
				q.andWhere("tx.status = :status", { status: filter.status });
			}
			if (filter.roomId) {
				q.andWhere("tx.roomId = :roomId", { roomId: filter.roomId });
			}
		}
		if (cursor.createdBefore !== undefined && cursor.idBefore !== undefined) {
			qb.andWhere(
				new Brackets((w) => {
					w.where("tx.createdAt < :createdBefore", {
						createdBefore: cursor.createdBefore,
					}).orWhere(
						new Brackets((w2) => {
							w2.where("tx.createdAt = :createdAtEq", {
								createdAtEq: cursor.createdBefore,
							}).andWhere("tx.id < :idBefore", { idBefore: cursor.idBefore });
						}),
					);
				}),
			);
		}
		const rows = await qb
			.orderBy("tx.createdAt", "DESC")
			.addOrderBy("tx.id", "DESC")
			.take(take)
			.getMany();
		const total = await totalQb.getCount();

		let nextCursor: string | undefined;
		if (rows.length === take) {
			const last = rows[rows.length - 1];
			nextCursor = cursorToString(last.createdAt, last.id);
		}
		return {
			items: rows.map((tx) => toTransactionDto(tx, true)),
			nextCursor,
			total,
		};
	}

	// ---------------------------------------------------------------------
	// Building blocks for other units (evidence gateway, fund release)
	// ---------------------------------------------------------------------

	/** Loads the transaction inside an open unit. */
	async loadIn(
		ctx: UnitContext,
		transactionId: string,
	): Promise<Outcome<EscrowTransaction>> {
		const tx = await ctx.manager.findOne(EscrowTransaction, {
			where: { externalId: transactionId },
		});
		if (!tx) {
			return failure(
				"TransactionNotFound",
				`Transaction ${transactionId} not found`,
			);
		}
		return success(tx);
	}

	/**
	 * Returns the room's active transaction, creating one in `pending_payment`
	 * when there is none. Terms given here apply to a new transaction only.
	 */
	async openForRoom(
		ctx: UnitContext,
		roomId: string,
		terms?: TransactionTerms,
	): Promise<Outcome<EscrowTransaction>> {
		const { manager } = ctx;
		const active = await manager.findOne(EscrowTransaction, {
			where: { roomId, status: Not(In(TERMINAL_STATUS)) },
		});
		if (active) {
			return success(active);
		}
		const room = await manager.findOne(Room, { where: { externalId: roomId } });
		if (!room) {
			return failure("RoomNotFound", `Room ${roomId} not found`);
		}
		const occupants = await manager.find(RoomOccupant, { where: { roomId } });
		const buyer = occupants.find((o) => o.role === "buyer");
		if (!buyer) {
			return failure(
				"OccupantNotFound",
				`Room ${room.roomNumber} has no buyer to open a transaction for`,
			);
		}
		const seller = occupants.find((o) => o.role === "seller");

		const tx = manager.create(EscrowTransaction, {
			externalId: nanoid(16),
			transactionNumber: newTransactionNumber(),
			roomId,
			buyerId: buyer.externalId,
			sellerId: seller?.externalId ?? null,
			status: INITIAL_STATUS,
		});
		applyTerms(tx, terms ?? { amount: 0 }, this.defaultCurrency);
		const saved = await manager.save(tx);
		await this.audit.record(manager, {
			roomId,
			action: "transaction_opened",
			actorName: "System",
			actorRole: "system",
			description: `Transaction ${saved.transactionNumber} opened`,
		});
		this.logger.log(
			`Opened transaction ${saved.transactionNumber} for room ${room.roomNumber}`,
		);
		return success(saved);
	}

	/**
	 * Admits the uploader as a party of the transaction. The buyer is fixed
	 * when the transaction opens; the first seller to upload becomes its
	 * seller when none was seated then.
	 */
	async admitUploaderIn(
		ctx: UnitContext,
		tx: EscrowTransaction,
		uploader: RoomOccupant,
	): Promise<Outcome<EscrowTransaction>> {
		if (uploader.role === "seller" && !tx.sellerId) {
			tx.sellerId = uploader.externalId;
			return success(await ctx.manager.save(tx));
		}
		if (!isPartyOf(tx, uploader)) {
			return failure(
				"NotTransactionParty",
				`${uploader.name} is not the ${uploader.role} of transaction ${tx.transactionNumber}`,
			);
		}
		return success(tx);
	}

	/** Moves to awaiting verification after evidence for `route` was uploaded. */
	submitIn(
		ctx: UnitContext,
		tx: EscrowTransaction,
		route: StepRoute,
		uploader: RoomOccupant,
	): Promise<Outcome<EscrowTransaction>> {
		return this.transition(ctx, tx, route.submit, {
			actor: { name: uploader.name, role: uploader.role },
			audit: {
				action: "evidence_submitted",
				description: `${uploader.name} uploaded a ${route.label}`,
			},
			otherwise: failure(
				"EvidenceNotExpected",
				`A ${route.label} is not expected while the transaction is ${tx.status}`,
			),
		});
	}

	/** Undoes `submitIn` when the uploader takes pending evidence back. */
	withdrawIn(
		ctx: UnitContext,
		tx: EscrowTransaction,
		route: StepRoute,
		uploader: RoomOccupant,
	): Promise<Outcome<EscrowTransaction>> {
		return this.transition(ctx, tx, route.withdraw, {
			actor: { name: uploader.name, role: uploader.role },
			audit: {
				action: "evidence_withdrawn",
				description: `${uploader.name} withdrew the ${route.label}`,
			},
			otherwise: failure(
				route.notAwaiting,
				`Transaction is ${tx.status}, the ${route.label} is no longer under review`,
			),
		});
	}

	verifyIn(
		ctx: UnitContext,
		tx: EscrowTransaction,
		route: StepRoute,
		arbiter: ArbiterIdentity,
	): Promise<Outcome<EscrowTransaction>> {
		return this.transition(ctx, tx, route.verify.action, {
			actor: asGm(arbiter),
			audit: {
				action: route.verify.audit,
				description: `${arbiter.name} verified the ${route.label}`,
			},
			patch: route.verify.patch(arbiter.name, new Date()),
			otherwise: failure(
				route.notAwaiting,
				`Transaction is ${tx.status}, not awaiting ${route.name} verification`,
			),
		});
	}

	async rejectIn(
		ctx: UnitContext,
		tx: EscrowTransaction,
		route: StepRoute,
		arbiter: ArbiterIdentity,
		reason: string,
	): Promise<Outcome<EscrowTransaction>> {
		if (isBlank(reason)) {
			return failure("MissingReason", "A rejection reason is required");
		}
		const trimmed = reason.trim();
		return this.transition(ctx, tx, route.reject.action, {
			actor: asGm(arbiter),
			audit: {
				action: route.reject.audit,
				description: `${arbiter.name} rejected the ${route.label}: ${trimmed}`,
			},
			patch: route.reject.patch(trimmed),
			otherwise: failure(
				route.notAwaiting,
				`Transaction is ${tx.status}, not awaiting ${route.name} verification`,
			),
		});
	}

	async releaseFundsIn(
		ctx: UnitContext,
		tx: EscrowTransaction,
		arbiter: ArbiterIdentity,
		notes?: string,
	): Promise<Outcome<EscrowTransaction>> {
		const notReady = failure(
			"NotReadyForRelease",
			tx.status === "completed"
				? `Funds of ${tx.transactionNumber} were already released`
				: `Funds can only be released after receipt is confirmed, transaction is ${tx.status}`,
		);
		if (tx.fundsReleasedAt) {
			return notReady;
		}
		const now = new Date();
		const released = await this.transition(ctx, tx, "release_funds", {
			actor: asGm(arbiter),
			audit: {
				action: "funds_released",
				description: `${arbiter.name} released the funds of ${tx.transactionNumber}`,
			},
			patch: {
				fundsReleasedBy: arbiter.name,
				fundsReleasedAt: now,
				completedAt: now,
				gmNotes: isBlank(notes)
					? tx.gmNotes
					: appendNote(tx.gmNotes, `[Fund Release] ${notes?.trim()}`),
			},
			otherwise: notReady,
		});
		if (released.ok) {
			ctx.publish(FUNDS_RELEASED_ID, {
				eventId: nanoid(16),
				roomId: tx.roomId,
				transactionId: tx.externalId,
				releasedBy: arbiter.name,
				releasedAt: now.toISOString(),
			} satisfies FundsReleased);
		}
		return released;
	}

	// ---------------------------------------------------------------------

	/**
	 * Cancels or disputes an open transaction. Evidence still under review is
	 * closed as rejected with the same reason.
	 */
	private async closeIn(
		ctx: UnitContext,
		tx: EscrowTransaction,
		action: "cancel" | "dispute",
		actor: Actor,
		reason: string,
		audit: (reason: string) => TransitionOptions["audit"],
	): Promise<Outcome<EscrowTransaction>> {
		if (isBlank(reason)) {
			return failure("MissingReason", `A reason is required to ${action}`);
		}
		const trimmed = reason.trim();
		const now = new Date();
		const closed = await this.transition(ctx, tx, action, {
			actor,
			audit: audit(trimmed),
			patch:
				action === "cancel"
					? { closingReason: trimmed, cancelledAt: now }
					: { closingReason: trimmed, disputedAt: now },
			otherwise: failure(
				"TransactionClosed",
				`Transaction ${tx.transactionNumber} is already ${tx.status}`,
			),
		});
		if (!closed.ok) {
			return closed;
		}
		await ctx.manager.update(
			EvidenceFile,
			{ transactionId: tx.externalId, status: "pending" },
			{
				status: "rejected",
				verifiedBy: actor.name,
				verifiedAt: now,
				rejectionReason: `Transaction ${closed.value.status}: ${trimmed}`,
			},
		);
		this.publishUpdated(ctx, closed.value);
		return closed;
	}

	/**
	 * Applies one lifecycle action: checks the transition, patches and saves
	 * the row, and writes the audit entry, all through the unit's manager.
	 */
	private async transition(
		ctx: UnitContext,
		tx: EscrowTransaction,
		action: TransactionAction,
		options: TransitionOptions,
	): Promise<Outcome<EscrowTransaction>> {
		const to = nextStatus(tx.status, action);
		if (to === undefined) {
			return options.otherwise;
		}
		const from = tx.status;
		Object.assign(tx, options.patch ?? {});
		tx.status = to;
		const saved = await ctx.manager.save(tx);
		await this.audit.record(ctx.manager, {
			roomId: tx.roomId,
			action: options.audit.action,
			actorName: options.actor.name,
			actorRole: options.actor.role,
			description: options.audit.description,
		});
		const notice = await this.messages.postSystemIn(
			ctx,
			tx.roomId,
			options.audit.description,
		);
		if (!notice.ok) {
			return notice;
		}
		this.logger.debug(
			`${tx.transactionNumber}: ${from} --${action}--> ${to} by ${options.actor.name}`,
		);
		return success(saved);
	}

	private publishUpdated(ctx: UnitContext, tx: EscrowTransaction) {
		ctx.publish(TRANSACTION_UPDATED_ID, {
			eventId: nanoid(16),
			roomId: tx.roomId,
			transactionId: tx.externalId,
			status: tx.status,
			updatedAt: new Date().toISOString(),
		} satisfies TransactionUpdated);
	}

	private async withTransaction<T>(
		transactionId: string,
		work: (ctx: UnitContext, tx: EscrowTransaction) => Promise<Outcome<T>>,
	): Promise<Outcome<T>> {
		const located = await this.findByExternalId(transactionId);
		if (!located) {
			return failure(
				"TransactionNotFound",
				`Transaction ${transactionId} not found`,
			);
		}
		return this.unit.run(located.roomId, async (ctx) => {
			const loaded = await this.loadIn(ctx, transactionId);
			return loaded.ok ? work(ctx, loaded.value) : loaded;
		});
	}
}

const TERMS_OPEN: readonly TransactionStatus[] = [
	"pending_payment",
	"awaiting_payment_verification",
	"payment_rejected",
];

function applyTerms(
	tx: EscrowTransaction,
	terms: TransactionTerms,
	fallbackCurrency: string,
) {
	tx.amount = terms.amount;
	tx.commission = terms.commission ?? 0;
	tx.fee = terms.fee ?? 0;
	tx.totalAmount = tx.amount + tx.commission + tx.fee;
	tx.currency = (terms.currency ?? fallbackCurrency).toUpperCase();
}

function isPartyOf(tx: EscrowTransaction, occupant: RoomOccupant) {
	return occupant.role === "buyer"
		? occupant.externalId === tx.buyerId
		: occupant.externalId === tx.sellerId;
}

function appendNote(existing: string | null | undefined, note: string) {
	return existing ? `${existing}\n\n${note}` : note;
}
