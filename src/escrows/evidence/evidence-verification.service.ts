import { Inject, Injectable, Logger } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { InjectRepository } from "@nestjs/typeorm";
import { Repository } from "typeorm";
import { nanoid } from "nanoid";

import { EvidenceFile, EvidenceType } from "./evidence-file.entity";
import {
	EVIDENCE_ROUTES,
	STEP_ROUTES,
	StepRoute,
	VerificationStep,
} from "./evidence-routing";
import {
	EscrowTransactionsService,
	TransactionTerms,
} from "../transactions/escrow-transactions.service";
import { EscrowTransaction } from "../transactions/escrow-transaction.entity";
import { Room } from "../../rooms/room.entity";
import { RoomOccupant } from "../../rooms/room-occupant.entity";
import { AuditService } from "../../audit/audit.service";
import { ArbiterIdentity } from "../../auth/arbiter";
import { RoomUnitOfWork, UnitContext } from "../../common/room-unit-of-work";
import { failure, Outcome, success } from "../../common/outcome";
import { positiveNumberSetting } from "../../common/config";
import { toError } from "../../common/errors";
import {
	EVIDENCE_REJECTED_ID,
	EVIDENCE_SUBMITTED_ID,
	EVIDENCE_VERIFIED_ID,
	EvidenceRejected,
	EvidenceSubmitted,
	EvidenceVerified,
} from "../../common/escrow.event";
import {
	BlobRef,
	EVIDENCE_STORE,
	EvidenceStore,
} from "../../evidence-store/evidence-store";

export type EvidenceSubmission = {
	roomId: string;
	uploaderId: string;
	fileType: EvidenceType;
	blob: {
		blobRef: BlobRef;
		fileName: string;
		mimeType: string;
		fileSize: number;
	};
	/** Applied only when this upload opens the room's transaction. */
	terms?: TransactionTerms;
};

export type ReviewResult = {
	evidence: EvidenceFile;
	transaction: EscrowTransaction;
};

/**
 * The only way evidence turns into lifecycle progress. Every submission and
 * review updates the evidence record and the transaction in one unit.
 */
@Injectable()
export class EvidenceVerificationService {
	private readonly logger = new Logger(EvidenceVerificationService.name);
	private readonly maxBytes: number;

	constructor(
		configService: ConfigService,
		@InjectRepository(EvidenceFile)
		private readonly evidenceRepository: Repository<EvidenceFile>,
		@Inject(EVIDENCE_STORE) private readonly store: EvidenceStore,
		private readonly transactions: EscrowTransactionsService,
		private readonly unit: RoomUnitOfWork,
		private readonly audit: AuditService,
	) {
		this.maxBytes = positiveNumberSetting(
			configService,
			"EVIDENCE_MAX_BYTES",
			5 * 1024 * 1024,
		);
	}

	/** Stores the bytes, then submits; the blob is removed again when refused. */
	async upload(
		input: Omit<EvidenceSubmission, "blob"> & {
			fileName: string;
			mimeType: string;
			bytes: Buffer;
		},
	): Promise<Outcome<EvidenceFile>> {
		if (input.bytes.length === 0 || input.bytes.length > this.maxBytes) {
			return failure(
				"EvidenceTooLarge",
				`Evidence must be between 1 and ${this.maxBytes} bytes`,
			);
		}
		const blobRef = await this.store.put(input.bytes, {
			fileName: input.fileName,
			mimeType: input.mimeType,
		});
		try {
			const outcome = await this.submit({
				roomId: input.roomId,
				uploaderId: input.uploaderId,
				fileType: input.fileType,
				terms: input.terms,
				blob: {
					blobRef,
					fileName: input.fileName,
					mimeType: input.mimeType,
					fileSize: input.bytes.length,
				},
			});
			if (!outcome.ok) {
				await this.store.remove(blobRef);
			}
			return outcome;
		} catch (e) {
			await this.store.remove(blobRef);
			throw toError(e);
		}
	}

	async submit(input: EvidenceSubmission): Promise<Outcome<EvidenceFile>> {
		const route = EVIDENCE_ROUTES[input.fileType];
		return this.unit.run(input.roomId, async (ctx) => {
			const { manager } = ctx;
			const room = await manager.findOne(Room, {
				where: { externalId: input.roomId },
			});
			if (!room) {
				return failure("RoomNotFound", `Room ${input.roomId} not found`);
			}
			if (room.expiresAt.getTime() <= Date.now()) {
				return failure("RoomExpired", `Room ${room.roomNumber} has expired`);
			}
			const uploader = await manager.findOne(RoomOccupant, {
				where: { externalId: input.uploaderId, roomId: input.roomId },
			});
			if (!uploader) {
				return failure(
					"OccupantNotFound",
					`Uploader ${input.uploaderId} does not occupy room ${room.roomNumber}`,
				);
			}
			if (!route.uploaderRoles.includes(uploader.role)) {
				return failure(
					"UploaderRoleMismatch",
					`A ${route.label} cannot be uploaded by the ${uploader.role}`,
				);
			}
			if (!(await this.store.exists(input.blob.blobRef))) {
				return failure(
					"EvidenceBlobMissing",
					`No stored content for ${input.blob.blobRef}`,
				);
			}

			const opened = await this.transactions.openForRoom(
				ctx,
				input.roomId,
				input.terms,
			);
			if (!opened.ok) {
				return opened;
			}
			const admitted = await this.transactions.admitUploaderIn(
				ctx,
				opened.value,
				uploader,
			);
			if (!admitted.ok) {
				return admitted;
			}
			let transaction = admitted.value;

			const pending = await manager.count(EvidenceFile, {
				where: {
					transactionId: transaction.externalId,
					fileType: input.fileType,
					status: "pending",
				},
			});
			if (pending > 0) {
				return failure(
					"EvidenceAlreadyPending",
					`A ${route.label} is already waiting for review`,
				);
			}

			if (route.step) {
				const moved = await this.transactions.submitIn(
					ctx,
					transaction,
					route.step,
					uploader,
				);
				if (!moved.ok) {
					return moved;
				}
				transaction = moved.value;
			} else {
				await this.audit.record(manager, {
					roomId: input.roomId,
					action: "evidence_submitted",
					actorName: uploader.name,
					actorRole: uploader.role,
					description: `${uploader.name} uploaded an ${route.label}`,
				});
			}

			const evidence = await manager.save(
				manager.create(EvidenceFile, {
					externalId: nanoid(16),
					roomId: input.roomId,
					transactionId: transaction.externalId,
					fileType: input.fileType,
					fileName: input.blob.fileName,
					blobRef: input.blob.blobRef,
					fileSize: input.blob.fileSize,
					mimeType: input.blob.mimeType,
					uploadedBy: uploader.externalId,
					uploaderRole: uploader.role,
					status: "pending",
				}),
			);
			ctx.publish(EVIDENCE_SUBMITTED_ID, {
				eventId: nanoid(16),
				roomId: input.roomId,
				transactionId: transaction.externalId,
				evidenceId: evidence.externalId,
				fileType: evidence.fileType,
				submittedAt: new Date().toISOString(),
			} satisfies EvidenceSubmitted);
			this.logger.log(
				`${uploader.role} uploaded ${route.label} ${evidence.externalId} for ${transaction.transactionNumber}`,
			);
			return success(evidence);
		});
	}

	/**
	 * Verifies a pending file and, for payment proofs and shipping receipts,
	 * the matching lifecycle step. `expectedStep` guards against reviewing a
	 * file of the wrong type.
	 */
	approve(
		fileId: string,
		arbiter: ArbiterIdentity,
		expectedStep?: VerificationStep,
	): Promise<Outcome<ReviewResult>> {
		return this.review(fileId, expectedStep, async (ctx, evidence) => {
			const route = EVIDENCE_ROUTES[evidence.fileType];
			const now = new Date();
			evidence.status = "verified";
			evidence.verifiedBy = arbiter.name;
			evidence.verifiedAt = now;
			await ctx.manager.save(evidence);

			const transaction = await this.advance(ctx, evidence, (tx, step) =>
				this.transactions.verifyIn(ctx, tx, step, arbiter),
			);
			if (!transaction.ok) {
				return transaction;
			}
			if (!route.step) {
				await this.audit.record(ctx.manager, {
					roomId: evidence.roomId,
					action: "identity_verified",
					actorName: arbiter.name,
					actorRole: "gm",
					description: `${arbiter.name} verified the ${route.label}`,
				});
			}
			ctx.publish(EVIDENCE_VERIFIED_ID, {
				eventId: nanoid(16),
				roomId: evidence.roomId,
				transactionId: evidence.transactionId,
				evidenceId: evidence.externalId,
				fileType: evidence.fileType,
				verifiedBy: arbiter.name,
				verifiedAt: now.toISOString(),
			} satisfies EvidenceVerified);
			return success({ evidence, transaction: transaction.value });
		});
	}

	reject(
		fileId: string,
		arbiter: ArbiterIdentity,
		reason: string,
		expectedStep?: VerificationStep,
	): Promise<Outcome<ReviewResult>> {
		return this.review(fileId, expectedStep, async (ctx, evidence) => {
			if (reason.trim() === "") {
				return failure("MissingReason", "A rejection reason is required");
			}
			const route = EVIDENCE_ROUTES[evidence.fileType];
			const now = new Date();
			evidence.status = "rejected";
			evidence.verifiedBy = arbiter.name;
			evidence.verifiedAt = now;
			evidence.rejectionReason = reason.trim();
			await ctx.manager.save(evidence);

			const transaction = await this.advance(ctx, evidence, (tx, step) =>
				this.transactions.rejectIn(ctx, tx, step, arbiter, reason),
			);
			if (!transaction.ok) {
				return transaction;
			}
			if (!route.step) {
				await this.audit.record(ctx.manager, {
					roomId: evidence.roomId,
					action: "identity_rejected",
					actorName: arbiter.name,
					actorRole: "gm",
					description: `${arbiter.name} rejected the ${route.label}: ${reason.trim()}`,
				});
			}
			ctx.publish(EVIDENCE_REJECTED_ID, {
				eventId: nanoid(16),
				roomId: evidence.roomId,
				transactionId: evidence.transactionId,
				evidenceId: evidence.externalId,
				fileType: evidence.fileType,
				reason: reason.trim(),
				rejectedAt: now.toISOString(),
			} satisfies EvidenceRejected);
			return success({ evidence, transaction: transaction.value });
		});
	}

	/**
	 * Takes back a file its uploader submitted while it is still pending. A
	 * payment proof or shipping receipt returns the transaction to the point
	 * where it can be uploaded again.
	 */
	async withdraw(
		fileId: string,
		occupant: RoomOccupant,
	): Promise<Outcome<EvidenceFile>> {
		const withdrawn = await this.unit.run(occupant.roomId, async (ctx) => {
			const evidence = await ctx.manager.findOne(EvidenceFile, {
				where: { externalId: fileId, roomId: occupant.roomId },
			});
			if (!evidence) {
				return failure("EvidenceNotFound", `Evidence ${fileId} not found`);
			}
			const route = EVIDENCE_ROUTES[evidence.fileType];
			if (evidence.uploadedBy !== occupant.externalId) {
				return failure(
					"NotUploader",
					`Only the uploader can withdraw this ${route.label}`,
				);
			}
			if (evidence.status !== "pending") {
				return failure(
					"AlreadyProcessed",
					`This ${route.label} has already been ${evidence.status}`,
				);
			}
			await ctx.manager.delete(EvidenceFile, { id: evidence.id });

			if (route.step) {
				const loaded = await this.transactions.loadIn(
					ctx,
					evidence.transactionId,
				);
				if (!loaded.ok) {
					return loaded;
				}
				const moved = await this.transactions.withdrawIn(
					ctx,
					loaded.value,
					route.step,
					occupant,
				);
				if (!moved.ok) {
					return moved;
				}
			} else {
				await this.audit.record(ctx.manager, {
					roomId: evidence.roomId,
					action: "evidence_withdrawn",
					actorName: occupant.name,
					actorRole: occupant.role,
					description: `${occupant.name} withdrew the ${route.label}`,
				});
			}
			return success(evidence);
		});
		if (withdrawn.ok) {
			await this.store.remove(withdrawn.value.blobRef);
			this.logger.log(
				`${occupant.role} withdrew evidence ${withdrawn.value.externalId}`,
			);
		}
		return withdrawn;
	}

	listPending(): Promise<EvidenceFile[]> {
		return this.evidenceRepository.find({
			where: { status: "pending" },
			order: { createdAt: "ASC", id: "ASC" },
		});
	}

	listForTransaction(transactionId: string): Promise<EvidenceFile[]> {
		return this.evidenceRepository.find({
			where: { transactionId },
			order: { createdAt: "ASC", id: "ASC" },
		});
	}

	async content(
		fileId: string,
	): Promise<Outcome<{ evidence: EvidenceFile; bytes: Buffer }>> {
		const evidence = await this.evidenceRepository.findOne({
			where: { externalId: fileId },
		});
		if (!evidence) {
			return failure("EvidenceNotFound", `Evidence ${fileId} not found`);
		}
		const bytes = await this.store.get(evidence.blobRef);
		if (!bytes) {
			return failure(
				"EvidenceBlobMissing",
				`Stored content of evidence ${fileId} is gone`,
			);
		}
		return success({ evidence, bytes });
	}

	private async review(
		fileId: string,
		expectedStep: VerificationStep | undefined,
		work: (
			ctx: UnitContext,
			evidence: EvidenceFile,
		) => Promise<Outcome<ReviewResult>>,
	): Promise<Outcome<ReviewResult>> {
		const located = await this.evidenceRepository.findOne({
			where: { externalId: fileId },
		});
		if (!located) {
			return failure("EvidenceNotFound", `Evidence ${fileId} not found`);
		}
		return this.unit.run(located.roomId, async (ctx) => {
			const evidence = await ctx.manager.findOne(EvidenceFile, {
				where: { externalId: fileId },
			});
			if (!evidence) {
				return failure("EvidenceNotFound", `Evidence ${fileId} not found`);
			}
			const route = EVIDENCE_ROUTES[evidence.fileType];
			if (expectedStep !== undefined && route.step?.name !== expectedStep) {
				return failure(
					"WrongType",
					`This file is a ${route.label}, not a ${STEP_ROUTES[expectedStep].label}`,
				);
			}
			if (evidence.status !== "pending") {
				return failure(
					"AlreadyProcessed",
					`This ${route.label} has already been ${evidence.status}`,
				);
			}
			return work(ctx, evidence);
		});
	}

	/**
	 * Runs the lifecycle operation routed for the file's type; evidence that
	 * drives no step leaves the transaction as it is.
	 */
	private async advance(
		ctx: UnitContext,
		evidence: EvidenceFile,
		operation: (
			tx: EscrowTransaction,
			step: StepRoute,
		) => Promise<Outcome<EscrowTransaction>>,
	): Promise<Outcome<EscrowTransaction>> {
		const loaded = await this.transactions.loadIn(ctx, evidence.transactionId);
		if (!loaded.ok) {
			return loaded;
		}
		const { step } = EVIDENCE_ROUTES[evidence.fileType];
		return step ? operation(loaded.value, step) : loaded;
	}
}
