import type { TestingModule } from "@nestjs/testing";
import { DataSource } from "typeorm";
import {
	EscrowTransactionsService,
	newTransactionNumber,
} from "./escrow-transactions.service";
import { EscrowTransaction } from "./escrow-transaction.entity";
import { EvidenceVerificationService } from "../evidence/evidence-verification.service";
import { EvidenceType } from "../evidence/evidence-file.entity";
import { RoomUnitOfWork } from "../../common/room-unit-of-work";
import { RoomOccupant } from "../../rooms/room-occupant.entity";
import { RoomOccupancyService } from "../../rooms/room-occupancy.service";
import { RoomMessagesService } from "../../chat/room-messages.service";
import {
	blobOf,
	createTestingModule,
	expectOk,
	failureKind,
	provisionRoom,
	seatBuyerAndSeller,
	storeBlob,
	testArbiter,
} from "../../../test/utils";

describe("newTransactionNumber", () => {
	it("combines the UTC day and a random suffix", () => {
		expect(newTransactionNumber(new Date("2025-01-02T10:00:00Z"))).toMatch(
			/^TRX-20250102-[0-9A-HJ-NP-Z]{8}$/,
		);
	});
});

describe("EscrowTransactionsService", () => {
	let moduleRef: TestingModule;
	let transactions: EscrowTransactionsService;
	let gateway: EvidenceVerificationService;
	let roomId: string;
	let buyer: RoomOccupant;
	let seller: RoomOccupant;

	beforeEach(async () => {
		moduleRef = await createTestingModule();
		transactions = moduleRef.get(EscrowTransactionsService);
		gateway = moduleRef.get(EvidenceVerificationService);
		roomId = (await provisionRoom(moduleRef)).externalId;
		({ buyer, seller } = await seatBuyerAndSeller(moduleRef, roomId));
	});

	afterEach(async () => {
		await moduleRef.close();
	});

	const open = () =>
		moduleRef
			.get(RoomUnitOfWork)
			.run(roomId, (ctx) =>
				transactions.openForRoom(ctx, roomId, {
					amount: 150000,
					commission: 1500,
					fee: 500,
				}),
			);

	const upload = async (fileType: EvidenceType, uploader: RoomOccupant) =>
		expectOk(
			await gateway.submit({
				roomId,
				uploaderId: uploader.externalId,
				fileType,
				blob: blobOf(await storeBlob(moduleRef)),
			}),
		);

	/** Drives the room's transaction to `shipped` through the evidence gateway. */
	const shipped = async () => {
		const proof = await upload("payment_proof", buyer);
		expectOk(await gateway.approve(proof.externalId, testArbiter, "payment"));
		const receipt = await upload("shipping_receipt", seller);
		expectOk(await gateway.approve(receipt.externalId, testArbiter, "shipping"));
		return proof.transactionId;
	};

	describe("openForRoom", () => {
		it("opens one pending transaction with the given terms", async () => {
			const tx = expectOk(await open());
			expect(tx).toMatchObject({
				roomId,
				buyerId: buyer.externalId,
				sellerId: seller.externalId,
				status: "pending_payment",
				amount: 150000,
				commission: 1500,
				fee: 500,
				totalAmount: 152000,
				currency: "IDR",
			});
			expect(tx.transactionNumber).toMatch(/^TRX-\d{8}-[0-9A-Z]{8}$/);

			const again = expectOk(await open());
			expect(again.externalId).toBe(tx.externalId);
		});

		it("lets storage refuse a second open transaction in the room", async () => {
			const tx = expectOk(await open());
			const repository = moduleRef.get(DataSource).getRepository(EscrowTransaction);
			await expect(
				repository.insert({
					externalId: "second-open-tx",
					transactionNumber: "TRX-20250101-AAAAAAAA",
					roomId,
					buyerId: tx.buyerId,
					status: "paid",
					amount: 0,
					commission: 0,
					fee: 0,
					totalAmount: 0,
					currency: "IDR",
				}),
			).rejects.toThrow();
		});
	});

	describe("payment verification", () => {
		it("cannot skip the upload of a payment proof", async () => {
			const tx = expectOk(await open());
			expect(
				failureKind(await transactions.verifyPayment(tx.externalId, testArbiter)),
			).toBe("NotAwaitingPaymentVerification");
			expect(
				failureKind(
					await transactions.rejectPayment(tx.externalId, testArbiter, "blurry"),
				),
			).toBe("NotAwaitingPaymentVerification");
		});

		it("records who verified the payment", async () => {
			const proof = await upload("payment_proof", buyer);
			const paid = expectOk(
				await transactions.verifyPayment(proof.transactionId, testArbiter),
			);
			expect(paid.status).toBe("paid");
			expect(paid.paymentVerifiedBy).toBe("Test Arbiter");
			expect(paid.paymentVerifiedAt).toBeInstanceOf(Date);
		});

		it("requires a reason to reject and keeps it", async () => {
			const proof = await upload("payment_proof", buyer);
			expect(
				failureKind(
					await transactions.rejectPayment(proof.transactionId, testArbiter, " "),
				),
			).toBe("MissingReason");

			const rejected = expectOk(
				await transactions.rejectPayment(
					proof.transactionId,
					testArbiter,
					" amount does not match ",
				),
			);
			expect(rejected.status).toBe("payment_rejected");
			expect(rejected.paymentRejectionReason).toBe("amount does not match");
		});
	});

	describe("shipping verification", () => {
		it("cannot verify shipping before a receipt was uploaded", async () => {
			const proof = await upload("payment_proof", buyer);
			expectOk(await gateway.approve(proof.externalId, testArbiter));
			expect(
				failureKind(
					await transactions.verifyShipping(proof.transactionId, testArbiter),
				),
			).toBe("NotAwaitingShippingVerification");
		});

		it("records a shipping rejection", async () => {
			const proof = await upload("payment_proof", buyer);
			expectOk(await gateway.approve(proof.externalId, testArbiter));
			await upload("shipping_receipt", seller);
			const rejected = expectOk(
				await transactions.rejectShipping(
					proof.transactionId,
					testArbiter,
					"tracking number unknown",
				),
			);
			expect(rejected.status).toBe("shipping_rejected");
			expect(rejected.shippingRejectionReason).toBe("tracking number unknown");
		});
	});

	describe("confirmReceipt", () => {
		it("waits for the shipment", async () => {
			const proof = await upload("payment_proof", buyer);
			expect(
				failureKind(await transactions.confirmReceipt(proof.transactionId, buyer)),
			).toBe("NotShipped");
		});

		it("is reserved to the buyer", async () => {
			const transactionId = await shipped();
			expect(
				failureKind(await transactions.confirmReceipt(transactionId, seller)),
			).toBe("NotBuyer");
		});

		it("refuses a buyer who took the slot after the transaction opened", async () => {
			const transactionId = await shipped();
			const occupancy = moduleRef.get(RoomOccupancyService);
			expectOk(await occupancy.leave(roomId, buyer.externalId));
			const eve = expectOk(
				await occupancy.join(roomId, "buyer", {
					name: "Eve",
					contact: "0811000009",
				}),
			);

			expect(
				failureKind(await transactions.confirmReceipt(transactionId, eve)),
			).toBe("NotBuyer");
			expect(
				(await transactions.findByExternalId(transactionId))?.status,
			).toBe("shipped");
		});

		it("moves to goods received with the buyer's notes", async () => {
			const transactionId = await shipped();
			const received = expectOk(
				await transactions.confirmReceipt(transactionId, buyer, "all good"),
			);
			expect(received.status).toBe("goods_received");
			expect(received.buyerNotes).toBe("all good");
			expect(received.receivedAt).toBeInstanceOf(Date);
		});
	});

	describe("releaseFunds", () => {
		it("is refused before receipt is confirmed", async () => {
			const transactionId = await shipped();
			expect(
				failureKind(await transactions.releaseFunds(transactionId, testArbiter)),
			).toBe("NotReadyForRelease");
		});

		it("completes the transaction exactly once", async () => {
			const transactionId = await shipped();
			expectOk(await transactions.confirmReceipt(transactionId, buyer));

			const completed = expectOk(
				await transactions.releaseFunds(transactionId, testArbiter, "paid out"),
			);
			expect(completed).toMatchObject({
				status: "completed",
				fundsReleasedBy: "Test Arbiter",
				gmNotes: "[Fund Release] paid out",
			});
			expect(completed.fundsReleasedAt).toBeInstanceOf(Date);
			expect(completed.completedAt).toBeInstanceOf(Date);

			const again = await transactions.releaseFunds(transactionId, testArbiter);
			expect(again.ok ? undefined : again.failure).toEqual({
				kind: "NotReadyForRelease",
				category: "precondition",
				reason: `Funds of ${completed.transactionNumber} were already released`,
			});
		});
	});

	describe("cancel and dispute", () => {
		it("cancels an open transaction with a reason, once", async () => {
			const tx = expectOk(await open());
			expect(
				failureKind(await transactions.cancel(tx.externalId, testArbiter, "")),
			).toBe("MissingReason");

			const cancelled = expectOk(
				await transactions.cancel(tx.externalId, testArbiter, "no deal"),
			);
			expect(cancelled.status).toBe("cancelled");
			expect(cancelled.closingReason).toBe("no deal");
			expect(cancelled.cancelledAt).toBeInstanceOf(Date);

			expect(
				failureKind(await transactions.cancel(tx.externalId, testArbiter, "again")),
			).toBe("TransactionClosed");
			expect(await transactions.findActiveForRoom(roomId)).toBeNull();
			expect((await transactions.findLatestForRoom(roomId))?.externalId).toBe(
				tx.externalId,
			);
		});

		it("lets the room open a new transaction once the last one closed", async () => {
			const first = expectOk(await open());
			expectOk(await transactions.dispute(first.externalId, testArbiter, "fraud"));
			const second = expectOk(await open());
			expect(second.externalId).not.toBe(first.externalId);
			expect(second.status).toBe("pending_payment");
		});

		it("closes evidence still waiting for review", async () => {
			const proof = await upload("payment_proof", buyer);
			expectOk(
				await transactions.cancel(proof.transactionId, testArbiter, "no deal"),
			);

			expect(await gateway.listPending()).toEqual([]);
			const [closed] = await gateway.listForTransaction(proof.transactionId);
			expect(closed).toMatchObject({
				externalId: proof.externalId,
				status: "rejected",
				verifiedBy: "Test Arbiter",
				rejectionReason: "Transaction cancelled: no deal",
			});
			expect(
				failureKind(await gateway.approve(proof.externalId, testArbiter)),
			).toBe("AlreadyProcessed");
		});

		it("marks a transaction disputed", async () => {
			const transactionId = await shipped();
			const disputed = expectOk(
				await transactions.dispute(transactionId, testArbiter, "item damaged"),
			);
			expect(disputed.status).toBe("disputed");
			expect(disputed.closingReason).toBe("item damaged");
			expect(disputed.disputedAt).toBeInstanceOf(Date);
		});
	});

	describe("raiseDispute", () => {
		it("lets the seller escalate an open transaction", async () => {
			const proof = await upload("payment_proof", buyer);
			const disputed = expectOk(
				await transactions.raiseDispute(
					proof.transactionId,
					seller,
					" buyer stopped answering ",
				),
			);
			expect(disputed.status).toBe("disputed");
			expect(disputed.closingReason).toBe("buyer stopped answering");
			expect(await gateway.listPending()).toEqual([]);
			expect(
				(await gateway.listForTransaction(proof.transactionId))[0]
					.rejectionReason,
			).toBe("Transaction disputed: buyer stopped answering");
		});

		it("refuses occupants who are not a party of the transaction", async () => {
			const tx = expectOk(await open());
			const occupancy = moduleRef.get(RoomOccupancyService);
			expectOk(await occupancy.leave(roomId, seller.externalId));
			const mallory = expectOk(
				await occupancy.join(roomId, "seller", {
					name: "Mallory",
					contact: "0811000008",
				}),
			);
			expect(
				failureKind(
					await transactions.raiseDispute(tx.externalId, mallory, "let me in"),
				),
			).toBe("NotTransactionParty");
			expect(
				failureKind(await transactions.raiseDispute(tx.externalId, buyer, " ")),
			).toBe("MissingReason");
		});
	});

	it("announces every lifecycle step in the room's chat", async () => {
		const proof = await upload("payment_proof", buyer);
		expectOk(await gateway.approve(proof.externalId, testArbiter, "payment"));

		const chat = await moduleRef.get(RoomMessagesService).list(roomId);
		expect(
			chat.map((message) => [message.senderName, message.type, message.message]),
		).toEqual([
			["System", "system", "Alice uploaded a payment proof"],
			["System", "system", "Test Arbiter verified the payment proof"],
		]);
	});

	describe("setTerms and updateNotes", () => {
		it("changes terms until payment is verified", async () => {
			const proof = await upload("payment_proof", buyer);
			const updated = expectOk(
				await transactions.setTerms(proof.transactionId, testArbiter, {
					amount: 200000,
					fee: 1000,
					currency: "usd",
				}),
			);
			expect(updated).toMatchObject({
				amount: 200000,
				commission: 0,
				fee: 1000,
				totalAmount: 201000,
				currency: "USD",
			});

			expectOk(await gateway.approve(proof.externalId, testArbiter));
			expect(
				failureKind(
					await transactions.setTerms(proof.transactionId, testArbiter, {
						amount: 1,
					}),
				),
			).toBe("TermsLocked");
		});

		it("appends arbiter notes", async () => {
			const tx = expectOk(await open());
			expectOk(await transactions.updateNotes(tx.externalId, testArbiter, "first"));
			const noted = expectOk(
				await transactions.updateNotes(tx.externalId, testArbiter, "second"),
			);
			expect(noted.gmNotes).toBe("first\n\nsecond");
		});

		it("refuses changes to a closed transaction", async () => {
			const tx = expectOk(await open());
			expectOk(await transactions.cancel(tx.externalId, testArbiter, "no deal"));
			expect(
				failureKind(
					await transactions.setTerms(tx.externalId, testArbiter, { amount: 1 }),
				),
			).toBe("TransactionClosed");
			expect(
				failureKind(
					await transactions.updateNotes(tx.externalId, testArbiter, "late"),
				),
			).toBe("TransactionClosed");
		});
	});

	it("reports unknown transactions", async () => {
		expect(
			failureKind(await transactions.verifyPayment("missing-tx", testArbiter)),
		).toBe("TransactionNotFound");
	});

	it("lists transactions with filters", async () => {
		const tx = expectOk(await open());
		const page = await transactions.list({ status: "pending_payment" }, 10);
		expect(page.items.map((item) => item.externalId)).toEqual([tx.externalId]);
		expect(page.items[0].progressPercentage).toBe(0);
		const none = await transactions.list({ status: "paid" }, 10);
		expect(none.total).toBe(0);
	});
});
