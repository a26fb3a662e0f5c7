import type { TestingModule } from "@nestjs/testing";
import { EventEmitter2 } from "@nestjs/event-emitter";
import { FundReleaseAuthority } from "./fund-release.authority";
import { EvidenceVerificationService } from "../evidence/evidence-verification.service";
import { EscrowTransactionsService } from "../transactions/escrow-transactions.service";
import { EvidenceType } from "../evidence/evidence-file.entity";
import { FUNDS_RELEASED_ID, FundsReleased } from "../../common/escrow.event";
import { RoomOccupant } from "../../rooms/room-occupant.entity";
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

describe("FundReleaseAuthority", () => {
	let moduleRef: TestingModule;
	let authority: FundReleaseAuthority;
	let transactionId: string;
	let released: FundsReleased[];

	beforeEach(async () => {
		moduleRef = await createTestingModule();
		authority = moduleRef.get(FundReleaseAuthority);
		const gateway = moduleRef.get(EvidenceVerificationService);
		const roomId = (await provisionRoom(moduleRef)).externalId;
		const { buyer, seller } = await seatBuyerAndSeller(moduleRef, roomId);

		const approve = async (fileType: EvidenceType, uploader: RoomOccupant) => {
			const file = expectOk(
				await gateway.submit({
					roomId,
					uploaderId: uploader.externalId,
					fileType,
					blob: blobOf(await storeBlob(moduleRef)),
				}),
			);
			expectOk(await gateway.approve(file.externalId, testArbiter));
			return file.transactionId;
		};
		transactionId = await approve("payment_proof", buyer);
		await approve("shipping_receipt", seller);
		expectOk(
			await moduleRef
				.get(EscrowTransactionsService)
				.confirmReceipt(transactionId, buyer),
		);

		released = [];
		moduleRef
			.get(EventEmitter2)
			.on(FUNDS_RELEASED_ID, (event: FundsReleased) => released.push(event));
	});

	afterEach(async () => {
		await moduleRef.close();
	});

	it("refuses anyone but the configured arbiter", async () => {
		const outcome = await authority.release(transactionId, {
			id: "someone-else",
			name: "Test Arbiter",
		});
		expect(failureKind(outcome)).toBe("ArbiterNotAuthorized");
		expect(released).toEqual([]);
	});

	it("releases the funds once, attributed to the arbiter", async () => {
		const completed = expectOk(await authority.release(transactionId, testArbiter));
		expect(completed.status).toBe("completed");
		expect(completed.fundsReleasedBy).toBe("Test Arbiter");
		expect(released.map((e) => [e.transactionId, e.releasedBy])).toEqual([
			[transactionId, "Test Arbiter"],
		]);

		expect(failureKind(await authority.release(transactionId, testArbiter))).toBe(
			"NotReadyForRelease",
		);
		expect(released).toHaveLength(1);
	});

	it("settles concurrent requests with a single release", async () => {
		const outcomes = await Promise.all([
			authority.release(transactionId, testArbiter),
			authority.release(transactionId, testArbiter),
			authority.release(transactionId, testArbiter),
		]);
		expect(outcomes.filter((o) => o.ok)).toHaveLength(1);
		expect(outcomes.filter((o) => !o.ok).map(failureKind)).toEqual([
			"NotReadyForRelease",
			"NotReadyForRelease",
		]);
		expect(released).toHaveLength(1);
	});
});
