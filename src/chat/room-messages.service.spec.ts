import type { TestingModule } from "@nestjs/testing";
import { EventEmitter2 } from "@nestjs/event-emitter";
import { RoomMessagesService } from "./room-messages.service";
import { AuditService } from "../audit/audit.service";
import { MESSAGE_SENT_ID, MessageSent } from "../common/room.event";
import { RoomOccupant } from "../rooms/room-occupant.entity";
import {
	createTestingModule,
	expectOk,
	failureKind,
	provisionRoom,
	seatBuyerAndSeller,
	testArbiter,
} from "../../test/utils";

describe("RoomMessagesService", () => {
	let moduleRef: TestingModule;
	let messages: RoomMessagesService;
	let roomId: string;
	let buyer: RoomOccupant;
	let seller: RoomOccupant;

	beforeEach(async () => {
		moduleRef = await createTestingModule();
		messages = moduleRef.get(RoomMessagesService);
		roomId = (await provisionRoom(moduleRef)).externalId;
		({ buyer, seller } = await seatBuyerAndSeller(moduleRef, roomId));
	});

	afterEach(async () => {
		await moduleRef.close();
	});

	it("keeps the conversation in order", async () => {
		const sent: MessageSent[] = [];
		moduleRef
			.get(EventEmitter2)
			.on(MESSAGE_SENT_ID, (event: MessageSent) => sent.push(event));

		const first = expectOk(await messages.send(roomId, buyer, " Paid just now "));
		expectOk(await messages.send(roomId, seller, "Shipping tomorrow"));

		expect(first).toMatchObject({
			roomId,
			senderName: "Alice",
			senderRole: "buyer",
			message: "Paid just now",
			type: "text",
		});
		expect(
			(await messages.list(roomId)).map((m) => [m.senderName, m.message]),
		).toEqual([
			["Alice", "Paid just now"],
			["Bob", "Shipping tomorrow"],
		]);
		expect(sent.map((e) => e.senderRole)).toEqual(["buyer", "seller"]);
	});

	it("returns only the latest messages when limited", async () => {
		for (const text of ["one", "two", "three"]) {
			expectOk(await messages.send(roomId, buyer, text));
		}
		expect((await messages.list(roomId, 2)).map((m) => m.message)).toEqual([
			"two",
			"three",
		]);
	});

	it("refuses blank messages and unknown rooms", async () => {
		expect(failureKind(await messages.send(roomId, buyer, "   "))).toBe(
			"EmptyMessage",
		);
		expect(failureKind(await messages.send("missing", buyer, "hello"))).toBe(
			"RoomNotFound",
		);
		expect(await messages.list(roomId)).toEqual([]);
	});

	it("posts arbiter notices as system messages and audits them", async () => {
		const notice = expectOk(
			await messages.sendAsArbiter(roomId, testArbiter, "Please upload the receipt"),
		);
		expect(notice).toMatchObject({
			senderName: "Test Arbiter (GM)",
			senderRole: "gm",
			type: "system",
		});

		const log = await moduleRef.get(AuditService).list(roomId, 20);
		expect(log.items[log.items.length - 1]).toMatchObject({
			action: "gm_message_sent",
			actorName: "Test Arbiter",
			actorRole: "gm",
			description: "GM sent: Please upload the receipt",
		});
	});
});
