import request from "supertest";
import type { NestExpressApplication } from "@nestjs/platform-express";
import { arbiterAuthHeader, createTestApp } from "./utils";

const evidenceBody = (fileType: string, content: string) => ({
	fileType,
	fileName: "evidence.png",
	mimeType: "image/png",
	contentBase64: Buffer.from(content).toString("base64"),
});

describe("Escrow room from provisioning to fund release", () => {
	let app: NestExpressApplication;
	let roomId: string;
	let buyerSession: string;
	let sellerSession: string;
	let transactionId: string;

	const admin = (method: "get" | "post" | "put", path: string) =>
		request(app.getHttpServer())
			[method](`/api/admin/v1${path}`)
			.set("Authorization", arbiterAuthHeader);

	const pendingEvidenceId = async (): Promise<string> => {
		const res = await admin("get", "/evidence/pending").expect(200);
		expect(res.body.data).toHaveLength(1);
		return res.body.data[0].externalId;
	};

	beforeAll(async () => {
		app = await createTestApp();
	});

	afterAll(async () => {
		await app.close();
	});

	it("reports healthy", async () => {
		const res = await request(app.getHttpServer())
			.get("/api/v1/health")
			.expect(200);
		expect(res.body).toMatchObject({ status: "ok", database: "up" });
	});

	it("keeps the admin API behind the arbiter's credentials", async () => {
		await request(app.getHttpServer()).get("/api/admin/v1/rooms").expect(401);
		const res = await request(app.getHttpServer())
			.get("/api/admin/v1/rooms")
			.set(
				"Authorization",
				`Basic ${Buffer.from("arbiter:wrong").toString("base64")}`,
			)
			.expect(401);
		expect(res.body.message).toBe("Invalid credentials");
	});

	it("provisions a free room", async () => {
		const res = await admin("post", "/rooms").send({}).expect(201);
		expect(res.body.data).toMatchObject({
			roomNumber: 1,
			status: "free",
			isExpired: false,
			availability: { buyer: true, seller: false },
		});
		roomId = res.body.data.externalId;
	});

	it("seats the buyer first, then the seller", async () => {
		const early = await request(app.getHttpServer())
			.post(`/api/v1/rooms/${roomId}/join`)
			.send({ role: "seller", name: "Bob", contact: "0811000002" })
			.expect(409);
		expect(early.body.kind).toBe("RoleUnavailable");

		const buyer = await request(app.getHttpServer())
			.post(`/api/v1/rooms/${roomId}/join`)
			.send({ role: "buyer", name: "Alice", contact: "0811000001" })
			.expect(201);
		expect(buyer.body.data.occupant).toMatchObject({
			role: "buyer",
			name: "Alice",
		});
		expect(buyer.body.data.occupant.contact).toBeUndefined();
		buyerSession = buyer.body.data.sessionToken;

		const availability = await request(app.getHttpServer())
			.get(`/api/v1/rooms/${roomId}/availability`)
			.query({ role: "seller" })
			.expect(200);
		expect(availability.body.data).toEqual({ role: "seller", available: true });

		const seller = await request(app.getHttpServer())
			.post(`/api/v1/rooms/${roomId}/join`)
			.send({ role: "seller", name: "Bob", contact: "0811000002" })
			.expect(201);
		sellerSession = seller.body.data.sessionToken;

		const duplicate = await request(app.getHttpServer())
			.post(`/api/v1/rooms/${roomId}/join`)
			.send({
				role: "seller",
				name: "Alice",
				contact: "0811000001",
				sessionToken: buyerSession,
			})
			.expect(409);
		expect(duplicate.body.kind).toBe("DuplicateRole");
	});

	it("validates join requests", async () => {
		const res = await request(app.getHttpServer())
			.post(`/api/v1/rooms/${roomId}/join`)
			.send({ role: "observer", name: "", contact: "0811000003" })
			.expect(400);
		expect(res.body.message).toEqual(
			expect.arrayContaining([
				"role must be one of the following values: buyer, seller",
				"name should not be empty",
			]),
		);
	});

	it("shows contacts to the arbiter only", async () => {
		const pub = await request(app.getHttpServer())
			.get(`/api/v1/rooms/${roomId}`)
			.expect(200);
		expect(pub.body.data.status).toBe("in_use");
		expect(pub.body.data.buyer.contact).toBeUndefined();

		const res = await admin("get", `/rooms/${roomId}`).expect(200);
		expect(res.body.data.room.buyer.contact).toBe("0811000001");
		expect(res.body.data.room.seller.contact).toBe("0811000002");
		expect(res.body.data.transaction).toBeUndefined();
	});

	it("requires a room session for participant actions", async () => {
		await request(app.getHttpServer())
			.post(`/api/v1/rooms/${roomId}/transaction/evidence`)
			.send(evidenceBody("payment_proof", "transfer"))
			.expect(401);

		const other = await admin("post", "/rooms").send({}).expect(201);
		await request(app.getHttpServer())
			.post(`/api/v1/rooms/${other.body.data.externalId}/heartbeat`)
			.set("x-room-session", buyerSession)
			.expect(403);
	});

	it("accepts the payment proof from the buyer only", async () => {
		const wrong = await request(app.getHttpServer())
			.post(`/api/v1/rooms/${roomId}/transaction/evidence`)
			.set("x-room-session", sellerSession)
			.send(evidenceBody("payment_proof", "transfer"))
			.expect(403);
		expect(wrong.body.kind).toBe("UploaderRoleMismatch");

		const res = await request(app.getHttpServer())
			.post(`/api/v1/rooms/${roomId}/transaction/evidence`)
			.set("x-room-session", buyerSession)
			.send({
				...evidenceBody("payment_proof", "transfer"),
				terms: { amount: 150000, fee: 500 },
			})
			.expect(201);
		expect(res.body.data).toMatchObject({
			fileType: "payment_proof",
			status: "pending",
			uploaderRole: "buyer",
			fileSize: 8,
		});
		transactionId = res.body.data.transactionId;

		const tx = await request(app.getHttpServer())
			.get(`/api/v1/rooms/${roomId}/transaction`)
			.set("x-room-session", buyerSession)
			.expect(200);
		expect(tx.body.data).toMatchObject({
			externalId: transactionId,
			status: "awaiting_payment_verification",
			progressPercentage: 17,
			currentAction: "Arbiter verifies payment",
			totalAmount: 150500,
			currency: "IDR",
		});
	});

	it("verifies the payment through the evidence", async () => {
		const evidenceId = await pendingEvidenceId();

		const wrongStep = await admin("post", `/evidence/${evidenceId}/approve`)
			.send({ step: "shipping" })
			.expect(400);
		expect(wrongStep.body.kind).toBe("WrongType");

		const res = await admin("post", `/evidence/${evidenceId}/approve`)
			.send({ step: "payment" })
			.expect(200);
		expect(res.body.data.evidence.status).toBe("verified");
		expect(res.body.data.transaction).toMatchObject({
			status: "paid",
			paymentVerifiedBy: "Test Arbiter",
			progressPercentage: 33,
		});

		const again = await admin("post", `/evidence/${evidenceId}/approve`)
			.send({})
			.expect(409);
		expect(again.body.kind).toBe("AlreadyProcessed");

		const content = await admin("get", `/evidence/${evidenceId}/content`).expect(
			200,
		);
		expect(content.headers["content-type"]).toBe("image/png");
		expect(content.headers["content-length"]).toBe("8");
	});

	it("sends a rejected shipping receipt back to the seller", async () => {
		await request(app.getHttpServer())
			.post(`/api/v1/rooms/${roomId}/transaction/evidence`)
			.set("x-room-session", sellerSession)
			.send(evidenceBody("shipping_receipt", "receipt-1"))
			.expect(201);
		const evidenceId = await pendingEvidenceId();

		const missing = await admin("post", `/evidence/${evidenceId}/reject`)
			.send({})
			.expect(400);
		expect(missing.body.kind).toBe("MissingReason");

		const res = await admin("post", `/evidence/${evidenceId}/reject`)
			.send({ reason: "tracking number unreadable" })
			.expect(200);
		expect(res.body.data.transaction).toMatchObject({
			status: "shipping_rejected",
			shippingRejectionReason: "tracking number unreadable",
		});

		await request(app.getHttpServer())
			.post(`/api/v1/rooms/${roomId}/transaction/evidence`)
			.set("x-room-session", sellerSession)
			.send(evidenceBody("shipping_receipt", "receipt-2"))
			.expect(201);
		const retry = await admin(
			"post",
			`/evidence/${await pendingEvidenceId()}/approve`,
		)
			.send({ step: "shipping" })
			.expect(200);
		expect(retry.body.data.transaction.status).toBe("shipped");
	});

	it("lets only the buyer confirm receipt", async () => {
		const seller = await request(app.getHttpServer())
			.post(`/api/v1/rooms/${roomId}/transaction/confirm-receipt`)
			.set("x-room-session", sellerSession)
			.send({})
			.expect(403);
		expect(seller.body.kind).toBe("NotBuyer");

		const res = await request(app.getHttpServer())
			.post(`/api/v1/rooms/${roomId}/transaction/confirm-receipt`)
			.set("x-room-session", buyerSession)
			.send({ notes: "arrived intact" })
			.expect(200);
		expect(res.body.data).toMatchObject({
			status: "goods_received",
			buyerNotes: "arrived intact",
			progressPercentage: 83,
		});
	});

	it("releases the funds exactly once", async () => {
		const res = await admin("post", `/transactions/${transactionId}/release-funds`)
			.send({ notes: "seller paid" })
			.expect(200);
		expect(res.body.data).toMatchObject({
			status: "completed",
			progressPercentage: 100,
			fundsReleasedBy: "Test Arbiter",
			gmNotes: "[Fund Release] seller paid",
		});

		const again = await admin(
			"post",
			`/transactions/${transactionId}/release-funds`,
		)
			.send({})
			.expect(422);
		expect(again.body.kind).toBe("NotReadyForRelease");

		const participant = await request(app.getHttpServer())
			.get(`/api/v1/rooms/${roomId}/transaction`)
			.set("x-room-session", buyerSession)
			.expect(200);
		expect(participant.body.data.status).toBe("completed");
		expect(participant.body.data.gmNotes).toBeUndefined();

		const completed = await admin("get", "/transactions")
			.query({ status: "completed" })
			.expect(200);
		expect(completed.body.meta.total).toBe(1);
	});

	it("keeps an ordered activity log of the room", async () => {
		const res = await admin("get", `/rooms/${roomId}/activity`).expect(200);
		const items: Array<{ sequence: number; action: string }> = res.body.data;
		expect(items.map((item) => item.sequence)).toEqual(
			items.map((_, i) => i + 1),
		);
		expect(items.map((item) => item.action)).toEqual([
			"room_provisioned",
			"joined_room",
			"joined_room",
			"transaction_opened",
			"evidence_submitted",
			"payment_verified",
			"evidence_submitted",
			"shipping_rejected",
			"evidence_submitted",
			"shipping_verified",
			"goods_received",
			"funds_released",
		]);
	});

	it("shares a chat between the participants and the arbiter", async () => {
		await request(app.getHttpServer())
			.post(`/api/v1/rooms/${roomId}/messages`)
			.set("x-room-session", buyerSession)
			.send({ message: "" })
			.expect(400);
		await request(app.getHttpServer())
			.post(`/api/v1/rooms/${roomId}/messages`)
			.set("x-room-session", buyerSession)
			.send({ message: "Thanks, all good" })
			.expect(201);
		await admin("post", `/rooms/${roomId}/messages`)
			.send({ message: "Closing this room soon" })
			.expect(201);

		const res = await request(app.getHttpServer())
			.get(`/api/v1/rooms/${roomId}/messages`)
			.set("x-room-session", sellerSession)
			.expect(200);
		const chat: Array<{ senderName: string; type: string; message: string }> =
			res.body.data;
		expect(chat[0]).toMatchObject({
			senderName: "System",
			type: "system",
			message: "Alice uploaded a payment proof",
		});
		expect(
			chat.slice(-2).map((m) => [m.senderName, m.type, m.message]),
		).toEqual([
			["Alice", "text", "Thanks, all good"],
			["Test Arbiter (GM)", "system", "Closing this room soon"],
		]);
	});

	it("resets the room and ends the sessions", async () => {
		const missing = await admin("post", `/rooms/${roomId}/reset`)
			.send({})
			.expect(400);
		expect(missing.body.message).toEqual(
			expect.arrayContaining(["reason should not be empty"]),
		);

		const res = await admin("post", `/rooms/${roomId}/reset`)
			.send({ reason: "deal done" })
			.expect(200);
		expect(res.body.data).toMatchObject({
			status: "free",
			availability: { buyer: true, seller: false },
		});

		await request(app.getHttpServer())
			.post(`/api/v1/rooms/${roomId}/heartbeat`)
			.set("x-room-session", buyerSession)
			.expect(401);
	});

	it("counts rooms and presence for the dashboard", async () => {
		const res = await admin("get", "/stats").expect(200);
		expect(res.body.data).toEqual({
			totalRooms: 2,
			freeRooms: 2,
			inUseRooms: 0,
			onlineUsers: 0,
		});
	});
});
