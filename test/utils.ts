import { Test, type TestingModule } from "@nestjs/testing";
import type { NestExpressApplication } from "@nestjs/platform-express";
import { AppModule } from "../src/app.module";
import { configureApp } from "../src/app.setup";
import type { ArbiterIdentity } from "../src/auth/arbiter";
import { RoomsService } from "../src/rooms/rooms.service";
import { RoomOccupancyService } from "../src/rooms/room-occupancy.service";
import type { RoomOccupant } from "../src/rooms/room-occupant.entity";
import type { Room } from "../src/rooms/room.entity";
import type { Outcome } from "../src/common/outcome";
import {
	EVIDENCE_STORE,
	type EvidenceStore,
} from "../src/evidence-store/evidence-store";

export const testArbiter: ArbiterIdentity = {
	id: "arbiter",
	name: "Test Arbiter",
};

export const arbiterAuthHeader = `Basic ${Buffer.from("arbiter:test-secret").toString("base64")}`;

/** Whole application on an in-memory database, lifecycle hooks started. */
export async function createTestingModule(): Promise<TestingModule> {
	const moduleRef = await Test.createTestingModule({
		imports: [AppModule],
	}).compile();
	await moduleRef.init();
	return moduleRef;
}

export async function createTestApp(): Promise<NestExpressApplication> {
	const moduleRef = await Test.createTestingModule({
		imports: [AppModule],
	}).compile();
	const app = configureApp(
		moduleRef.createNestApplication<NestExpressApplication>(),
	);
	await app.init();
	return app;
}

export function expectOk<T>(outcome: Outcome<T>): T {
	if (!outcome.ok) {
		throw new Error(
			`Expected success, got ${outcome.failure.kind}: ${outcome.failure.reason}`,
		);
	}
	return outcome.value;
}

export function failureKind<T>(outcome: Outcome<T>): string | undefined {
	return outcome.ok ? undefined : outcome.failure.kind;
}

export async function provisionRoom(moduleRef: TestingModule): Promise<Room> {
	return expectOk(await moduleRef.get(RoomsService).provision({}, testArbiter));
}

export async function seatBuyerAndSeller(
	moduleRef: TestingModule,
	roomId: string,
): Promise<{ buyer: RoomOccupant; seller: RoomOccupant }> {
	const occupancy = moduleRef.get(RoomOccupancyService);
	const buyer = expectOk(
		await occupancy.join(roomId, "buyer", {
			name: "Alice",
			contact: "0811000001",
		}),
	);
	const seller = expectOk(
		await occupancy.join(roomId, "seller", {
			name: "Bob",
			contact: "0811000002",
		}),
	);
	return { buyer, seller };
}

export async function storeBlob(
	moduleRef: TestingModule,
	content = "evidence-bytes",
): Promise<string> {
	const store = moduleRef.get<EvidenceStore>(EVIDENCE_STORE);
	return store.put(Buffer.from(content), {
		fileName: "proof.png",
		mimeType: "image/png",
	});
}

export const blobOf = (blobRef: string) => ({
	blobRef,
	fileName: "proof.png",
	mimeType: "image/png",
	fileSize: 14,
});
