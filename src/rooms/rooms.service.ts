import { Injectable, Logger } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { InjectRepository } from "@nestjs/typeorm";
import { Brackets, In, Not, Repository } from "typeorm";
import { nanoid } from "nanoid";

import { Room } from "./room.entity";
import { RoomOccupant } from "./room-occupant.entity";
import { isSlotOpen } from "./room-occupancy.service";
import { GetRoomDto } from "./dto/get-room.dto";
import { toOccupantDto } from "./dto/occupant.dto";
import { AuditService } from "../audit/audit.service";
import { ArbiterIdentity } from "../auth/arbiter";
import { RoomUnitOfWork } from "../common/room-unit-of-work";
import { failure, Outcome, success } from "../common/outcome";
import { HOUR_MS, positiveNumberSetting } from "../common/config";
import {
	Cursor,
	cursorToString,
	emptyCursor,
} from "../common/dto/envelopes";
import { SLOT_RELEASED_ID, SlotReleased } from "../common/room.event";
import {
	EscrowTransaction,
	TERMINAL_STATUS,
} from "../escrows/transactions/escrow-transaction.entity";

const PROVISION_KEY = "rooms:provision";

export type RoomStats = {
	totalRooms: number;
	freeRooms: number;
	inUseRooms: number;
	onlineUsers: number;
};

@Injectable()
export class RoomsService {
	private readonly logger = new Logger(RoomsService.name);
	private readonly ttlHours: number;
	private readonly extensionHours: number;

	constructor(
		configService: ConfigService,
		@InjectRepository(Room)
		private readonly roomRepository: Repository<Room>,
		@InjectRepository(RoomOccupant)
		private readonly occupantRepository: Repository<RoomOccupant>,
		private readonly unit: RoomUnitOfWork,
		private readonly audit: AuditService,
	) {
		this.ttlHours = positiveNumberSetting(configService, "ROOM_TTL_HOURS", 72);
		this.extensionHours = positiveNumberSetting(
			configService,
			"ROOM_EXTENSION_HOURS",
			24,
		);
	}

	async provision(
		input: { roomNumber?: number },
		arbiter: ArbiterIdentity,
	): Promise<Outcome<Room>> {
		return this.unit.run(PROVISION_KEY, async ({ manager }) => {
			let roomNumber = input.roomNumber;
			if (roomNumber === undefined) {
				const row = await manager
					.createQueryBuilder(Room, "room")
					.select("MAX(room.roomNumber)", "max")
					.getRawOne<{ max: number | string | null }>();
				roomNumber = Number(row?.max ?? 0) + 1;
			} else if (await manager.exists(Room, { where: { roomNumber } })) {
				return failure("RoomNumberTaken", `Room number ${roomNumber} is taken`);
			}

			const room = await manager.save(
				manager.create(Room, {
					externalId: nanoid(16),
					roomNumber,
					status: "free",
					expiresAt: new Date(Date.now() + this.ttlHours * HOUR_MS),
				}),
			);
			await this.audit.record(manager, {
				roomId: room.externalId,
				action: "room_provisioned",
				actorName: arbiter.name,
				actorRole: "gm",
				description: `Room ${roomNumber} opened until ${room.expiresAt.toISOString()}`,
			});
			this.logger.log(`Provisioned room ${roomNumber} (${room.externalId})`);
			return success(room);
		});
	}

	/** Pushes the expiry to `max(now, expiresAt) + hours`. */
	async extend(
		roomId: string,
		arbiter: ArbiterIdentity,
		hours: number = this.extensionHours,
	): Promise<Outcome<Room>> {
		return this.unit.run(roomId, async ({ manager }) => {
			const room = await manager.findOne(Room, {
				where: { externalId: roomId },
			});
			if (!room) {
				return failure("RoomNotFound", `Room ${roomId} not found`);
			}
			const base = Math.max(Date.now(), room.expiresAt.getTime());
			room.expiresAt = new Date(base + hours * HOUR_MS);
			await manager.update(
				Room,
				{ id: room.id },
				{ expiresAt: room.expiresAt },
			);
			await this.audit.record(manager, {
				roomId,
				action: "room_extended",
				actorName: arbiter.name,
				actorRole: "gm",
				description: `Room extended by ${hours}h until ${room.expiresAt.toISOString()}`,
			});
			return success(room);
		});
	}

	/** Removes every occupant and frees the room; refused while a transaction is open. */
	async reset(
		roomId: string,
		arbiter: ArbiterIdentity,
		reason: string,
	): Promise<Outcome<{ released: number }>> {
		if (reason.trim() === "") {
			return failure("MissingReason", "A reason is required to reset a room");
		}
		return this.unit.run(roomId, async (ctx) => {
			const { manager } = ctx;
			const room = await manager.findOne(Room, {
				where: { externalId: roomId },
			});
			if (!room) {
				return failure("RoomNotFound", `Room ${roomId} not found`);
			}
			const open = await manager.count(EscrowTransaction, {
				where: { roomId, status: Not(In(TERMINAL_STATUS)) },
			});
			if (open > 0) {
				return failure(
					"RoomHasActiveTransaction",
					`Room ${room.roomNumber} has an open transaction; cancel or complete it first`,
				);
			}

			const occupants = await manager.find(RoomOccupant, {
				where: { roomId },
				order: { id: "ASC" },
			});
			await manager.delete(RoomOccupant, { roomId });
			await manager.update(Room, { id: room.id }, { status: "free" });
			await this.audit.record(manager, {
				roomId,
				action: "room_reset",
				actorName: arbiter.name,
				actorRole: "gm",
				description: `Room reset: ${reason.trim()}`,
			});
			const releasedAt = new Date().toISOString();
			for (const occupant of occupants) {
				ctx.publish(SLOT_RELEASED_ID, {
					eventId: nanoid(16),
					roomId,
					occupantId: occupant.externalId,
					role: occupant.role,
					cause: "reset",
					releasedAt,
				} satisfies SlotReleased);
			}
			this.logger.log(
				`Room ${room.roomNumber} reset by ${arbiter.name}, ${occupants.length} slot(s) released`,
			);
			return success({ released: occupants.length });
		});
	}

	/** Dashboard counters: rooms by status and participants online now. */
	async stats(): Promise<RoomStats> {
		const [totalRooms, freeRooms, inUseRooms, onlineUsers] = await Promise.all(
			[
				this.roomRepository.count(),
				this.roomRepository.count({ where: { status: "free" } }),
				this.roomRepository.count({ where: { status: "in_use" } }),
				this.occupantRepository.count({ where: { isOnline: true } }),
			],
		);
		return { totalRooms, freeRooms, inUseRooms, onlineUsers };
	}

	findOne(roomId: string): Promise<Room | null> {
		return this.roomRepository.findOne({ where: { externalId: roomId } });
	}

	async details(
		roomId: string,
		withContact = false,
	): Promise<GetRoomDto | null> {
		const room = await this.findOne(roomId);
		if (!room) {
			return null;
		}
		const occupants = await this.occupantRepository.find({
			where: { roomId },
		});
		return toRoomDto(room, occupants, withContact);
	}

	async list(
		limit: number,
		cursor: Cursor = emptyCursor,
		withContact = false,
	): Promise<{ items: GetRoomDto[]; nextCursor?: string; total: number }> {
		const take = Math.min(Math.max(limit, 1), 100);
		const qb = this.roomRepository.createQueryBuilder("room");
		if (cursor.createdBefore !== undefined && cursor.idBefore !== undefined) {
			qb.where(
				new Brackets((w) => {
					w.where("room.createdAt < :createdBefore", {
						createdBefore: cursor.createdBefore,
					}).orWhere(
						new Brackets((w2) => {
							w2.where("room.createdAt = :createdAtEq", {
								createdAtEq: cursor.createdBefore,
							}).andWhere("room.id < :idBefore", {
								idBefore: cursor.idBefore,
							});
						}),
					);
				}),
			);
		}
		const rows = await qb
			.orderBy("room.createdAt", "DESC")
			.addOrderBy("room.id", "DESC")
			.take(take)
			.getMany();
		const total = await this.roomRepository.count();

		const occupants =
			rows.length === 0
				? []
				: await this.occupantRepository.find({
						where: { roomId: In(rows.map((r) => r.externalId)) },
					});

		let nextCursor: string | undefined;
		if (rows.length === take) {
			const last = rows[rows.length - 1];
			nextCursor = cursorToString(last.createdAt, last.id);
		}
		return {
			items: rows.map((room) =>
				toRoomDto(
					room,
					occupants.filter((o) => o.roomId === room.externalId),
					withContact,
				),
			),
			nextCursor,
			total,
		};
	}
}

export function toRoomDto(
	room: Room,
	occupants: RoomOccupant[],
	withContact = false,
): GetRoomDto {
	const buyer = occupants.find((o) => o.role === "buyer");
	const seller = occupants.find((o) => o.role === "seller");
	const occupied = new Set(occupants.map((o) => o.role));
	const isExpired = room.expiresAt.getTime() <= Date.now();
	return {
		externalId: room.externalId,
		roomNumber: room.roomNumber,
		status: room.status,
		expiresAt: room.expiresAt.getTime(),
		isExpired,
		buyer: buyer ? toOccupantDto(buyer, withContact) : undefined,
		seller: seller ? toOccupantDto(seller, withContact) : undefined,
		availability: {
			buyer: !isExpired && isSlotOpen(occupied, "buyer"),
			seller: !isExpired && isSlotOpen(occupied, "seller"),
		},
		createdAt: room.createdAt.getTime(),
	};
}
