import { Injectable, Logger } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { InjectRepository } from "@nestjs/typeorm";
import { EntityManager, In, LessThan, Not, Repository } from "typeorm";
import { nanoid } from "nanoid";

import { Room } from "./room.entity";
import { RoomOccupant } from "./room-occupant.entity";
import { AuditService } from "../audit/audit.service";
import { RoomUnitOfWork, UnitContext } from "../common/room-unit-of-work";
import { failure, Outcome, success } from "../common/outcome";
import { isUniqueViolation } from "../common/errors";
import { HOUR_MS, positiveNumberSetting } from "../common/config";
import {
	SLOT_ASSIGNED_ID,
	SLOT_RELEASED_ID,
	SlotAssigned,
	SlotReleased,
	SlotRole,
} from "../common/room.event";
import {
	EscrowTransaction,
	TERMINAL_STATUS,
} from "../escrows/transactions/escrow-transaction.entity";

export type Participant = {
	name: string;
	contact: string;
	/** Token the caller already holds, if any. */
	sessionToken?: string;
};

export type LeaveCause = SlotReleased["cause"];

export type SlotReleaseResult = {
	roomId: string;
	occupantId: string;
	role: SlotRole;
	roomStatus: Room["status"];
};

export type SweepResult = {
	markedOffline: number;
	evicted: number;
};

const JOIN_ATTEMPTS = 2;
// lock key of units spanning every room
const ALL_ROOMS = "*";

/**
 * Buyer slot opens while the room has no buyer; the seller slot only once a
 * buyer is present and no seller is.
 */
export function isSlotOpen(
	occupied: ReadonlySet<SlotRole>,
	role: SlotRole,
): boolean {
	if (role === "buyer") {
		return !occupied.has("buyer");
	}
	return occupied.has("buyer") && !occupied.has("seller");
}

@Injectable()
export class RoomOccupancyService {
	private readonly logger = new Logger(RoomOccupancyService.name);
	private readonly idleMs: number;
	private readonly evictMs: number;

	constructor(
		configService: ConfigService,
		@InjectRepository(Room)
		private readonly roomRepository: Repository<Room>,
		@InjectRepository(RoomOccupant)
		private readonly occupantRepository: Repository<RoomOccupant>,
		private readonly unit: RoomUnitOfWork,
		private readonly audit: AuditService,
	) {
		this.idleMs =
			positiveNumberSetting(configService, "SESSION_IDLE_HOURS", 2) * HOUR_MS;
		this.evictMs =
			positiveNumberSetting(configService, "SESSION_EVICT_HOURS", 7 * 24) *
			HOUR_MS;
	}

	/**
	 * Assigns the caller to the room's `role` slot. The availability check and
	 * the insert happen in one unit; losing a race to the storage constraint is
	 * retried once and then reported as `RoleUnavailable`.
	 */
	async join(
		roomId: string,
		role: SlotRole,
		participant: Participant,
	): Promise<Outcome<RoomOccupant>> {
		for (let attempt = 1; ; attempt++) {
			try {
				return await this.unit.run(roomId, (ctx) =>
					this.joinIn(ctx, roomId, role, participant),
				);
			} catch (e) {
				if (!isUniqueViolation(e)) {
					throw e;
				}
				if (attempt >= JOIN_ATTEMPTS) {
					this.logger.warn(
						`Join of ${role} in room ${roomId} lost the slot race after ${attempt} attempts`,
					);
					return failure(
						"RoleUnavailable",
						`The ${role} slot of room ${roomId} was taken`,
					);
				}
				this.logger.debug(
					`Join of ${role} in room ${roomId} hit a unique constraint, retrying`,
				);
			}
		}
	}

	async leave(
		roomId: string,
		occupantId: string,
	): Promise<Outcome<SlotReleaseResult>> {
		return this.unit.run(roomId, (ctx) =>
			this.leaveIn(ctx, roomId, occupantId, "left"),
		);
	}

	/** Read-only; a mutation never relies on this answer. */
	async isAvailable(roomId: string, role: SlotRole): Promise<boolean> {
		const room = await this.roomRepository.findOne({
			where: { externalId: roomId },
		});
		if (!room || room.expiresAt.getTime() <= Date.now()) {
			return false;
		}
		return isSlotOpen(
			await this.occupiedRoles(this.roomRepository.manager, roomId),
			role,
		);
	}

	occupants(roomId: string): Promise<RoomOccupant[]> {
		return this.occupantRepository.find({
			where: { roomId },
			order: { joinedAt: "ASC", id: "ASC" },
		});
	}

	findBySessionToken(sessionToken: string): Promise<RoomOccupant | null> {
		return this.occupantRepository.findOne({ where: { sessionToken } });
	}

	/** Heartbeat: marks the occupant online now. */
	async touch(occupant: RoomOccupant): Promise<RoomOccupant> {
		const lastSeenAt = new Date();
		await this.unit.run(occupant.roomId, async (ctx) => {
			await ctx.manager.update(
				RoomOccupant,
				{ id: occupant.id },
				{ isOnline: true, lastSeenAt },
			);
			return success(undefined);
		});
		occupant.isOnline = true;
		occupant.lastSeenAt = lastSeenAt;
		return occupant;
	}

	/**
	 * Marks occupants idle for longer than the idle window offline, and frees
	 * the slots of occupants offline past the eviction window, unless their
	 * room still has an open transaction.
	 */
	async sweepIdleSessions(now: Date = new Date()): Promise<SweepResult> {
		const marked = await this.unit.run(ALL_ROOMS, async (ctx) => {
			const result = await ctx.manager.update(
				RoomOccupant,
				{
					isOnline: true,
					lastSeenAt: LessThan(new Date(now.getTime() - this.idleMs)),
				},
				{ isOnline: false },
			);
			return success(result.affected ?? 0);
		});

		const stale = await this.occupantRepository.find({
			where: {
				isOnline: false,
				lastSeenAt: LessThan(new Date(now.getTime() - this.evictMs)),
			},
			order: { id: "ASC" },
		});
		let evicted = 0;
		for (const occupant of stale) {
			const outcome = await this.unit.run(occupant.roomId, async (ctx) => {
				const current = await ctx.manager.findOne(RoomOccupant, {
					where: { id: occupant.id },
				});
				if (!current || current.isOnline) {
					return success(false);
				}
				const open = await ctx.manager.count(EscrowTransaction, {
					where: { roomId: occupant.roomId, status: Not(In(TERMINAL_STATUS)) },
				});
				if (open > 0) {
					return success(false);
				}
				const released = await this.leaveIn(
					ctx,
					occupant.roomId,
					occupant.externalId,
					"evicted",
				);
				return released.ok ? success(true) : released;
			});
			if (outcome.ok && outcome.value) {
				evicted++;
			}
		}

		const markedOffline = marked.ok ? marked.value : 0;
		if (markedOffline > 0 || evicted > 0) {
			this.logger.log(
				`Session sweep: ${markedOffline} marked offline, ${evicted} evicted`,
			);
		}
		return { markedOffline, evicted };
	}

	/** Roles currently held in the room, read through the given manager. */
	async occupiedRoles(
		manager: EntityManager,
		roomId: string,
	): Promise<Set<SlotRole>> {
		const rows = await manager.find(RoomOccupant, {
			where: { roomId },
			select: { id: true, role: true },
		});
		return new Set(rows.map((row) => row.role));
	}

	/**
	 * Frees one slot inside an open unit: removes the occupant, frees the room
	 * when it was the last one, audits and publishes `SlotReleased`.
	 */
	async leaveIn(
		ctx: UnitContext,
		roomId: string,
		occupantId: string,
		cause: LeaveCause,
	): Promise<Outcome<SlotReleaseResult>> {
		const { manager } = ctx;
		const room = await manager.findOne(Room, { where: { externalId: roomId } });
		if (!room) {
			return failure("RoomNotFound", `Room ${roomId} not found`);
		}
		const occupant = await manager.findOne(RoomOccupant, {
			where: { externalId: occupantId, roomId },
		});
		if (!occupant) {
			return failure(
				"OccupantNotFound",
				`Occupant ${occupantId} not found in room ${roomId}`,
			);
		}

		await manager.delete(RoomOccupant, { id: occupant.id });
		const remaining = await manager.count(RoomOccupant, { where: { roomId } });
		if (remaining === 0 && room.status !== "free") {
			room.status = "free";
			await manager.update(Room, { id: room.id }, { status: "free" });
		}

		await this.audit.record(manager, {
			roomId,
			action: cause === "evicted" ? "session_evicted" : "left_room",
			actorName: cause === "evicted" ? "System" : occupant.name,
			actorRole: cause === "evicted" ? "system" : occupant.role,
			description:
				cause === "evicted"
					? `${occupant.name} (${occupant.role}) was removed after inactivity`
					: `${occupant.name} left the ${occupant.role} slot`,
		});
		ctx.publish(SLOT_RELEASED_ID, {
			eventId: nanoid(16),
			roomId,
			occupantId: occupant.externalId,
			role: occupant.role,
			cause,
			releasedAt: new Date().toISOString(),
		} satisfies SlotReleased);

		return success({
			roomId,
			occupantId: occupant.externalId,
			role: occupant.role,
			roomStatus: room.status,
		});
	}

	private async joinIn(
		ctx: UnitContext,
		roomId: string,
		role: SlotRole,
		participant: Participant,
	): Promise<Outcome<RoomOccupant>> {
		const { manager } = ctx;
		const room = await manager.findOne(Room, { where: { externalId: roomId } });
		if (!room) {
			return failure("RoomNotFound", `Room ${roomId} not found`);
		}
		const now = new Date();
		if (room.expiresAt.getTime() <= now.getTime()) {
			return failure("RoomExpired", `Room ${room.roomNumber} has expired`);
		}

		if (participant.sessionToken) {
			const held = await manager.findOne(RoomOccupant, {
				where: { sessionToken: participant.sessionToken },
			});
			if (held && held.roomId !== roomId) {
				return failure(
					"AlreadyOccupyingAnotherRoom",
					"This session already occupies a slot in another room",
				);
			}
			if (held) {
				return failure(
					"DuplicateRole",
					`This session already holds the ${held.role} slot of this room`,
				);
			}
		}

		const occupied = await this.occupiedRoles(manager, roomId);
		if (!isSlotOpen(occupied, role)) {
			return failure(
				"RoleUnavailable",
				role === "seller" && !occupied.has("buyer")
					? "The seller slot opens once a buyer has joined"
					: `The ${role} slot of room ${room.roomNumber} is taken`,
			);
		}

		const occupant = await manager.save(
			manager.create(RoomOccupant, {
				externalId: nanoid(16),
				roomId,
				role,
				name: participant.name,
				contact: participant.contact,
				sessionToken: nanoid(32),
				isOnline: true,
				joinedAt: now,
				lastSeenAt: now,
			}),
		);
		if (room.status !== "in_use") {
			await manager.update(Room, { id: room.id }, { status: "in_use" });
		}

		await this.audit.record(manager, {
			roomId,
			action: "joined_room",
			actorName: participant.name,
			actorRole: role,
			description: `${participant.name} joined as ${role}`,
		});
		ctx.publish(SLOT_ASSIGNED_ID, {
			eventId: nanoid(16),
			roomId,
			occupantId: occupant.externalId,
			role,
			name: participant.name,
			assignedAt: now.toISOString(),
		} satisfies SlotAssigned);

		this.logger.log(`${participant.name} joined room ${roomId} as ${role}`);
		return success(occupant);
	}
}
