import { Injectable, Logger } from "@nestjs/common";
import { InjectRepository } from "@nestjs/typeorm";
import { Repository } from "typeorm";
import { nanoid } from "nanoid";

import { RoomMessage } from "./room-message.entity";
import { RoomMessageDto, toRoomMessageDto } from "./dto/room-message.dto";
import { Room } from "../rooms/room.entity";
import { RoomOccupant } from "../rooms/room-occupant.entity";
import { AuditService } from "../audit/audit.service";
import { ArbiterIdentity } from "../auth/arbiter";
import { RoomUnitOfWork, UnitContext } from "../common/room-unit-of-work";
import { failure, Outcome, success } from "../common/outcome";
import { MESSAGE_SENT_ID, MessageSent } from "../common/room.event";

type Sender = Pick<RoomMessage, "senderName" | "senderRole" | "type">;

const SYSTEM_SENDER: Sender = {
	senderName: "System",
	senderRole: "system",
	type: "system",
};

/** Room chat: participant messages, arbiter notices and lifecycle notices. */
@Injectable()
export class RoomMessagesService {
	private readonly logger = new Logger(RoomMessagesService.name);

	constructor(
		@InjectRepository(RoomMessage)
		private readonly messageRepository: Repository<RoomMessage>,
		private readonly unit: RoomUnitOfWork,
		private readonly audit: AuditService,
	) {}

	send(
		roomId: string,
		sender: RoomOccupant,
		message: string,
	): Promise<Outcome<RoomMessage>> {
		return this.unit.run(roomId, (ctx) =>
			this.postIn(
				ctx,
				roomId,
				{ senderName: sender.name, senderRole: sender.role, type: "text" },
				message,
			),
		);
	}

	/** Arbiter notices are shown as system messages and audited. */
	sendAsArbiter(
		roomId: string,
		arbiter: ArbiterIdentity,
		message: string,
	): Promise<Outcome<RoomMessage>> {
		return this.unit.run(roomId, async (ctx) => {
			const posted = await this.postIn(
				ctx,
				roomId,
				{
					senderName: `${arbiter.name} (GM)`,
					senderRole: "gm",
					type: "system",
				},
				message,
			);
			if (posted.ok) {
				await this.audit.record(ctx.manager, {
					roomId,
					action: "gm_message_sent",
					actorName: arbiter.name,
					actorRole: "gm",
					description: `GM sent: ${posted.value.message}`,
				});
			}
			return posted;
		});
	}

	/** Posts a system notice inside an open unit. */
	postSystemIn(
		ctx: UnitContext,
		roomId: string,
		message: string,
	): Promise<Outcome<RoomMessage>> {
		return this.postIn(ctx, roomId, SYSTEM_SENDER, message);
	}

	/** The latest `limit` messages of the room, oldest first. */
	async list(roomId: string, limit = 100): Promise<RoomMessageDto[]> {
		const rows = await this.messageRepository.find({
			where: { roomId },
			order: { id: "DESC" },
			take: Math.min(Math.max(limit, 1), 100),
		});
		return rows.reverse().map(toRoomMessageDto);
	}

	private async postIn(
		ctx: UnitContext,
		roomId: string,
		sender: Sender,
		message: string,
	): Promise<Outcome<RoomMessage>> {
		const text = message.trim();
		if (text === "") {
			return failure("EmptyMessage", "A message must not be empty");
		}
		const room = await ctx.manager.findOne(Room, {
			where: { externalId: roomId },
		});
		if (!room) {
			return failure("RoomNotFound", `Room ${roomId} not found`);
		}
		const saved = await ctx.manager.save(
			ctx.manager.create(RoomMessage, {
				externalId: nanoid(16),
				roomId,
				...sender,
				message: text,
			}),
		);
		ctx.publish(MESSAGE_SENT_ID, {
			eventId: nanoid(16),
			roomId,
			messageId: saved.externalId,
			senderRole: saved.senderRole,
			sentAt: saved.createdAt.toISOString(),
		} satisfies MessageSent);
		this.logger.debug(`[${roomId}] ${sender.senderName}: ${text}`);
		return success(saved);
	}
}
