import { Injectable, Logger } from "@nestjs/common";
import { InjectRepository } from "@nestjs/typeorm";
import { EntityManager, MoreThan, Repository } from "typeorm";
import {
	ActorRole,
	AuditAction,
	RoomActivityLog,
} from "./room-activity-log.entity";
import { GetActivityLogDto } from "./dto/get-activity-log.dto";

export type AuditEntryInput = {
	roomId: string;
	action: AuditAction;
	actorName: string;
	actorRole: ActorRole;
	description: string;
};

@Injectable()
export class AuditService {
	private readonly logger = new Logger(AuditService.name);

	constructor(
		@InjectRepository(RoomActivityLog)
		private readonly logRepository: Repository<RoomActivityLog>,
	) {}

	/**
	 * Appends an entry with the room's next sequence number. Must run inside
	 * the room's unit of work so the sequence read and the insert are atomic.
	 */
	async record(
		manager: EntityManager,
		entry: AuditEntryInput,
	): Promise<RoomActivityLog> {
		const repo = manager.getRepository(RoomActivityLog);
		const row = await repo
			.createQueryBuilder("log")
			.select("MAX(log.sequence)", "max")
			.where("log.roomId = :roomId", { roomId: entry.roomId })
			.getRawOne<{ max: number | string | null }>();
		const sequence = Number(row?.max ?? 0) + 1;
		const saved = await repo.save(repo.create({ ...entry, sequence }));
		this.logger.debug(
			`[${entry.roomId}#${sequence}] ${entry.action}: ${entry.description}`,
		);
		return saved;
	}

	async list(
		roomId: string,
		limit: number,
		afterSequence = 0,
	): Promise<{
		items: GetActivityLogDto[];
		nextSequence?: number;
		total: number;
	}> {
		const take = Math.min(Math.max(limit, 1), 100);
		const [rows, total] = await Promise.all([
			this.logRepository.find({
				where: { roomId, sequence: MoreThan(afterSequence) },
				order: { sequence: "ASC" },
				take,
			}),
			this.logRepository.count({ where: { roomId } }),
		]);
		return {
			items: rows.map(toActivityLogDto),
			nextSequence:
				rows.length === take ? rows[rows.length - 1].sequence : undefined,
			total,
		};
	}
}

export function toActivityLogDto(row: RoomActivityLog): GetActivityLogDto {
	return {
		roomId: row.roomId,
		sequence: row.sequence,
		action: row.action,
		actorName: row.actorName,
		actorRole: row.actorRole,
		description: row.description,
		recordedAt: row.recordedAt.getTime(),
	};
}
