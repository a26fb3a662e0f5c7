import { Injectable, Logger } from "@nestjs/common";
import { EventEmitter2 } from "@nestjs/event-emitter";
import { DataSource, EntityManager } from "typeorm";
import { DomainEventId, DomainEvents } from "./domain-events";
import { Failure, Outcome } from "./outcome";

export type UnitContext = {
	manager: EntityManager;
	/** Buffers an event; it is emitted only once the unit has committed. */
	publish<K extends DomainEventId>(eventId: K, payload: DomainEvents[K]): void;
};

// These drivers run every transaction on one shared connection.
const SINGLE_CONNECTION_DRIVERS = ["better-sqlite3", "sqlite", "sqljs"];
const SHARED_KEY = "*";

class AbortedUnit extends Error {
	constructor(readonly failure: Failure) {
		super(failure.reason);
	}
}

/**
 * Runs one room-scoped mutation atomically: an in-process lock keyed by room,
 * held across a single database transaction. A failed outcome rolls the
 * transaction back. Published events are emitted after commit, in order,
 * before the lock is released.
 */
@Injectable()
export class RoomUnitOfWork {
	private readonly logger = new Logger(RoomUnitOfWork.name);
	private readonly tails = new Map<string, Promise<void>>();
	private readonly sharedConnection: boolean;

	constructor(
		private readonly dataSource: DataSource,
		private readonly events: EventEmitter2,
	) {
		this.sharedConnection = SINGLE_CONNECTION_DRIVERS.includes(
			dataSource.options.type,
		);
	}

	async run<T>(
		roomKey: string,
		work: (ctx: UnitContext) => Promise<Outcome<T>>,
	): Promise<Outcome<T>> {
		const release = await this.acquire(
			this.sharedConnection ? SHARED_KEY : roomKey,
		);
		try {
			const pending: Array<() => void> = [];
			let outcome: Outcome<T>;
			try {
				outcome = await this.dataSource.transaction(async (manager) => {
					const result = await work({
						manager,
						publish: (eventId, payload) => {
							pending.push(() => this.events.emit(eventId, payload));
						},
					});
					if (!result.ok) {
						throw new AbortedUnit(result.failure);
					}
					return result;
				});
			} catch (e) {
				if (e instanceof AbortedUnit) {
					this.logger.debug(
						`Unit for room ${roomKey} rolled back: ${e.failure.kind}`,
					);
					return { ok: false, failure: e.failure };
				}
				throw e;
			}
			for (const emit of pending) {
				emit();
			}
			return outcome;
		} finally {
			release();
		}
	}

	private async acquire(key: string): Promise<() => void> {
		const previous = this.tails.get(key) ?? Promise.resolve();
		let unlock: () => void = () => undefined;
		const held = new Promise<void>((resolve) => {
			unlock = resolve;
		});
		const tail = previous.then(() => held);
		this.tails.set(key, tail);
		await previous;
		return () => {
			unlock();
			if (this.tails.get(key) === tail) {
				this.tails.delete(key);
			}
		};
	}
}
