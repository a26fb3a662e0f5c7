import {
	Injectable,
	Logger,
	OnModuleDestroy,
	OnModuleInit,
} from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { RoomOccupancyService } from "./room-occupancy.service";
import { positiveNumberSetting } from "../common/config";
import { toError } from "../common/errors";

/** Periodically runs the idle-session sweep of `RoomOccupancyService`. */
@Injectable()
export class SessionSweeper implements OnModuleInit, OnModuleDestroy {
	private readonly logger = new Logger(SessionSweeper.name);
	private readonly tickMs: number;
	private timer: NodeJS.Timeout | null = null;
	private running = false;

	constructor(
		configService: ConfigService,
		private readonly occupancy: RoomOccupancyService,
	) {
		this.tickMs = positiveNumberSetting(
			configService,
			"SESSION_SWEEP_INTERVAL_MS",
			5 * 60_000,
		);
	}

	onModuleInit() {
		this.logger.log(`Starting session sweeper every ${this.tickMs}ms`);
		this.timer = setInterval(() => {
			void this.tick();
		}, this.tickMs);
		// never keep the process alive on its own
		this.timer.unref();
	}

	onModuleDestroy() {
		if (this.timer) {
			clearInterval(this.timer);
			this.timer = null;
		}
		this.logger.log("Stopped session sweeper");
	}

	async tick(): Promise<void> {
		if (this.running) {
			return;
		}
		this.running = true;
		try {
			await this.occupancy.sweepIdleSessions();
		} catch (e) {
			const error = toError(e);
			this.logger.error(`Session sweep failed: ${error.message}`, error.stack);
		} finally {
			this.running = false;
		}
	}
}
