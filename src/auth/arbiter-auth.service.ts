import { Injectable, Logger } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { timingSafeEqual } from "node:crypto";
import { ArbiterIdentity } from "./arbiter";

@Injectable()
export class ArbiterAuthService {
	private readonly logger = new Logger(ArbiterAuthService.name);
	private readonly username: string;
	private readonly password: string;
	private readonly arbiter: ArbiterIdentity;

	constructor(configService: ConfigService) {
		const username = configService.get<string>("ARBITER_USER");
		if (username === undefined) {
			throw new Error("ARBITER_USER is not set");
		}
		const password = configService.get<string>("ARBITER_PASS");
		if (password === undefined) {
			throw new Error("ARBITER_PASS is not set");
		}
		this.username = username;
		this.password = password;
		this.arbiter = {
			id: username,
			name: configService.get<string>("ARBITER_NAME") ?? "Game Master",
		};
	}

	authenticate(username: string, password: string): ArbiterIdentity | undefined {
		const ok =
			constantTimeEquals(username, this.username) &&
			constantTimeEquals(password, this.password);
		if (!ok) {
			this.logger.warn(`Rejected arbiter credentials for '${username}'`);
			return undefined;
		}
		return this.arbiter;
	}

	/** True only for the configured arbiter, whatever the caller claims. */
	isAuthorized(identity: ArbiterIdentity): boolean {
		return identity.id === this.arbiter.id;
	}
}

function constantTimeEquals(a: string, b: string): boolean {
	const ab = Buffer.from(a);
	const bb = Buffer.from(b);
	if (ab.length !== bb.length) {
		timingSafeEqual(bb, bb);
		return false;
	}
	return timingSafeEqual(ab, bb);
}
