import {
	CanActivate,
	ExecutionContext,
	Injectable,
	UnauthorizedException,
} from "@nestjs/common";
import type { Request, Response } from "express";
import { ArbiterIdentity } from "./arbiter";
import { ArbiterAuthService } from "./arbiter-auth.service";

export type ArbiterRequest = Request & { arbiter?: ArbiterIdentity };

/** HTTP Basic against the configured arbiter credentials. */
@Injectable()
export class ArbiterAuthGuard implements CanActivate {
	constructor(private readonly auth: ArbiterAuthService) {}

	canActivate(context: ExecutionContext): boolean {
		const http = context.switchToHttp();
		const req = http.getRequest<ArbiterRequest>();
		const res = http.getResponse<Response>();

		const header = req.header("authorization");
		if (!header || !header.startsWith("Basic ")) {
			res.setHeader("WWW-Authenticate", 'Basic realm="Arbiter"');
			throw new UnauthorizedException("Authentication required");
		}

		const decoded = Buffer.from(
			header.slice("Basic ".length).trim(),
			"base64",
		).toString("utf8");
		const sep = decoded.indexOf(":");
		const username = sep >= 0 ? decoded.slice(0, sep) : "";
		const password = sep >= 0 ? decoded.slice(sep + 1) : "";

		const arbiter = this.auth.authenticate(username, password);
		if (!arbiter) {
			res.setHeader("WWW-Authenticate", 'Basic realm="Arbiter"');
			throw new UnauthorizedException("Invalid credentials");
		}
		req.arbiter = arbiter;
		return true;
	}
}
