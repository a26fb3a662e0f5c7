import {
	createParamDecorator,
	ExecutionContext,
	UnauthorizedException,
} from "@nestjs/common";
import { ArbiterIdentity } from "./arbiter";
import type { ArbiterRequest } from "./arbiter-auth.guard";

/** The arbiter resolved by `ArbiterAuthGuard`. */
export const Arbiter = createParamDecorator(
	(_data: unknown, ctx: ExecutionContext): ArbiterIdentity => {
		const req = ctx.switchToHttp().getRequest<ArbiterRequest>();
		if (!req.arbiter) {
			throw new UnauthorizedException("Arbiter not authenticated");
		}
		return req.arbiter;
	},
);
