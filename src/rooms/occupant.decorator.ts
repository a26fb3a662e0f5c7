import {
	createParamDecorator,
	ExecutionContext,
	UnauthorizedException,
} from "@nestjs/common";
import type { OccupantRequest } from "./room-session.guard";
import { RoomOccupant } from "./room-occupant.entity";

export const Occupant = createParamDecorator(
	(_data: unknown, ctx: ExecutionContext): RoomOccupant => {
		const req = ctx.switchToHttp().getRequest<OccupantRequest>();
		if (!req.occupant) {
			throw new UnauthorizedException("Room session not resolved");
		}
		return req.occupant;
	},
);
