import {
	CanActivate,
	ExecutionContext,
	ForbiddenException,
	Injectable,
	UnauthorizedException,
} from "@nestjs/common";
import type { Request } from "express";
import { RoomOccupancyService } from "./room-occupancy.service";
import { RoomOccupant } from "./room-occupant.entity";

export const ROOM_SESSION_HEADER = "x-room-session";

export type OccupantRequest = Request & { occupant?: RoomOccupant };

/**
 * Resolves the participant from the session token issued on join. The
 * occupant must belong to the room named by the `roomId` route parameter.
 * Every authenticated request counts as a heartbeat.
 */
@Injectable()
export class RoomSessionGuard implements CanActivate {
	constructor(private readonly occupancy: RoomOccupancyService) {}

	async canActivate(context: ExecutionContext): Promise<boolean> {
		const req = context.switchToHttp().getRequest<OccupantRequest>();
		const token = req.header(ROOM_SESSION_HEADER);
		if (!token) {
			throw new UnauthorizedException("Missing room session");
		}
		const occupant = await this.occupancy.findBySessionToken(token);
		if (!occupant) {
			throw new UnauthorizedException("Unknown or expired room session");
		}
		const roomId = req.params.roomId;
		if (roomId !== undefined && roomId !== occupant.roomId) {
			throw new ForbiddenException("Session belongs to another room");
		}
		req.occupant = await this.occupancy.touch(occupant);
		return true;
	}
}
