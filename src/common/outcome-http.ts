import {
	BadRequestException,
	ConflictException,
	ForbiddenException,
	GoneException,
	HttpException,
	NotFoundException,
	UnprocessableEntityException,
} from "@nestjs/common";
import { Failure, FailureKind, Outcome } from "./outcome";

type ExceptionFactory = new (body: { kind: FailureKind; message: string }) => HttpException;

const BY_KIND: Partial<Record<FailureKind, ExceptionFactory>> = {
	RoomExpired: GoneException,
	RoleUnavailable: ConflictException,
	AlreadyOccupyingAnotherRoom: ConflictException,
	DuplicateRole: ConflictException,
	RoomHasActiveTransaction: ConflictException,
	EvidenceAlreadyPending: ConflictException,
	AlreadyProcessed: ConflictException,
	MissingReason: BadRequestException,
	WrongType: BadRequestException,
	EvidenceTooLarge: BadRequestException,
	EmptyMessage: BadRequestException,
	UploaderRoleMismatch: ForbiddenException,
	NotBuyer: ForbiddenException,
	NotTransactionParty: ForbiddenException,
	NotUploader: ForbiddenException,
};

export function toHttpException(failure: Failure): HttpException {
	const body = { kind: failure.kind, message: failure.reason };
	const byKind = BY_KIND[failure.kind];
	if (byKind) {
		return new byKind(body);
	}
	switch (failure.category) {
		case "integrity":
			return new NotFoundException(body);
		case "conflict":
			return new ConflictException(body);
		case "authorization":
			return new ForbiddenException(body);
		default:
			return new UnprocessableEntityException(body);
	}
}

/** Unwraps an outcome at the HTTP edge, throwing the mapped Nest exception. */
export function unwrap<T>(outcome: Outcome<T>): T {
	if (!outcome.ok) {
		throw toHttpException(outcome.failure);
	}
	return outcome.value;
}
