import { HttpStatus } from "@nestjs/common";
import { failure, success } from "./outcome";
import { toHttpException, unwrap } from "./outcome-http";

describe("outcome at the HTTP edge", () => {
	it.each([
		["RoomExpired", HttpStatus.GONE],
		["RoleUnavailable", HttpStatus.CONFLICT],
		["DuplicateRole", HttpStatus.CONFLICT],
		["RoomNumberTaken", HttpStatus.CONFLICT],
		["MissingReason", HttpStatus.BAD_REQUEST],
		["WrongType", HttpStatus.BAD_REQUEST],
		["UploaderRoleMismatch", HttpStatus.FORBIDDEN],
		["NotTransactionParty", HttpStatus.FORBIDDEN],
		["NotUploader", HttpStatus.FORBIDDEN],
		["EmptyMessage", HttpStatus.BAD_REQUEST],
		["ArbiterNotAuthorized", HttpStatus.FORBIDDEN],
		["RoomNotFound", HttpStatus.NOT_FOUND],
		["EvidenceBlobMissing", HttpStatus.NOT_FOUND],
		["NotShipped", HttpStatus.UNPROCESSABLE_ENTITY],
		["NotReadyForRelease", HttpStatus.UNPROCESSABLE_ENTITY],
	] as const)("maps %s to %d", (kind, status) => {
		expect(toHttpException(failure(kind, "reason").failure).getStatus()).toBe(
			status,
		);
	});

	it("carries the failure kind and reason in the response body", () => {
		const exception = toHttpException(
			failure("TermsLocked", "Terms cannot change").failure,
		);
		expect(exception.getResponse()).toEqual({
			kind: "TermsLocked",
			message: "Terms cannot change",
		});
	});

	it("unwraps a success and throws for a failure", () => {
		expect(unwrap(success(42))).toBe(42);
		expect(() => unwrap(failure("NotBuyer", "Only the buyer"))).toThrow(
			"Only the buyer",
		);
	});
});
