import { QueryFailedError } from "typeorm";

export function toError(err: unknown): Error {
	return err instanceof Error
		? err
		: new Error("Invalid error type", { cause: err });
}

const UNIQUE_VIOLATION_CODES = ["SQLITE_CONSTRAINT_UNIQUE", "23505", "ER_DUP_ENTRY"];

/**
 * True when the database rejected a write because of a unique index.
 * Works for better-sqlite3, postgres and mysql drivers.
 */
export function isUniqueViolation(err: unknown): boolean {
	if (!(err instanceof QueryFailedError)) {
		return false;
	}
	const driverError: unknown = err.driverError;
	if (
		typeof driverError === "object" &&
		driverError !== null &&
		"code" in driverError &&
		typeof driverError.code === "string" &&
		UNIQUE_VIOLATION_CODES.includes(driverError.code)
	) {
		return true;
	}
	return err.message.includes("UNIQUE constraint failed");
}
