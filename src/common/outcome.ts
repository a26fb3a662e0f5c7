export const FAILURE_CATEGORY = [
	"precondition",
	"conflict",
	"integrity",
	"authorization",
] as const;
export type FailureCategory = (typeof FAILURE_CATEGORY)[number];

const KIND_CATEGORY = {
	RoomNotFound: "integrity",
	OccupantNotFound: "integrity",
	TransactionNotFound: "integrity",
	EvidenceNotFound: "integrity",
	EvidenceBlobMissing: "integrity",
	RoomExpired: "precondition",
	RoleUnavailable: "conflict",
	RoomNumberTaken: "conflict",
	AlreadyOccupyingAnotherRoom: "precondition",
	DuplicateRole: "precondition",
	RoomHasActiveTransaction: "precondition",
	NotAwaitingPaymentVerification: "precondition",
	NotAwaitingShippingVerification: "precondition",
	MissingReason: "precondition",
	NotShipped: "precondition",
	NotBuyer: "precondition",
	NotTransactionParty: "precondition",
	NotUploader: "precondition",
	NotReadyForRelease: "precondition",
	TransactionClosed: "precondition",
	TermsLocked: "precondition",
	EvidenceAlreadyPending: "precondition",
	EvidenceNotExpected: "precondition",
	EvidenceTooLarge: "precondition",
	UploaderRoleMismatch: "precondition",
	AlreadyProcessed: "precondition",
	WrongType: "precondition",
	EmptyMessage: "precondition",
	ArbiterNotAuthorized: "authorization",
} as const satisfies Record<string, FailureCategory>;

export type FailureKind = keyof typeof KIND_CATEGORY;

export type Failure = {
	kind: FailureKind;
	category: FailureCategory;
	reason: string;
};

export type Succeeded<T> = { ok: true; value: T };
export type Failed = { ok: false; failure: Failure };

/**
 * Result of every core operation. Expected business failures are values,
 * driver and programming errors are thrown.
 */
export type Outcome<T> = Succeeded<T> | Failed;

export const success = <T>(value: T): Succeeded<T> => ({ ok: true, value });

export const failure = (kind: FailureKind, reason: string): Failed => ({
	ok: false,
	failure: { kind, category: KIND_CATEGORY[kind], reason },
});

export function categoryOf(kind: FailureKind): FailureCategory {
	return KIND_CATEGORY[kind];
}
