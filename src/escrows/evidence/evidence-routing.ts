import type { SlotRole } from "../../common/room.event";
import type { FailureKind } from "../../common/outcome";
import type { AuditAction } from "../../audit/room-activity-log.entity";
import type { EscrowTransaction } from "../transactions/escrow-transaction.entity";
import type { TransactionAction } from "../transactions/transaction-lifecycle";
import type { EvidenceType } from "./evidence-file.entity";

export const VERIFICATION_STEP = ["payment", "shipping"] as const;
export type VerificationStep = (typeof VERIFICATION_STEP)[number];

type Review<P> = {
	action: TransactionAction;
	audit: AuditAction;
	patch: P;
};

/** The lifecycle operations one verification step is made of. */
export type StepRoute = {
	name: VerificationStep;
	label: string;
	submit: TransactionAction;
	withdraw: TransactionAction;
	verify: Review<
		(verifiedBy: string, at: Date) => Partial<EscrowTransaction>
	>;
	reject: Review<(reason: string) => Partial<EscrowTransaction>>;
	/** Returned when a review meets a transaction not awaiting this step. */
	notAwaiting: FailureKind;
};

export type EvidenceRoute = {
	label: string;
	uploaderRoles: readonly SlotRole[];
	/** Lifecycle step driven by this type; null when it drives none. */
	step: StepRoute | null;
};

export const STEP_ROUTES: Readonly<Record<VerificationStep, StepRoute>> = {
	payment: {
		name: "payment",
		label: "payment proof",
		submit: "submit_payment_proof",
		withdraw: "withdraw_payment_proof",
		verify: {
			action: "verify_payment",
			audit: "payment_verified",
			patch: (verifiedBy, at) => ({
				paymentVerifiedBy: verifiedBy,
				paymentVerifiedAt: at,
				paymentRejectionReason: null,
			}),
		},
		reject: {
			action: "reject_payment",
			audit: "payment_rejected",
			patch: (reason) => ({ paymentRejectionReason: reason }),
		},
		notAwaiting: "NotAwaitingPaymentVerification",
	},
	shipping: {
		name: "shipping",
		label: "shipping receipt",
		submit: "submit_shipping_receipt",
		withdraw: "withdraw_shipping_receipt",
		verify: {
			action: "verify_shipping",
			audit: "shipping_verified",
			patch: (verifiedBy, at) => ({
				shippingVerifiedBy: verifiedBy,
				shippingVerifiedAt: at,
				shippingRejectionReason: null,
			}),
		},
		reject: {
			action: "reject_shipping",
			audit: "shipping_rejected",
			patch: (reason) => ({ shippingRejectionReason: reason }),
		},
		notAwaiting: "NotAwaitingShippingVerification",
	},
};

/** Routing from evidence type to the lifecycle operations it may drive. */
export const EVIDENCE_ROUTES: Readonly<Record<EvidenceType, EvidenceRoute>> = {
	payment_proof: {
		label: "payment proof",
		uploaderRoles: ["buyer"],
		step: STEP_ROUTES.payment,
	},
	shipping_receipt: {
		label: "shipping receipt",
		uploaderRoles: ["seller"],
		step: STEP_ROUTES.shipping,
	},
	identity_document: {
		label: "identity document",
		uploaderRoles: ["buyer", "seller"],
		step: null,
	},
};
