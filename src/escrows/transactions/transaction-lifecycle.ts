/**
 * Escrow Transaction Lifecycle
 *
 * The states, actions and transitions of an escrow transaction, plus the
 * derived reads shown to participants. Guards that depend on who acts
 * (buyer, arbiter) live in the service; this module only answers
 * "from this status, where does this action lead".
 *
 * @example
 * ```typescript
 * nextStatus("awaiting_payment_verification", "verify_payment"); // "paid"
 * nextStatus("pending_payment", "verify_payment"); // undefined
 * progressPercentage("shipped"); // 67
 * ```
 */

import {
	TRANSACTION_STATUS,
	TransactionStatus,
} from "./escrow-transaction.entity";

export const TRANSACTION_ACTION = [
	"submit_payment_proof",
	"verify_payment",
	"reject_payment",
	"withdraw_payment_proof",
	"submit_shipping_receipt",
	"verify_shipping",
	"reject_shipping",
	"withdraw_shipping_receipt",
	"confirm_receipt",
	"release_funds",
	"cancel",
	"dispute",
] as const;
export type TransactionAction = (typeof TRANSACTION_ACTION)[number];

type StateDefinition = {
	/** Position on the canonical path, 0 (pending payment) to 6 (completed). */
	step: number;
	isFinal: boolean;
	nextAction: string;
};

type StateTransition = {
	from: TransactionStatus | TransactionStatus[];
	action: TransactionAction;
	to: TransactionStatus;
};

const FINAL_STEP = 6;

const STATES = {
	pending_payment: {
		step: 0,
		isFinal: false,
		nextAction: "Buyer uploads payment proof",
	},
	awaiting_payment_verification: {
		step: 1,
		isFinal: false,
		nextAction: "Arbiter verifies payment",
	},
	payment_rejected: {
		step: 0,
		isFinal: false,
		nextAction: "Buyer re-uploads payment proof",
	},
	paid: {
		step: 2,
		isFinal: false,
		nextAction: "Seller uploads shipping receipt",
	},
	awaiting_shipping_verification: {
		step: 3,
		isFinal: false,
		nextAction: "Arbiter verifies shipping receipt",
	},
	shipping_rejected: {
		step: 2,
		isFinal: false,
		nextAction: "Seller re-uploads shipping receipt",
	},
	shipped: {
		step: 4,
		isFinal: false,
		nextAction: "Buyer confirms receipt of goods",
	},
	goods_received: {
		step: 5,
		isFinal: false,
		nextAction: "Arbiter releases funds",
	},
	// legacy alias of goods_received
	delivered: {
		step: 5,
		isFinal: false,
		nextAction: "Arbiter releases funds",
	},
	completed: {
		step: FINAL_STEP,
		isFinal: true,
		nextAction: "Transaction completed",
	},
	cancelled: {
		step: 0,
		isFinal: true,
		nextAction: "Transaction cancelled",
	},
	disputed: {
		step: 0,
		isFinal: true,
		nextAction: "Awaiting dispute resolution",
	},
} as const satisfies Record<TransactionStatus, StateDefinition>;

const OPEN_STATUSES = TRANSACTION_STATUS.filter(
	(status) => !STATES[status].isFinal,
);

export const TRANSITIONS: readonly StateTransition[] = [
	{
		from: ["pending_payment", "payment_rejected"],
		action: "submit_payment_proof",
		to: "awaiting_payment_verification",
	},
	{ from: "awaiting_payment_verification", action: "verify_payment", to: "paid" },
	{
		from: "awaiting_payment_verification",
		action: "reject_payment",
		to: "payment_rejected",
	},
	{
		from: "awaiting_payment_verification",
		action: "withdraw_payment_proof",
		to: "pending_payment",
	},
	{
		from: ["paid", "shipping_rejected"],
		action: "submit_shipping_receipt",
		to: "awaiting_shipping_verification",
	},
	{
		from: "awaiting_shipping_verification",
		action: "verify_shipping",
		to: "shipped",
	},
	{
		from: "awaiting_shipping_verification",
		action: "reject_shipping",
		to: "shipping_rejected",
	},
	{
		from: "awaiting_shipping_verification",
		action: "withdraw_shipping_receipt",
		to: "paid",
	},
	{ from: "shipped", action: "confirm_receipt", to: "goods_received" },
	{
		from: ["goods_received", "delivered"],
		action: "release_funds",
		to: "completed",
	},
	{ from: OPEN_STATUSES, action: "cancel", to: "cancelled" },
	{ from: OPEN_STATUSES, action: "dispute", to: "disputed" },
];

const transitionMap = new Map<string, TransactionStatus>();
for (const transition of TRANSITIONS) {
	const froms = Array.isArray(transition.from)
		? transition.from
		: [transition.from];
	for (const from of froms) {
		transitionMap.set(`${from}:${transition.action}`, transition.to);
	}
}

export const INITIAL_STATUS: TransactionStatus = "pending_payment";

/** The status `action` leads to from `from`, or undefined when not allowed. */
export function nextStatus(
	from: TransactionStatus,
	action: TransactionAction,
): TransactionStatus | undefined {
	return transitionMap.get(`${from}:${action}`);
}

export function isTerminal(status: TransactionStatus): boolean {
	return STATES[status].isFinal;
}

export function allowedActions(status: TransactionStatus): TransactionAction[] {
	return TRANSACTION_ACTION.filter(
		(action) => nextStatus(status, action) !== undefined,
	);
}

/**
 * Completion along the canonical path, 0 to 100. Rejected states count as
 * their re-upload point; cancelled and disputed count as 0.
 */
export function progressPercentage(status: TransactionStatus): number {
	return Math.round((STATES[status].step / FINAL_STEP) * 100);
}

/** Label of the action the lifecycle is waiting for. */
export function currentAction(status: TransactionStatus): string {
	return STATES[status].nextAction;
}
