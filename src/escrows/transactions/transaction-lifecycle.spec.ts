import {
	allowedActions,
	currentAction,
	isTerminal,
	nextStatus,
	progressPercentage,
} from "./transaction-lifecycle";

describe("transaction lifecycle", () => {
	it("follows the canonical path from pending payment to completed", () => {
		expect(nextStatus("pending_payment", "submit_payment_proof")).toBe(
			"awaiting_payment_verification",
		);
		expect(nextStatus("awaiting_payment_verification", "verify_payment")).toBe(
			"paid",
		);
		expect(nextStatus("paid", "submit_shipping_receipt")).toBe(
			"awaiting_shipping_verification",
		);
		expect(nextStatus("awaiting_shipping_verification", "verify_shipping")).toBe(
			"shipped",
		);
		expect(nextStatus("shipped", "confirm_receipt")).toBe("goods_received");
		expect(nextStatus("goods_received", "release_funds")).toBe("completed");
	});

	it("lets rejected evidence be uploaded again", () => {
		expect(nextStatus("awaiting_payment_verification", "reject_payment")).toBe(
			"payment_rejected",
		);
		expect(nextStatus("payment_rejected", "submit_payment_proof")).toBe(
			"awaiting_payment_verification",
		);
		expect(
			nextStatus("awaiting_shipping_verification", "reject_shipping"),
		).toBe("shipping_rejected");
		expect(nextStatus("shipping_rejected", "submit_shipping_receipt")).toBe(
			"awaiting_shipping_verification",
		);
	});

	it("returns withdrawn evidence to its upload point", () => {
		expect(
			nextStatus("awaiting_payment_verification", "withdraw_payment_proof"),
		).toBe("pending_payment");
		expect(
			nextStatus("awaiting_shipping_verification", "withdraw_shipping_receipt"),
		).toBe("paid");
		expect(nextStatus("paid", "withdraw_payment_proof")).toBeUndefined();
	});

	it("never skips a verification step", () => {
		expect(nextStatus("pending_payment", "verify_payment")).toBeUndefined();
		expect(nextStatus("payment_rejected", "verify_payment")).toBeUndefined();
		expect(nextStatus("pending_payment", "submit_shipping_receipt")).toBeUndefined();
		expect(nextStatus("paid", "verify_shipping")).toBeUndefined();
		expect(nextStatus("paid", "confirm_receipt")).toBeUndefined();
		expect(nextStatus("shipped", "release_funds")).toBeUndefined();
	});

	it("releases funds from the delivered alias too", () => {
		expect(nextStatus("delivered", "release_funds")).toBe("completed");
		expect(progressPercentage("delivered")).toBe(83);
	});

	it("allows cancel and dispute from every open status only", () => {
		expect(nextStatus("shipped", "cancel")).toBe("cancelled");
		expect(nextStatus("pending_payment", "dispute")).toBe("disputed");
		for (const closed of ["completed", "cancelled", "disputed"] as const) {
			expect(isTerminal(closed)).toBe(true);
			expect(allowedActions(closed)).toEqual([]);
		}
		expect(isTerminal("goods_received")).toBe(false);
	});

	it("lists the actions allowed from a status", () => {
		expect(allowedActions("awaiting_payment_verification")).toEqual([
			"verify_payment",
			"reject_payment",
			"withdraw_payment_proof",
			"cancel",
			"dispute",
		]);
	});

	it.each([
		["pending_payment", 0],
		["payment_rejected", 0],
		["awaiting_payment_verification", 17],
		["paid", 33],
		["shipping_rejected", 33],
		["awaiting_shipping_verification", 50],
		["shipped", 67],
		["goods_received", 83],
		["completed", 100],
		["cancelled", 0],
		["disputed", 0],
	] as const)("reports %s as %d%% done", (status, expected) => {
		expect(progressPercentage(status)).toBe(expected);
	});

	it("labels the action each status waits for", () => {
		expect(currentAction("pending_payment")).toBe("Buyer uploads payment proof");
		expect(currentAction("paid")).toBe("Seller uploads shipping receipt");
		expect(currentAction("shipped")).toBe("Buyer confirms receipt of goods");
		expect(currentAction("goods_received")).toBe("Arbiter releases funds");
		expect(currentAction("disputed")).toBe("Awaiting dispute resolution");
	});
});
