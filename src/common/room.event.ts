export type RoomId = string;
export const SLOT_ROLE = ["buyer", "seller"] as const;
export type SlotRole = (typeof SLOT_ROLE)[number];

export const SLOT_ASSIGNED_ID = "slot.assigned";
export type SlotAssigned = {
	eventId: string;
	roomId: RoomId;
	occupantId: string;
	role: SlotRole;
	name: string;
	assignedAt: string; // ISO timestamp
};

export const SLOT_RELEASED_ID = "slot.released";
export type SlotReleased = {
	eventId: string;
	roomId: RoomId;
	occupantId: string;
	role: SlotRole;
	cause: "left" | "evicted" | "reset";
	releasedAt: string; // ISO timestamp
};

export const MESSAGE_SENT_ID = "message.sent";
export type MessageSent = {
	eventId: string;
	roomId: RoomId;
	messageId: string;
	senderRole: "buyer" | "seller" | "gm" | "system";
	sentAt: string; // ISO timestamp
};
