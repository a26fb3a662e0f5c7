/** The moderator who verifies evidence and releases funds. */
export type ArbiterIdentity = {
	id: string;
	name: string;
};
