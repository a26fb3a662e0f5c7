/**
 * Evidence Store
 *
 * Where uploaded evidence bytes live. The escrow core only keeps the opaque
 * `blobRef` returned by `put` and checks `exists` before accepting a record.
 */

export type BlobRef = string;

export type EvidenceMetadata = {
	fileName: string;
	mimeType: string;
};

export interface EvidenceStore {
	/** Stores the bytes and returns a reference for later retrieval. */
	put(bytes: Buffer, metadata: EvidenceMetadata): Promise<BlobRef>;

	/** Returns the bytes, or null when nothing is stored under the reference. */
	get(blobRef: BlobRef): Promise<Buffer | null>;

	exists(blobRef: BlobRef): Promise<boolean>;

	/** Removes an orphaned blob. Removing a missing blob is a no-op. */
	remove(blobRef: BlobRef): Promise<void>;
}

export const EVIDENCE_STORE = Symbol("EVIDENCE_STORE");
