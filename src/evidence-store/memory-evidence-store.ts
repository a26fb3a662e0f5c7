import { nanoid } from "nanoid";
import { BlobRef, EvidenceMetadata, EvidenceStore } from "./evidence-store";

/**
 * In-memory evidence store.
 *
 * Used under test and for short-lived development instances; data is lost
 * when the process exits.
 */
export class MemoryEvidenceStore implements EvidenceStore {
	private blobs: Map<BlobRef, { bytes: Buffer; metadata: EvidenceMetadata }> =
		new Map();

	async put(bytes: Buffer, metadata: EvidenceMetadata): Promise<BlobRef> {
		const blobRef = `mem/${nanoid(24)}`;
		// Copy to prevent external mutations
		this.blobs.set(blobRef, { bytes: Buffer.from(bytes), metadata });
		return blobRef;
	}

	async get(blobRef: BlobRef): Promise<Buffer | null> {
		const blob = this.blobs.get(blobRef);
		return blob ? Buffer.from(blob.bytes) : null;
	}

	async exists(blobRef: BlobRef): Promise<boolean> {
		return this.blobs.has(blobRef);
	}

	async remove(blobRef: BlobRef): Promise<void> {
		this.blobs.delete(blobRef);
	}

	size(): number {
		return this.blobs.size;
	}
}
