import { Logger } from "@nestjs/common";
import { nanoid } from "nanoid";
import { mkdir, readFile, rm, stat, writeFile } from "node:fs/promises";
import { extname, join, resolve } from "node:path";
import { BlobRef, EvidenceMetadata, EvidenceStore } from "./evidence-store";

const BLOB_REF = /^[A-Za-z0-9_-]{24}(\.[a-z0-9]{1,8})?$/;
const EXTENSION = /^\.[a-z0-9]{1,8}$/;

/** Evidence bytes as files under one directory, one file per blob. */
export class LocalEvidenceStore implements EvidenceStore {
	private readonly logger = new Logger(LocalEvidenceStore.name);
	private readonly root: string;

	constructor(directory: string) {
		this.root = resolve(directory);
	}

	async put(bytes: Buffer, metadata: EvidenceMetadata): Promise<BlobRef> {
		await mkdir(this.root, { recursive: true });
		const extension = extname(metadata.fileName).toLowerCase();
		const blobRef = `${nanoid(24)}${EXTENSION.test(extension) ? extension : ""}`;
		await writeFile(this.pathOf(blobRef), bytes, { flag: "wx" });
		this.logger.debug(`Stored ${bytes.length} bytes as ${blobRef}`);
		return blobRef;
	}

	async get(blobRef: BlobRef): Promise<Buffer | null> {
		if (!BLOB_REF.test(blobRef)) {
			return null;
		}
		try {
			return await readFile(this.pathOf(blobRef));
		} catch (e) {
			if (isNotFound(e)) return null;
			throw e;
		}
	}

	async exists(blobRef: BlobRef): Promise<boolean> {
		if (!BLOB_REF.test(blobRef)) {
			return false;
		}
		try {
			return (await stat(this.pathOf(blobRef))).isFile();
		} catch (e) {
			if (isNotFound(e)) return false;
			throw e;
		}
	}

	async remove(blobRef: BlobRef): Promise<void> {
		if (!BLOB_REF.test(blobRef)) {
			return;
		}
		await rm(this.pathOf(blobRef), { force: true });
	}

	private pathOf(blobRef: BlobRef): string {
		return join(this.root, blobRef);
	}
}

function isNotFound(e: unknown): boolean {
	return (
		typeof e === "object" && e !== null && "code" in e && e.code === "ENOENT"
	);
}
