import { Module } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { EVIDENCE_STORE, EvidenceStore } from "./evidence-store";
import { LocalEvidenceStore } from "./local-evidence-store";
import { MemoryEvidenceStore } from "./memory-evidence-store";

@Module({
	providers: [
		{
			provide: EVIDENCE_STORE,
			inject: [ConfigService],
			useFactory: (config: ConfigService): EvidenceStore => {
				if (process.env.NODE_ENV === "test") {
					return new MemoryEvidenceStore();
				}
				return new LocalEvidenceStore(
					config.get<string>("EVIDENCE_STORAGE_DIR") ?? "./storage/evidence",
				);
			},
		},
	],
	exports: [EVIDENCE_STORE],
})
export class EvidenceStoreModule {}
