import { Module } from "@nestjs/common";
import { TypeOrmModule } from "@nestjs/typeorm";
import { EscrowTransaction } from "./transactions/escrow-transaction.entity";
import { EscrowTransactionsService } from "./transactions/escrow-transactions.service";
import { EvidenceFile } from "./evidence/evidence-file.entity";
import { EvidenceVerificationService } from "./evidence/evidence-verification.service";
import { FundReleaseAuthority } from "./release/fund-release.authority";
import { RoomTransactionController } from "./room-transaction.controller";
import { RoomsModule } from "../rooms/rooms.module";
import { AuditModule } from "../audit/audit.module";
import { EvidenceStoreModule } from "../evidence-store/evidence-store.module";
import { ChatModule } from "../chat/chat.module";

@Module({
	imports: [
		TypeOrmModule.forFeature([EscrowTransaction, EvidenceFile]),
		RoomsModule,
		AuditModule,
		EvidenceStoreModule,
		ChatModule,
	],
	controllers: [RoomTransactionController],
	providers: [
		EscrowTransactionsService,
		EvidenceVerificationService,
		FundReleaseAuthority,
	],
	exports: [
		EscrowTransactionsService,
		EvidenceVerificationService,
		FundReleaseAuthority,
	],
})
export class EscrowsModule {}
