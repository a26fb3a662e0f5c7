import { Injectable, Logger } from "@nestjs/common";
import { ArbiterAuthService } from "../../auth/arbiter-auth.service";
import { ArbiterIdentity } from "../../auth/arbiter";
import { failure, Outcome } from "../../common/outcome";
import { EscrowTransactionsService } from "../transactions/escrow-transactions.service";
import { EscrowTransaction } from "../transactions/escrow-transaction.entity";

/**
 * Final gate before funds leave escrow: only a configured arbiter, always
 * attributed, at most once per transaction.
 */
@Injectable()
export class FundReleaseAuthority {
	private readonly logger = new Logger(FundReleaseAuthority.name);

	constructor(
		private readonly arbiters: ArbiterAuthService,
		private readonly transactions: EscrowTransactionsService,
	) {}

	async release(
		transactionId: string,
		arbiter: ArbiterIdentity,
		notes?: string,
	): Promise<Outcome<EscrowTransaction>> {
		if (!this.arbiters.isAuthorized(arbiter)) {
			this.logger.warn(
				`Refused fund release of ${transactionId} requested by '${arbiter.id}'`,
			);
			return failure(
				"ArbiterNotAuthorized",
				"Only the configured arbiter can release funds",
			);
		}
		this.logger.log(
			`Arbiter ${arbiter.name} (${arbiter.id}) requested fund release of ${transactionId}`,
		);
		const outcome = await this.transactions.releaseFunds(
			transactionId,
			arbiter,
			notes,
		);
		if (outcome.ok) {
			this.logger.log(
				`Funds of ${outcome.value.transactionNumber} released by ${arbiter.name}`,
			);
		} else {
			this.logger.warn(
				`Fund release of ${transactionId} refused: ${outcome.failure.kind}`,
			);
		}
		return outcome;
	}
}
