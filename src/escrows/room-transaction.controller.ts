import {
	Body,
	Controller,
	Delete,
	Get,
	HttpCode,
	HttpStatus,
	NotFoundException,
	Param,
	Post,
	UseGuards,
} from "@nestjs/common";
import {
	ApiBody,
	ApiCreatedResponse,
	ApiHeader,
	ApiNotFoundResponse,
	ApiOkResponse,
	ApiOperation,
	ApiParam,
	ApiTags,
	ApiUnauthorizedResponse,
} from "@nestjs/swagger";
import { EscrowTransactionsService } from "./transactions/escrow-transactions.service";
import {
	GetEscrowTransactionDto,
	toTransactionDto,
} from "./transactions/dto/get-escrow-transaction.dto";
import { NotesInDto, ReasonInDto } from "./transactions/dto/transaction-input.dto";
import { EvidenceVerificationService } from "./evidence/evidence-verification.service";
import {
	EvidenceFileDto,
	toEvidenceDto,
	UploadEvidenceInDto,
} from "./evidence/dto/evidence.dto";
import { RoomSessionGuard, ROOM_SESSION_HEADER } from "../rooms/room-session.guard";
import { Occupant } from "../rooms/occupant.decorator";
import { RoomOccupant } from "../rooms/room-occupant.entity";
import {
	ApiEnvelope,
	envelope,
	getSchemaPathForDto,
} from "../common/dto/envelopes";
import { unwrap } from "../common/outcome-http";

@ApiTags("2 - Room transaction")
@ApiHeader({
	name: ROOM_SESSION_HEADER,
	description: "Session token issued when joining the room",
	required: true,
})
@ApiParam({ name: "roomId", description: "Room external id" })
@ApiUnauthorizedResponse({ description: "Missing/invalid room session" })
@UseGuards(RoomSessionGuard)
@Controller("api/v1/rooms/:roomId/transaction")
export class RoomTransactionController {
	constructor(
		private readonly transactions: EscrowTransactionsService,
		private readonly evidence: EvidenceVerificationService,
	) {}

	@Get("")
	@ApiOperation({ summary: "The room's current (or last) transaction" })
	@ApiOkResponse({ schema: getSchemaPathForDto(GetEscrowTransactionDto) })
	@ApiNotFoundResponse({ description: "No transaction opened yet" })
	async current(
		@Param("roomId") roomId: string,
	): Promise<ApiEnvelope<GetEscrowTransactionDto>> {
		const tx = await this.transactions.findLatestForRoom(roomId);
		if (!tx) throw new NotFoundException("No transaction in this room yet");
		return envelope(toTransactionDto(tx));
	}

	@Get("evidence")
	@ApiOperation({ summary: "Evidence uploaded for the current transaction" })
	@ApiOkResponse({ type: EvidenceFileDto, isArray: true })
	async evidenceList(
		@Param("roomId") roomId: string,
	): Promise<ApiEnvelope<EvidenceFileDto[]>> {
		const tx = await this.transactions.findLatestForRoom(roomId);
		if (!tx) return envelope([]);
		const files = await this.evidence.listForTransaction(tx.externalId);
		return envelope(files.map(toEvidenceDto));
	}

	@Post("evidence")
	@ApiOperation({
		summary:
			"Upload a payment proof (buyer), shipping receipt (seller) or identity document",
	})
	@ApiBody({ type: UploadEvidenceInDto })
	@ApiCreatedResponse({ schema: getSchemaPathForDto(EvidenceFileDto) })
	async upload(
		@Param("roomId") roomId: string,
		@Occupant() occupant: RoomOccupant,
		@Body() dto: UploadEvidenceInDto,
	): Promise<ApiEnvelope<EvidenceFileDto>> {
		const file = unwrap(
			await this.evidence.upload({
				roomId,
				uploaderId: occupant.externalId,
				fileType: dto.fileType,
				fileName: dto.fileName,
				mimeType: dto.mimeType,
				bytes: Buffer.from(dto.contentBase64, "base64"),
				terms: dto.terms,
			}),
		);
		return envelope(toEvidenceDto(file));
	}

	@Post("confirm-receipt")
	@HttpCode(HttpStatus.OK)
	@ApiOperation({ summary: "Buyer confirms the goods arrived" })
	@ApiBody({ type: NotesInDto, required: false })
	@ApiOkResponse({ schema: getSchemaPathForDto(GetEscrowTransactionDto) })
	async confirmReceipt(
		@Param("roomId") roomId: string,
		@Occupant() occupant: RoomOccupant,
		@Body() dto: NotesInDto,
	): Promise<ApiEnvelope<GetEscrowTransactionDto>> {
		const active = await this.transactions.findActiveForRoom(roomId);
		if (!active) throw new NotFoundException("No open transaction in this room");
		const tx = unwrap(
			await this.transactions.confirmReceipt(
				active.externalId,
				occupant,
				dto.notes,
			),
		);
		return envelope(toTransactionDto(tx));
	}

	@Delete("evidence/:evidenceId")
	@ApiOperation({ summary: "Withdraw a file you uploaded that is still pending" })
	@ApiParam({ name: "evidenceId", description: "Evidence external id" })
	@ApiOkResponse({ schema: getSchemaPathForDto(EvidenceFileDto) })
	async withdraw(
		@Param("evidenceId") evidenceId: string,
		@Occupant() occupant: RoomOccupant,
	): Promise<ApiEnvelope<EvidenceFileDto>> {
		const file = unwrap(await this.evidence.withdraw(evidenceId, occupant));
		return envelope(toEvidenceDto(file));
	}

	@Post("dispute")
	@HttpCode(HttpStatus.OK)
	@ApiOperation({ summary: "Buyer or seller escalates the transaction to the arbiter" })
	@ApiBody({ type: ReasonInDto })
	@ApiOkResponse({ schema: getSchemaPathForDto(GetEscrowTransactionDto) })
	async dispute(
		@Param("roomId") roomId: string,
		@Occupant() occupant: RoomOccupant,
		@Body() dto: ReasonInDto,
	): Promise<ApiEnvelope<GetEscrowTransactionDto>> {
		const active = await this.transactions.findActiveForRoom(roomId);
		if (!active) throw new NotFoundException("No open transaction in this room");
		const tx = unwrap(
			await this.transactions.raiseDispute(
				active.externalId,
				occupant,
				dto.reason,
			),
		);
		return envelope(toTransactionDto(tx));
	}
}
