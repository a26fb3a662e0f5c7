import {
	Body,
	Controller,
	DefaultValuePipe,
	Get,
	HttpCode,
	HttpStatus,
	NotFoundException,
	Param,
	ParseIntPipe,
	Post,
	Put,
	Query,
	Sse,
	StreamableFile,
	UseGuards,
} from "@nestjs/common";
import {
	ApiBasicAuth,
	ApiBody,
	ApiCreatedResponse,
	ApiOkResponse,
	ApiOperation,
	ApiQuery,
	ApiTags,
	ApiUnauthorizedResponse,
} from "@nestjs/swagger";
import { map, Observable } from "rxjs";
import { ArbiterAuthGuard } from "../../auth/arbiter-auth.guard";
import { Arbiter } from "../../auth/arbiter.decorator";
import { ArbiterIdentity } from "../../auth/arbiter";
import { RoomsService } from "../../rooms/rooms.service";
import { GetRoomDto } from "../../rooms/dto/get-room.dto";
import {
	ExtendRoomInDto,
	ProvisionRoomInDto,
	ResetRoomInDto,
} from "../../rooms/dto/manage-room.dto";
import { AuditService } from "../../audit/audit.service";
import { GetActivityLogDto } from "../../audit/dto/get-activity-log.dto";
import { EscrowTransactionsService } from "../../escrows/transactions/escrow-transactions.service";
import {
	GetEscrowTransactionDto,
	toTransactionDto,
} from "../../escrows/transactions/dto/get-escrow-transaction.dto";
import {
	NotesInDto,
	ReasonInDto,
	RequiredNotesInDto,
	TransactionTermsInDto,
} from "../../escrows/transactions/dto/transaction-input.dto";
import { EvidenceVerificationService } from "../../escrows/evidence/evidence-verification.service";
import {
	EvidenceFileDto,
	ReviewEvidenceInDto,
	toEvidenceDto,
} from "../../escrows/evidence/dto/evidence.dto";
import { FundReleaseAuthority } from "../../escrows/release/fund-release.authority";
import {
	AdminRoomDetailsDto,
	AdminTransactionDetailsDto,
	GetAdminStatsDto,
	ReviewResultDto,
	TransactionFilterDto,
} from "./admin.dto";
import { ParseCursorPipe } from "../../common/pipes/cursor.pipe";
import {
	ApiEnvelope,
	ApiPaginatedEnvelope,
	Cursor,
	envelope,
	getSchemaPathForDto,
	getSchemaPathForPaginatedDto,
	paginatedEnvelope,
} from "../../common/dto/envelopes";
import { unwrap } from "../../common/outcome-http";
import {
	ServerSentEventsService,
	SseEvent,
} from "../../common/server-sent-events.service";
import { ReviewResult } from "../../escrows/evidence/evidence-verification.service";
import { RoomMessagesService } from "../../chat/room-messages.service";
import {
	RoomMessageDto,
	SendMessageInDto,
	toRoomMessageDto,
} from "../../chat/dto/room-message.dto";

const toReviewDto = (result: ReviewResult): ReviewResultDto => ({
	evidence: toEvidenceDto(result.evidence),
	transaction: toTransactionDto(result.transaction, true),
});

@ApiTags("Admin")
@ApiBasicAuth()
@ApiUnauthorizedResponse({ description: "Missing/invalid arbiter credentials" })
@UseGuards(ArbiterAuthGuard)
@Controller("api/admin/v1")
export class AdminController {
	constructor(
		private readonly rooms: RoomsService,
		private readonly audit: AuditService,
		private readonly transactions: EscrowTransactionsService,
		private readonly evidence: EvidenceVerificationService,
		private readonly fundRelease: FundReleaseAuthority,
		private readonly messages: RoomMessagesService,
		private readonly sseService: ServerSentEventsService,
	) {}

	@Get("stats")
	@ApiOperation({ summary: "Room and presence counters for the dashboard" })
	@ApiOkResponse({ schema: getSchemaPathForDto(GetAdminStatsDto) })
	async stats(): Promise<ApiEnvelope<GetAdminStatsDto>> {
		return envelope(await this.rooms.stats());
	}

	// Rooms

	@Post("rooms")
	@ApiOperation({ summary: "Open a new room" })
	@ApiBody({ type: ProvisionRoomInDto })
	@ApiCreatedResponse({ schema: getSchemaPathForDto(GetRoomDto) })
	async provisionRoom(
		@Arbiter() arbiter: ArbiterIdentity,
		@Body() dto: ProvisionRoomInDto,
	): Promise<ApiEnvelope<GetRoomDto>> {
		const room = unwrap(await this.rooms.provision(dto, arbiter));
		return envelope(await this.roomDto(room.externalId));
	}

	@Get("rooms")
	@ApiOperation({ summary: "List all rooms paginated" })
	@ApiQuery({ name: "limit", required: false, schema: { type: "integer" } })
	@ApiQuery({ name: "cursor", required: false, schema: { type: "string" } })
	@ApiOkResponse({ schema: getSchemaPathForPaginatedDto(GetRoomDto) })
	async allRooms(
		@Query("limit", new DefaultValuePipe(20), ParseIntPipe) limit: number,
		@Query("cursor", ParseCursorPipe) cursor: Cursor,
	): Promise<ApiPaginatedEnvelope<GetRoomDto[]>> {
		const { items, nextCursor, total } = await this.rooms.list(
			limit,
			cursor,
			true,
		);
		return paginatedEnvelope(items, { total, nextCursor });
	}

	@Get("rooms/:roomId")
	@ApiOperation({ summary: "Room with occupants and its current transaction" })
	@ApiOkResponse({ schema: getSchemaPathForDto(AdminRoomDetailsDto) })
	async roomDetails(
		@Param("roomId") roomId: string,
	): Promise<ApiEnvelope<AdminRoomDetailsDto>> {
		const room = await this.roomDto(roomId);
		const tx = await this.transactions.findLatestForRoom(roomId);
		return envelope({
			room,
			transaction: tx ? toTransactionDto(tx, true) : undefined,
		});
	}

	@Post("rooms/:roomId/extend")
	@HttpCode(HttpStatus.OK)
	@ApiOperation({ summary: "Push the room's expiry back" })
	@ApiBody({ type: ExtendRoomInDto, required: false })
	@ApiOkResponse({ schema: getSchemaPathForDto(GetRoomDto) })
	async extendRoom(
		@Arbiter() arbiter: ArbiterIdentity,
		@Param("roomId") roomId: string,
		@Body() dto: ExtendRoomInDto,
	): Promise<ApiEnvelope<GetRoomDto>> {
		unwrap(await this.rooms.extend(roomId, arbiter, dto.hours));
		return envelope(await this.roomDto(roomId));
	}

	@Post("rooms/:roomId/reset")
	@HttpCode(HttpStatus.OK)
	@ApiOperation({ summary: "Remove both participants and free the room" })
	@ApiBody({ type: ResetRoomInDto })
	@ApiOkResponse({ schema: getSchemaPathForDto(GetRoomDto) })
	async resetRoom(
		@Arbiter() arbiter: ArbiterIdentity,
		@Param("roomId") roomId: string,
		@Body() dto: ResetRoomInDto,
	): Promise<ApiEnvelope<GetRoomDto>> {
		unwrap(await this.rooms.reset(roomId, arbiter, dto.reason));
		return envelope(await this.roomDto(roomId));
	}

	@Get("rooms/:roomId/activity")
	@ApiOperation({ summary: "The room's activity log in order" })
	@ApiQuery({ name: "limit", required: false, schema: { type: "integer" } })
	@ApiQuery({
		name: "after",
		required: false,
		description: "Return entries after this sequence number",
		schema: { type: "integer" },
	})
	@ApiOkResponse({ schema: getSchemaPathForPaginatedDto(GetActivityLogDto) })
	async roomActivity(
		@Param("roomId") roomId: string,
		@Query("limit", new DefaultValuePipe(50), ParseIntPipe) limit: number,
		@Query("after", new DefaultValuePipe(0), ParseIntPipe) after: number,
	): Promise<ApiPaginatedEnvelope<GetActivityLogDto[]>> {
		const { items, nextSequence, total } = await this.audit.list(
			roomId,
			limit,
			after,
		);
		return paginatedEnvelope(items, {
			total,
			nextCursor: nextSequence === undefined ? undefined : String(nextSequence),
		});
	}

	@Get("rooms/:roomId/messages")
	@ApiOperation({ summary: "The room's chat, oldest first" })
	@ApiQuery({ name: "limit", required: false, schema: { type: "integer" } })
	@ApiOkResponse({ type: RoomMessageDto, isArray: true })
	async roomMessages(
		@Param("roomId") roomId: string,
		@Query("limit", new DefaultValuePipe(100), ParseIntPipe) limit: number,
	): Promise<ApiEnvelope<RoomMessageDto[]>> {
		return envelope(await this.messages.list(roomId, limit));
	}

	@Post("rooms/:roomId/messages")
	@ApiOperation({ summary: "Post a notice into the room's chat" })
	@ApiBody({ type: SendMessageInDto })
	@ApiCreatedResponse({ schema: getSchemaPathForDto(RoomMessageDto) })
	async sendMessage(
		@Arbiter() arbiter: ArbiterIdentity,
		@Param("roomId") roomId: string,
		@Body() dto: SendMessageInDto,
	): Promise<ApiEnvelope<RoomMessageDto>> {
		const message = unwrap(
			await this.messages.sendAsArbiter(roomId, arbiter, dto.message),
		);
		return envelope(toRoomMessageDto(message));
	}

	// Evidence

	@Get("evidence/pending")
	@ApiOperation({ summary: "Evidence waiting for review, oldest first" })
	@ApiOkResponse({ type: EvidenceFileDto, isArray: true })
	async pendingEvidence(): Promise<ApiEnvelope<EvidenceFileDto[]>> {
		const files = await this.evidence.listPending();
		return envelope(files.map(toEvidenceDto));
	}

	@Post("evidence/:evidenceId/approve")
	@HttpCode(HttpStatus.OK)
	@ApiOperation({ summary: "Verify evidence and advance the transaction" })
	@ApiBody({ type: ReviewEvidenceInDto, required: false })
	@ApiOkResponse({ schema: getSchemaPathForDto(ReviewResultDto) })
	async approveEvidence(
		@Arbiter() arbiter: ArbiterIdentity,
		@Param("evidenceId") evidenceId: string,
		@Body() dto: ReviewEvidenceInDto,
	): Promise<ApiEnvelope<ReviewResultDto>> {
		const result = unwrap(
			await this.evidence.approve(evidenceId, arbiter, dto.step),
		);
		return envelope(toReviewDto(result));
	}

	@Post("evidence/:evidenceId/reject")
	@HttpCode(HttpStatus.OK)
	@ApiOperation({ summary: "Reject evidence with a reason" })
	@ApiBody({ type: ReviewEvidenceInDto })
	@ApiOkResponse({ schema: getSchemaPathForDto(ReviewResultDto) })
	async rejectEvidence(
		@Arbiter() arbiter: ArbiterIdentity,
		@Param("evidenceId") evidenceId: string,
		@Body() dto: ReviewEvidenceInDto,
	): Promise<ApiEnvelope<ReviewResultDto>> {
		const result = unwrap(
			await this.evidence.reject(
				evidenceId,
				arbiter,
				dto.reason ?? "",
				dto.step,
			),
		);
		return envelope(toReviewDto(result));
	}

	@Get("evidence/:evidenceId/content")
	@ApiOperation({ summary: "Download the evidence file" })
	async evidenceContent(
		@Param("evidenceId") evidenceId: string,
	): Promise<StreamableFile> {
		const { evidence, bytes } = unwrap(await this.evidence.content(evidenceId));
		return new StreamableFile(bytes, {
			type: evidence.mimeType,
			disposition: `inline; filename="${evidence.fileName.replace(/"/g, "")}"`,
			length: bytes.length,
		});
	}

	// Transactions

	@Get("transactions")
	@ApiOperation({ summary: "List transactions paginated" })
	@ApiQuery({ name: "limit", required: false, schema: { type: "integer" } })
	@ApiQuery({ name: "cursor", required: false, schema: { type: "string" } })
	@ApiOkResponse({
		schema: getSchemaPathForPaginatedDto(GetEscrowTransactionDto),
	})
	async allTransactions(
		@Query() filter: TransactionFilterDto,
		@Query("limit", new DefaultValuePipe(20), ParseIntPipe) limit: number,
		@Query("cursor", ParseCursorPipe) cursor: Cursor,
	): Promise<ApiPaginatedEnvelope<GetEscrowTransactionDto[]>> {
		const { items, nextCursor, total } = await this.transactions.list(
			{ status: filter.status, roomId: filter.roomId },
			limit,
			cursor,
		);
		return paginatedEnvelope(items, { total, nextCursor });
	}

	@Get("transactions/:transactionId")
	@ApiOperation({ summary: "Transaction with all its evidence" })
	@ApiOkResponse({ schema: getSchemaPathForDto(AdminTransactionDetailsDto) })
	async transactionDetails(
		@Param("transactionId") transactionId: string,
	): Promise<ApiEnvelope<AdminTransactionDetailsDto>> {
		const tx = await this.transactions.findByExternalId(transactionId);
		if (!tx) throw new NotFoundException("Transaction not found");
		const files = await this.evidence.listForTransaction(transactionId);
		return envelope({
			transaction: toTransactionDto(tx, true),
			evidence: files.map(toEvidenceDto),
		});
	}

	@Put("transactions/:transactionId/terms")
	@ApiOperation({ summary: "Set amount, commission and fee" })
	@ApiBody({ type: TransactionTermsInDto })
	@ApiOkResponse({ schema: getSchemaPathForDto(GetEscrowTransactionDto) })
	async setTerms(
		@Arbiter() arbiter: ArbiterIdentity,
		@Param("transactionId") transactionId: string,
		@Body() dto: TransactionTermsInDto,
	): Promise<ApiEnvelope<GetEscrowTransactionDto>> {
		const tx = unwrap(
			await this.transactions.setTerms(transactionId, arbiter, dto),
		);
		return envelope(toTransactionDto(tx, true));
	}

	@Post("transactions/:transactionId/notes")
	@HttpCode(HttpStatus.OK)
	@ApiOperation({ summary: "Append to the arbiter's notes" })
	@ApiBody({ type: RequiredNotesInDto })
	@ApiOkResponse({ schema: getSchemaPathForDto(GetEscrowTransactionDto) })
	async addNotes(
		@Arbiter() arbiter: ArbiterIdentity,
		@Param("transactionId") transactionId: string,
		@Body() dto: RequiredNotesInDto,
	): Promise<ApiEnvelope<GetEscrowTransactionDto>> {
		const tx = unwrap(
			await this.transactions.updateNotes(transactionId, arbiter, dto.notes),
		);
		return envelope(toTransactionDto(tx, true));
	}

	@Post("transactions/:transactionId/release-funds")
	@HttpCode(HttpStatus.OK)
	@ApiOperation({ summary: "Release the escrowed funds to the seller" })
	@ApiBody({ type: NotesInDto, required: false })
	@ApiOkResponse({ schema: getSchemaPathForDto(GetEscrowTransactionDto) })
	async releaseFunds(
		@Arbiter() arbiter: ArbiterIdentity,
		@Param("transactionId") transactionId: string,
		@Body() dto: NotesInDto,
	): Promise<ApiEnvelope<GetEscrowTransactionDto>> {
		const tx = unwrap(
			await this.fundRelease.release(transactionId, arbiter, dto.notes),
		);
		return envelope(toTransactionDto(tx, true));
	}

	@Post("transactions/:transactionId/cancel")
	@HttpCode(HttpStatus.OK)
	@ApiOperation({ summary: "Cancel an open transaction" })
	@ApiBody({ type: ReasonInDto })
	@ApiOkResponse({ schema: getSchemaPathForDto(GetEscrowTransactionDto) })
	async cancel(
		@Arbiter() arbiter: ArbiterIdentity,
		@Param("transactionId") transactionId: string,
		@Body() dto: ReasonInDto,
	): Promise<ApiEnvelope<GetEscrowTransactionDto>> {
		const tx = unwrap(
			await this.transactions.cancel(transactionId, arbiter, dto.reason),
		);
		return envelope(toTransactionDto(tx, true));
	}

	@Post("transactions/:transactionId/dispute")
	@HttpCode(HttpStatus.OK)
	@ApiOperation({ summary: "Mark an open transaction as disputed" })
	@ApiBody({ type: ReasonInDto })
	@ApiOkResponse({ schema: getSchemaPathForDto(GetEscrowTransactionDto) })
	async dispute(
		@Arbiter() arbiter: ArbiterIdentity,
		@Param("transactionId") transactionId: string,
		@Body() dto: ReasonInDto,
	): Promise<ApiEnvelope<GetEscrowTransactionDto>> {
		const tx = unwrap(
			await this.transactions.dispute(transactionId, arbiter, dto.reason),
		);
		return envelope(toTransactionDto(tx, true));
	}

	@Sse("events")
	@ApiOperation({ summary: "Live updates for every room" })
	sse(): Observable<SseEvent> {
		return this.sseService.adminEvents.pipe(
			map((event) => ({
				data: event,
			})),
		);
	}

	private async roomDto(roomId: string): Promise<GetRoomDto> {
		const room = await this.rooms.details(roomId, true);
		if (!room) throw new NotFoundException("Room not found");
		return room;
	}
}
