import {
	ApiHideProperty,
	ApiProperty,
	ApiPropertyOptional,
} from "@nestjs/swagger";
import { IsIn, IsOptional, IsString } from "class-validator";
import { GetRoomDto } from "../../rooms/dto/get-room.dto";
import { GetEscrowTransactionDto } from "../../escrows/transactions/dto/get-escrow-transaction.dto";
import { EvidenceFileDto } from "../../escrows/evidence/dto/evidence.dto";
import {
	TRANSACTION_STATUS,
	TransactionStatus,
} from "../../escrows/transactions/escrow-transaction.entity";

export class AdminRoomDetailsDto {
	@ApiProperty({ type: () => GetRoomDto })
	room!: GetRoomDto;

	@ApiPropertyOptional({ type: () => GetEscrowTransactionDto })
	transaction?: GetEscrowTransactionDto;
}

export class AdminTransactionDetailsDto {
	@ApiProperty({ type: () => GetEscrowTransactionDto })
	transaction!: GetEscrowTransactionDto;

	@ApiProperty({ type: () => EvidenceFileDto, isArray: true })
	evidence!: EvidenceFileDto[];
}

export class ReviewResultDto {
	@ApiProperty({ type: () => EvidenceFileDto })
	evidence!: EvidenceFileDto;

	@ApiProperty({ type: () => GetEscrowTransactionDto })
	transaction!: GetEscrowTransactionDto;
}

export class TransactionFilterDto {
	@ApiPropertyOptional({ enum: TRANSACTION_STATUS })
	@IsOptional()
	@IsIn(TRANSACTION_STATUS)
	status?: TransactionStatus;

	@ApiPropertyOptional({ description: "Room external id" })
	@IsOptional()
	@IsString()
	roomId?: string;

	// paging parameters, parsed separately by the controller
	@ApiHideProperty()
	@IsOptional()
	@IsString()
	limit?: string;

	@ApiHideProperty()
	@IsOptional()
	@IsString()
	cursor?: string;
}

export class GetAdminStatsDto {
	@ApiProperty({ example: 12 })
	totalRooms!: number;

	@ApiProperty({ example: 9 })
	freeRooms!: number;

	@ApiProperty({ example: 3 })
	inUseRooms!: number;

	@ApiProperty({ description: "Participants currently online", example: 4 })
	onlineUsers!: number;
}
