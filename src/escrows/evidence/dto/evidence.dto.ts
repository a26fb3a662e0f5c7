import { ApiProperty, ApiPropertyOptional } from "@nestjs/swagger";
import { Type } from "class-transformer";
import {
	IsBase64,
	IsIn,
	IsNotEmpty,
	IsOptional,
	IsString,
	MaxLength,
	ValidateNested,
} from "class-validator";
import {
	EVIDENCE_STATUS,
	EVIDENCE_TYPE,
	EvidenceFile,
	EvidenceStatus,
	EvidenceType,
} from "../evidence-file.entity";
import { SLOT_ROLE, SlotRole } from "../../../common/room.event";
import { TransactionTermsInDto } from "../../transactions/dto/transaction-input.dto";
import { VERIFICATION_STEP, VerificationStep } from "../evidence-routing";

export class UploadEvidenceInDto {
	@ApiProperty({ enum: EVIDENCE_TYPE })
	@IsIn(EVIDENCE_TYPE)
	fileType!: EvidenceType;

	@ApiProperty({ example: "transfer.jpg" })
	@IsString()
	@IsNotEmpty()
	@MaxLength(255)
	fileName!: string;

	@ApiProperty({ example: "image/jpeg" })
	@IsString()
	@IsIn(["image/jpeg", "image/png", "image/webp", "application/pdf"])
	mimeType!: string;

	@ApiProperty({ description: "File content, base64 encoded" })
	@IsString()
	@IsBase64()
	contentBase64!: string;

	@ApiPropertyOptional({
		type: () => TransactionTermsInDto,
		description: "Terms for the transaction opened by the first upload",
	})
	@IsOptional()
	@ValidateNested()
	@Type(() => TransactionTermsInDto)
	terms?: TransactionTermsInDto;
}

export class ReviewEvidenceInDto {
	@ApiPropertyOptional({
		enum: VERIFICATION_STEP,
		description: "Step the arbiter means to verify; refused when the file is of another type",
	})
	@IsOptional()
	@IsIn(VERIFICATION_STEP)
	step?: VerificationStep;

	@ApiPropertyOptional({ description: "Required when rejecting" })
	@IsOptional()
	@IsString()
	@MaxLength(1000)
	reason?: string;
}

export class EvidenceFileDto {
	@ApiProperty({ example: "e5b1n8c3x6z2v9m4" })
	externalId!: string;

	@ApiProperty({ example: "q3f7p9n4z81k6c0b" })
	roomId!: string;

	@ApiProperty({ example: "t8c2v6n1m4x9z7q3" })
	transactionId!: string;

	@ApiProperty({ enum: EVIDENCE_TYPE })
	fileType!: EvidenceType;

	@ApiProperty()
	fileName!: string;

	@ApiProperty()
	mimeType!: string;

	@ApiProperty()
	fileSize!: number;

	@ApiProperty({ description: "Occupant id of the uploader" })
	uploadedBy!: string;

	@ApiProperty({ enum: SLOT_ROLE })
	uploaderRole!: SlotRole;

	@ApiProperty({ enum: EVIDENCE_STATUS })
	status!: EvidenceStatus;

	@ApiPropertyOptional()
	verifiedBy?: string;

	@ApiPropertyOptional({ description: "Unix epoch in milliseconds" })
	verifiedAt?: number;

	@ApiPropertyOptional()
	rejectionReason?: string;

	@ApiProperty({ description: "Unix epoch in milliseconds" })
	createdAt!: number;
}

export function toEvidenceDto(file: EvidenceFile): EvidenceFileDto {
	return {
		externalId: file.externalId,
		roomId: file.roomId,
		transactionId: file.transactionId,
		fileType: file.fileType,
		fileName: file.fileName,
		mimeType: file.mimeType,
		fileSize: file.fileSize,
		uploadedBy: file.uploadedBy,
		uploaderRole: file.uploaderRole,
		status: file.status,
		verifiedBy: file.verifiedBy ?? undefined,
		verifiedAt: file.verifiedAt ? file.verifiedAt.getTime() : undefined,
		rejectionReason: file.rejectionReason ?? undefined,
		createdAt: file.createdAt.getTime(),
	};
}
