import { ApiProperty, ApiPropertyOptional } from "@nestjs/swagger";
import {
	IsInt,
	IsNotEmpty,
	IsOptional,
	IsString,
	Length,
	MaxLength,
	Min,
} from "class-validator";

export class TransactionTermsInDto {
	@ApiProperty({ description: "Minor units", example: 150000 })
	@IsInt()
	@Min(0)
	amount!: number;

	@ApiPropertyOptional({ description: "Minor units", example: 1500 })
	@IsOptional()
	@IsInt()
	@Min(0)
	commission?: number;

	@ApiPropertyOptional({ description: "Minor units", example: 500 })
	@IsOptional()
	@IsInt()
	@Min(0)
	fee?: number;

	@ApiPropertyOptional({ example: "IDR" })
	@IsOptional()
	@IsString()
	@Length(3, 3)
	currency?: string;
}

export class NotesInDto {
	@ApiPropertyOptional({ maxLength: 2000 })
	@IsOptional()
	@IsString()
	@MaxLength(2000)
	notes?: string;
}

export class RequiredNotesInDto {
	@ApiProperty({ maxLength: 2000 })
	@IsString()
	@IsNotEmpty()
	@MaxLength(2000)
	notes!: string;
}

export class ReasonInDto {
	@ApiProperty({ maxLength: 1000, example: "Buyer and seller asked to stop" })
	@IsString()
	@MaxLength(1000)
	reason!: string;
}
