import {
  ArrayMinSize,
  IsArray,
  IsBoolean,
  IsEnum,
  IsIn,
  IsInt,
  IsOptional,
  IsString,
  Matches,
  MaxLength,
  Min,
  MinLength,
  ValidateNested,
} from 'class-validator';
import { Type } from 'class-transformer';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import {
  AgentTone,
  FieldType,
  Industry,
  SUPPORTED_LANGUAGES,
  TtsVoice,
} from '../../intake/intake.types';

export class FieldDto {
  @ApiProperty({ example: 'email', description: 'Record key; letters, digits and _' })
  @IsString()
  @Matches(/^[A-Za-z][A-Za-z0-9_]*$/, {
    message: 'key must start with a letter and contain only letters, digits or _',
  })
  @MaxLength(100)
  key!: string;

  @ApiProperty({ example: 'Email address' })
  @IsString()
  @MinLength(1)
  @MaxLength(200)
  label!: string;

  @ApiProperty({ enum: FieldType, example: FieldType.EMAIL })
  @IsEnum(FieldType)
  type!: FieldType;

  @ApiPropertyOptional({ default: false })
  @IsOptional()
  @IsBoolean()
  required: boolean = false;

  @ApiPropertyOptional({ example: 'Where we send the confirmation' })
  @IsOptional()
  @IsString()
  @MaxLength(1000)
  description?: string;

  @ApiPropertyOptional({ type: [String], description: 'Options for choice and multichoice fields' })
  @IsOptional()
  @IsArray()
  @IsString({ each: true })
  choices?: string[];

  @ApiPropertyOptional({ example: 'jane@example.com' })
  @IsOptional()
  @IsString()
  @MaxLength(200)
  example?: string;

  @ApiPropertyOptional({ example: 1 })
  @IsOptional()
  @IsInt()
  @Min(0)
  order?: number;
}

export class AgentDto {
  @ApiProperty({ example: 'Ava' })
  @IsString()
  @MinLength(1)
  @MaxLength(100)
  name!: string;

  @ApiPropertyOptional({ enum: AgentTone, default: AgentTone.PROFESSIONAL })
  @IsOptional()
  @IsEnum(AgentTone)
  tone: AgentTone = AgentTone.PROFESSIONAL;

  @ApiPropertyOptional({ description: 'First thing the agent says; generated when omitted' })
  @IsOptional()
  @IsString()
  @MaxLength(1000)
  greeting?: string;

  @ApiPropertyOptional({ description: 'What the agent says once everything is collected' })
  @IsOptional()
  @IsString()
  @MaxLength(1000)
  closing?: string;

  @ApiPropertyOptional({ enum: TtsVoice, default: TtsVoice.NOVA })
  @IsOptional()
  @IsEnum(TtsVoice)
  voice: TtsVoice = TtsVoice.NOVA;

  @ApiPropertyOptional({ enum: Object.keys(SUPPORTED_LANGUAGES), default: 'en' })
  @IsOptional()
  @IsIn(Object.keys(SUPPORTED_LANGUAGES))
  language: string = 'en';
}

export class BusinessDto {
  @ApiProperty({ example: 'Acme Plumbing' })
  @IsString()
  @MinLength(1)
  @MaxLength(200)
  name!: string;

  @ApiPropertyOptional({ example: 'Emergency and scheduled plumbing repairs' })
  @IsOptional()
  @IsString()
  @MaxLength(2000)
  description?: string;
}

/**
 * DTO for creating a form configuration
 */
export class CreateFormDto {
  @ApiProperty({ example: 'New client intake' })
  @IsString()
  @MinLength(1)
  @MaxLength(255)
  name!: string;

  @ApiPropertyOptional({ enum: Industry, default: Industry.OTHER })
  @IsOptional()
  @IsEnum(Industry)
  industry: Industry = Industry.OTHER;

  @ApiProperty({ type: BusinessDto })
  @ValidateNested()
  @Type(() => BusinessDto)
  business!: BusinessDto;

  @ApiProperty({ type: AgentDto })
  @ValidateNested()
  @Type(() => AgentDto)
  agent!: AgentDto;

  @ApiProperty({ type: [FieldDto] })
  @IsArray()
  @ArrayMinSize(1)
  @ValidateNested({ each: true })
  @Type(() => FieldDto)
  fields!: FieldDto[];

  @ApiPropertyOptional({ default: true })
  @IsOptional()
  @IsBoolean()
  isActive: boolean = true;
}

/**
 * DTO for updating a form configuration. Omitted properties keep their
 * stored values; `business`, `agent` and `fields` are replaced as a whole.
 */
export class UpdateFormDto {
  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  @MinLength(1)
  @MaxLength(255)
  name?: string;

  @ApiPropertyOptional({ enum: Industry })
  @IsOptional()
  @IsEnum(Industry)
  industry?: Industry;

  @ApiPropertyOptional({ type: BusinessDto })
  @IsOptional()
  @ValidateNested()
  @Type(() => BusinessDto)
  business?: BusinessDto;

  @ApiPropertyOptional({ type: AgentDto })
  @IsOptional()
  @ValidateNested()
  @Type(() => AgentDto)
  agent?: AgentDto;

  @ApiPropertyOptional({ type: [FieldDto] })
  @IsOptional()
  @IsArray()
  @ArrayMinSize(1)
  @ValidateNested({ each: true })
  @Type(() => FieldDto)
  fields?: FieldDto[];

  @ApiPropertyOptional()
  @IsOptional()
  @IsBoolean()
  isActive?: boolean;
}

export class FromTemplateQueryDto {
  @ApiProperty({ example: 'Acme Plumbing', description: 'Your business name' })
  @IsString()
  @MinLength(1)
  @MaxLength(200)
  businessName!: string;
}
