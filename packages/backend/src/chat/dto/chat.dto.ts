import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import {
  IsBoolean,
  IsIn,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  IsUUID,
  Matches,
  Max,
  MaxLength,
  Min,
} from 'class-validator';
import { SUPPORTED_LANGUAGES } from '../../intake/intake.types';

const SESSION_ID_PATTERN = /^[A-Za-z0-9_-]{1,64}$/;

export class StartChatDto {
  @ApiProperty({ description: 'Form configuration to run' })
  @IsUUID()
  formId!: string;

  @ApiPropertyOptional({ enum: Object.keys(SUPPORTED_LANGUAGES) })
  @IsOptional()
  @IsIn(Object.keys(SUPPORTED_LANGUAGES))
  language?: string;

  @ApiPropertyOptional({ description: 'Client-chosen session id; generated when omitted' })
  @IsOptional()
  @Matches(SESSION_ID_PATTERN, { message: 'sessionId may contain letters, digits, _ and - only' })
  sessionId?: string;
}

export class SendMessageDto {
  @ApiProperty()
  @IsString()
  @IsNotEmpty()
  sessionId!: string;

  @ApiProperty({ description: 'What the user said or typed' })
  @IsString()
  @IsNotEmpty()
  @MaxLength(4000)
  message!: string;

  @ApiPropertyOptional({ description: 'Message came from speech-to-text' })
  @IsOptional()
  @IsBoolean()
  isVoice?: boolean;
}

export class ListSessionsQueryDto {
  @ApiPropertyOptional()
  @IsOptional()
  @IsUUID()
  formId?: string;

  @ApiPropertyOptional({ default: 50 })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(500)
  limit?: number;
}
