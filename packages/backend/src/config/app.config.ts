import { ConfigService } from '@nestjs/config';
import { plainToInstance } from 'class-transformer';
import {
  IsIn,
  IsInt,
  IsNumber,
  IsOptional,
  IsString,
  Max,
  Min,
  validateSync,
} from 'class-validator';
import { SUPPORTED_LANGUAGES } from '../intake/intake.types';

export type SessionConflictPolicy = 'reject' | 'queue';
export type SessionStoreKind = 'postgres' | 'memory';

/**
 * Environment variables read by the application.
 *
 * Validated once at startup by ConfigModule; an invalid value stops the
 * process before any module is created.
 */
export class EnvironmentVariables {
  @IsOptional()
  @IsIn(['development', 'production', 'test'])
  NODE_ENV?: string;

  @IsOptional()
  @IsInt()
  @Min(1)
  PORT?: number;

  @IsOptional()
  @IsString()
  CORS_ORIGINS?: string;

  @IsOptional()
  @IsIn(['debug', 'verbose', 'info', 'warn', 'error'])
  LOG_LEVEL?: string;

  @IsOptional()
  @IsString()
  ANTHROPIC_API_KEY?: string;

  @IsOptional()
  @IsString()
  ANTHROPIC_MODEL?: string;

  @IsOptional()
  @IsInt()
  @Min(1)
  ANTHROPIC_MAX_TOKENS?: number;

  @IsOptional()
  @IsNumber()
  @Min(0)
  @Max(1)
  ANTHROPIC_TEMPERATURE?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  PROVIDER_TIMEOUT_MS?: number;

  @IsOptional()
  @IsInt()
  @Min(0)
  @Max(10)
  PROVIDER_MAX_RETRIES?: number;

  @IsOptional()
  @IsInt()
  @Min(0)
  PROVIDER_RETRY_BASE_MS?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  EXTRACTION_CONTEXT_TURNS?: number;

  @IsOptional()
  @IsIn(['reject', 'queue'])
  SESSION_CONFLICT_POLICY?: SessionConflictPolicy;

  @IsOptional()
  @IsIn(['postgres', 'memory'])
  SESSION_STORE?: SessionStoreKind;

  @IsOptional()
  @IsIn(Object.keys(SUPPORTED_LANGUAGES))
  DEFAULT_LANGUAGE?: string;

  @IsOptional()
  @IsString()
  DATABASE_HOST?: string;

  @IsOptional()
  @IsInt()
  DATABASE_PORT?: number;

  @IsOptional()
  @IsString()
  DATABASE_USER?: string;

  @IsOptional()
  @IsString()
  DATABASE_PASSWORD?: string;

  @IsOptional()
  @IsString()
  DATABASE_NAME?: string;
}

export function validateEnvironment(config: Record<string, unknown>): EnvironmentVariables {
  const validated = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: true,
  });
  const errors = validateSync(validated, { skipMissingProperties: false });

  if (errors.length > 0) {
    const details = errors
      .map((error) => Object.values(error.constraints ?? {}).join(', '))
      .join('; ');
    throw new Error(`Invalid environment configuration: ${details}`);
  }

  return validated;
}

export type SettingKey = keyof EnvironmentVariables;

/**
 * Read a numeric setting, tolerating raw string values from process.env
 */
export function numberSetting(config: ConfigService, key: SettingKey, fallback: number): number {
  const raw = config.get<string | number>(key);
  if (raw === undefined || raw === '') {
    return fallback;
  }
  const parsed = typeof raw === 'number' ? raw : Number(raw);
  return Number.isFinite(parsed) ? parsed : fallback;
}

export function stringSetting(config: ConfigService, key: SettingKey, fallback: string): string {
  const raw = config.get<string>(key);
  return raw === undefined || raw === '' ? fallback : String(raw);
}

export function conflictPolicySetting(config: ConfigService): SessionConflictPolicy {
  return stringSetting(config, 'SESSION_CONFLICT_POLICY', 'reject') === 'queue' ? 'queue' : 'reject';
}

export function sessionStoreSetting(config: ConfigService): SessionStoreKind {
  return stringSetting(config, 'SESSION_STORE', 'postgres') === 'memory' ? 'memory' : 'postgres';
}
