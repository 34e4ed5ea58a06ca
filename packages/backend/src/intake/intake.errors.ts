import { PatchOperation } from './intake.types';
import { ProviderErrorCode, RetryAttempt } from './provider-retry.types';

/**
 * Stable error codes returned to API clients
 */
export enum IntakeErrorCode {
  CONFIGURATION_INVALID = 'CONFIGURATION_INVALID',
  PROVIDER_FAILED = 'PROVIDER_FAILED',
  AGENT_RETRYABLE = 'AGENT_RETRYABLE',
  PATCH_INVALID = 'PATCH_INVALID',
  SESSION_CONFLICT = 'SESSION_CONFLICT',
  SESSION_NOT_FOUND = 'SESSION_NOT_FOUND',
  FORM_NOT_FOUND = 'FORM_NOT_FOUND',
}

export abstract class IntakeError extends Error {
  abstract readonly code: IntakeErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Malformed or empty form configuration. Rejected before any turn runs.
 */
export class ConfigurationError extends IntakeError {
  readonly code = IntakeErrorCode.CONFIGURATION_INVALID;

  constructor(readonly problems: string[]) {
    super(`Invalid form configuration: ${problems.join('; ')}`);
  }
}

/**
 * An external capability call failed after the retry budget was spent
 */
export class ProviderError extends IntakeError {
  readonly code = IntakeErrorCode.PROVIDER_FAILED;

  constructor(
    message: string,
    readonly providerCode: ProviderErrorCode,
    readonly retryable: boolean,
    readonly attempts: RetryAttempt[] = [],
    cause?: unknown,
  ) {
    super(message, { cause });
  }
}

export type AgentStage = 'reply' | 'extraction';

/**
 * A turn failed without changing the session; the caller may resend it
 */
export class RetryableAgentError extends IntakeError {
  readonly code = IntakeErrorCode.AGENT_RETRYABLE;

  constructor(
    readonly sessionId: string,
    readonly stage: AgentStage,
    cause: unknown,
  ) {
    super(
      stage === 'reply'
        ? 'The assistant could not reply right now. Please try again.'
        : 'The assistant could not process your answer right now. Please try again.',
      { cause },
    );
  }
}

/**
 * One patch operation could not be applied. Logged and dropped.
 */
export class PatchValidationError extends IntakeError {
  readonly code = IntakeErrorCode.PATCH_INVALID;

  constructor(
    readonly operation: PatchOperation | unknown,
    readonly reason: string,
  ) {
    super(`Rejected patch operation: ${reason}`);
  }
}

/**
 * Another request is mutating the same session
 */
export class ConflictError extends IntakeError {
  readonly code = IntakeErrorCode.SESSION_CONFLICT;

  constructor(readonly sessionId: string, detail = 'is being updated by another request') {
    super(`Session ${sessionId} ${detail}`);
  }
}

export class SessionNotFoundError extends IntakeError {
  readonly code = IntakeErrorCode.SESSION_NOT_FOUND;

  constructor(readonly sessionId: string) {
    super(`Session not found: ${sessionId}`);
  }
}

export class FormNotFoundError extends IntakeError {
  readonly code = IntakeErrorCode.FORM_NOT_FOUND;

  constructor(readonly formId: string) {
    super(`Form configuration not found: ${formId}`);
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return typeof error === 'string' ? error : 'Unknown error';
}
