import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { numberSetting } from '../config/app.config';
import { PatchValidationError } from './intake.errors';
import {
  ConversationTurn,
  FormConfiguration,
  PartialRecord,
  ValidatedPatch,
} from './intake.types';
import {
  STRUCTURED_EXTRACTION_PROVIDER,
  StructuredExtractionProvider,
} from './provider.interfaces';
import { ProviderRetryService } from './provider-retry.service';
import { applyPatches, isRecordComplete, validatePatchBatch } from './record-patch';
import { generatePatchSchema, generateRecordSchema } from './schema-generator';

export interface ExtractionContext {
  configuration: FormConfiguration;
  record: PartialRecord;
  turns: ConversationTurn[];
  signal?: AbortSignal;
}

export interface ExtractionResult {
  record: PartialRecord;
  /** Operations that were applied, in order */
  operations: ValidatedPatch[];
  rejected: PatchValidationError[];
  complete: boolean;
}

/**
 * Incremental extractor: asks the extraction capability for the deltas
 * implied by the latest turns and applies the valid ones to a copy of the
 * record.
 */
@Injectable()
export class ExtractorService {
  private readonly logger = new Logger(ExtractorService.name);
  private readonly contextTurns: number;
  private readonly timeoutMs: number;

  constructor(
    @Inject(STRUCTURED_EXTRACTION_PROVIDER)
    private readonly provider: StructuredExtractionProvider,
    private readonly retry: ProviderRetryService,
    config: ConfigService,
  ) {
    this.contextTurns = numberSetting(config, 'EXTRACTION_CONTEXT_TURNS', 6);
    this.timeoutMs = numberSetting(config, 'PROVIDER_TIMEOUT_MS', 30000);
  }

  async extract(context: ExtractionContext): Promise<ExtractionResult> {
    const { configuration, record, signal } = context;
    const schema = generatePatchSchema(generateRecordSchema(configuration));
    const turns = context.turns.slice(-this.contextTurns);

    const proposed = await this.retry.execute(
      'extraction',
      () =>
        this.provider.extractPatches({
          schema,
          turns,
          record: { ...record },
          signal,
          timeoutMs: this.timeoutMs,
        }),
      { signal },
    );

    return this.applyProposed(configuration, record, proposed);
  }

  /**
   * Validate and apply a proposed batch. The input record is not modified.
   */
  applyProposed(configuration: FormConfiguration, record: PartialRecord, proposed: unknown[]): ExtractionResult {
    const { valid, rejected } = validatePatchBatch(proposed, configuration);

    for (const error of rejected) {
      this.logger.warn(`${error.message} (${JSON.stringify(error.operation)})`);
    }

    const next = applyPatches(record, valid);
    const complete = isRecordComplete(configuration, next);

    this.logger.debug(
      `Applied ${valid.length} operation(s), rejected ${rejected.length}; complete=${complete}`,
    );

    return { record: next, operations: valid, rejected, complete };
  }
}
