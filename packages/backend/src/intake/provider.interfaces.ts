import { ConversationTurn, FormConfiguration, PartialRecord } from './intake.types';
import { JsonSchema } from './schema-generator';

export const TEXT_GENERATION_PROVIDER = Symbol('TEXT_GENERATION_PROVIDER');
export const STRUCTURED_EXTRACTION_PROVIDER = Symbol('STRUCTURED_EXTRACTION_PROVIDER');
export const CONFIGURATION_STORE = Symbol('CONFIGURATION_STORE');

interface ProviderCall {
  /** Cancels the in-flight request when aborted */
  signal?: AbortSignal;
  timeoutMs?: number;
}

export interface ReplyRequest extends ProviderCall {
  systemPrompt: string;
  turns: ConversationTurn[];
}

export interface ExtractionRequest extends ProviderCall {
  /** JSON Schema of the patch list */
  schema: JsonSchema;
  turns: ConversationTurn[];
  record: PartialRecord;
}

/**
 * Produces the agent's next reply
 */
export interface TextGenerationProvider {
  generateReply(request: ReplyRequest): Promise<string>;
}

/**
 * Proposes patch operations for the record. Output is untrusted and is
 * validated by the extractor before anything is applied.
 */
export interface StructuredExtractionProvider {
  extractPatches(request: ExtractionRequest): Promise<unknown[]>;
}

export interface StoredConfiguration extends FormConfiguration {
  isActive: boolean;
  createdAt: Date;
  updatedAt: Date;
}

export interface ConfigurationStore {
  /** @throws FormNotFoundError */
  getConfiguration(id: string): Promise<StoredConfiguration>;
}
