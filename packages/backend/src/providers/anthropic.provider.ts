import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import Anthropic from '@anthropic-ai/sdk';
import { numberSetting, stringSetting } from '../config/app.config';
import { ProviderError } from '../intake/intake.errors';
import { ConversationTurn } from '../intake/intake.types';
import {
  ExtractionRequest,
  ReplyRequest,
  StructuredExtractionProvider,
  TextGenerationProvider,
} from '../intake/provider.interfaces';
import { ProviderErrorCode } from '../intake/provider-retry.types';
import { isPlainObject } from '../intake/record-patch';

export const UPDATE_RECORD_TOOL = 'update_record';
export const DEFAULT_MODEL = 'claude-haiku-4-5-20251001';

const EXTRACTION_INSTRUCTIONS = `You keep a structured record up to date from an intake conversation.
Call the ${UPDATE_RECORD_TOOL} tool with the operations that bring the record in line with what the user has said.
- Only record information the user stated or clearly confirmed; never guess.
- Use "replace" to set or correct a value and "remove" when the user withdraws one.
- Leave fields that have not changed out of the list. An empty list is a valid answer.
- Paths are JSON pointers to top-level fields, e.g. "/email".`;

/**
 * Claude-backed implementation of both model capabilities.
 *
 * Replies come from a plain completion over the conversation. Extraction
 * forces a single `update_record` tool call whose input schema is the
 * patch schema, so the output is structured by construction.
 */
@Injectable()
export class AnthropicProvider implements TextGenerationProvider, StructuredExtractionProvider {
  private readonly logger = new Logger(AnthropicProvider.name);
  private readonly apiKey?: string;
  private readonly model: string;
  private readonly maxTokens: number;
  private readonly temperature: number;
  private client?: Anthropic;

  constructor(configService: ConfigService) {
    const apiKey = configService.get<string>('ANTHROPIC_API_KEY');
    this.apiKey = apiKey && apiKey !== 'your-anthropic-api-key-here' ? apiKey : undefined;
    this.model = stringSetting(configService, 'ANTHROPIC_MODEL', DEFAULT_MODEL);
    this.maxTokens = numberSetting(configService, 'ANTHROPIC_MAX_TOKENS', 1024);
    this.temperature = numberSetting(configService, 'ANTHROPIC_TEMPERATURE', 0.7);

    if (!this.apiKey) {
      this.logger.warn('ANTHROPIC_API_KEY is not set; conversation turns will fail');
    }
  }

  isConfigured(): boolean {
    return Boolean(this.apiKey);
  }

  async generateReply(request: ReplyRequest): Promise<string> {
    const messages = toMessages(request.turns);
    if (messages.length === 0) {
      throw new ProviderError('No user turn to reply to', ProviderErrorCode.INVALID_REQUEST, false);
    }

    const response = await this.getClient().messages.create(
      {
        model: this.model,
        max_tokens: this.maxTokens,
        temperature: this.temperature,
        system: request.systemPrompt,
        messages,
      },
      { signal: request.signal, timeout: request.timeoutMs },
    );

    const text = response.content
      .map((block) => (block.type === 'text' ? block.text : ''))
      .join('')
      .trim();

    if (!text) {
      throw new ProviderError('Model returned no text', ProviderErrorCode.MALFORMED_RESPONSE, true);
    }

    this.logger.debug(
      `Reply generated (${response.usage.input_tokens} in / ${response.usage.output_tokens} out tokens)`,
    );
    return text;
  }

  async extractPatches(request: ExtractionRequest): Promise<unknown[]> {
    const tool: Anthropic.Tool = {
      name: UPDATE_RECORD_TOOL,
      description: 'Apply patch operations to the intake record',
      input_schema: {
        type: 'object',
        properties: { operations: request.schema },
        required: ['operations'],
      },
    };

    const response = await this.getClient().messages.create(
      {
        model: this.model,
        max_tokens: this.maxTokens,
        temperature: 0,
        system: EXTRACTION_INSTRUCTIONS,
        tools: [tool],
        tool_choice: { type: 'tool', name: UPDATE_RECORD_TOOL },
        messages: [{ role: 'user', content: renderExtractionContext(request) }],
      },
      { signal: request.signal, timeout: request.timeoutMs },
    );

    for (const block of response.content) {
      if (block.type === 'tool_use' && block.name === UPDATE_RECORD_TOOL) {
        if (isPlainObject(block.input) && Array.isArray(block.input.operations)) {
          return block.input.operations;
        }
        break;
      }
    }

    throw new ProviderError(
      `Model did not call ${UPDATE_RECORD_TOOL} with an operations list`,
      ProviderErrorCode.MALFORMED_RESPONSE,
      true,
    );
  }

  private getClient(): Anthropic {
    if (!this.apiKey) {
      throw new ProviderError('ANTHROPIC_API_KEY is not configured', ProviderErrorCode.AUTHENTICATION_FAILED, false);
    }
    if (!this.client) {
      this.client = new Anthropic({ apiKey: this.apiKey, maxRetries: 0 });
    }
    return this.client;
  }
}

/**
 * Map turns to alternating user/assistant messages. The API requires the
 * first message to be from the user, so leading agent turns (the greeting)
 * are dropped and consecutive turns from one side are merged.
 */
export function toMessages(turns: ConversationTurn[]): Anthropic.MessageParam[] {
  const messages: Anthropic.MessageParam[] = [];
  const firstUser = turns.findIndex((turn) => turn.role === 'user');
  if (firstUser < 0) {
    return messages;
  }

  let pending: { role: 'user' | 'assistant'; parts: string[] } | undefined;
  for (const turn of turns.slice(firstUser)) {
    const role = turn.role === 'user' ? 'user' : 'assistant';
    if (pending && pending.role === role) {
      pending.parts.push(turn.text);
      continue;
    }
    if (pending) {
      messages.push({ role: pending.role, content: pending.parts.join('\n\n') });
    }
    pending = { role, parts: [turn.text] };
  }
  if (pending) {
    messages.push({ role: pending.role, content: pending.parts.join('\n\n') });
  }

  return messages;
}

export function renderExtractionContext(request: Pick<ExtractionRequest, 'turns' | 'record'>): string {
  const transcript = request.turns
    .map((turn) => `${turn.role === 'user' ? 'User' : 'Agent'}: ${turn.text}`)
    .join('\n');

  return [
    `Current record:\n${JSON.stringify(request.record, null, 2)}`,
    `Recent conversation:\n${transcript}`,
  ].join('\n\n');
}
