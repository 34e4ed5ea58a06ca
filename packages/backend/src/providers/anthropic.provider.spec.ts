import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import Anthropic from '@anthropic-ai/sdk';
import { ProviderError } from '../intake/intake.errors';
import { ConversationTurn } from '../intake/intake.types';
import { ProviderErrorCode } from '../intake/provider-retry.types';
import { generatePatchSchema, generateRecordSchema } from '../intake/schema-generator';
import { createFormConfiguration } from '../intake/__tests__/__mocks__/test-utils';
import {
  AnthropicProvider,
  UPDATE_RECORD_TOOL,
  renderExtractionContext,
  toMessages,
} from './anthropic.provider';

const mockCreate = jest.fn();

jest.mock('@anthropic-ai/sdk', () => ({
  __esModule: true,
  default: jest.fn().mockImplementation(() => ({
    messages: { create: mockCreate },
  })),
}));

const turn = (role: ConversationTurn['role'], text: string): ConversationTurn => ({
  role,
  text,
  timestamp: '2024-01-01T00:00:00.000Z',
});

const usage = { input_tokens: 10, output_tokens: 5 };

describe('AnthropicProvider', () => {
  const originalEnv = process.env;

  const createProvider = async (values: Record<string, unknown>): Promise<AnthropicProvider> => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [AnthropicProvider, { provide: ConfigService, useValue: new ConfigService(values) }],
    }).compile();
    return module.get<AnthropicProvider>(AnthropicProvider);
  };

  beforeEach(() => {
    jest.clearAllMocks();
    process.env = { ...originalEnv };
    delete process.env.ANTHROPIC_API_KEY;
    delete process.env.ANTHROPIC_MODEL;
  });

  afterEach(() => {
    process.env = originalEnv;
  });

  describe('toMessages', () => {
    it('should drop leading agent turns and merge consecutive turns', () => {
      const messages = toMessages([
        turn('agent', 'Hi, how can I help?'),
        turn('user', 'I need a plumber'),
        turn('user', 'It is urgent'),
        turn('agent', 'Sorry to hear that. What is your name?'),
      ]);

      expect(messages).toEqual([
        { role: 'user', content: 'I need a plumber\n\nIt is urgent' },
        { role: 'assistant', content: 'Sorry to hear that. What is your name?' },
      ]);
    });

    it('should be empty without a user turn', () => {
      expect(toMessages([turn('agent', 'Hello')])).toEqual([]);
    });
  });

  describe('renderExtractionContext', () => {
    it('should show the record and the transcript', () => {
      expect(
        renderExtractionContext({
          record: { full_name: 'Jane Doe' },
          turns: [turn('user', 'hi'), turn('agent', 'hello')],
        }),
      ).toBe('Current record:\n{\n  "full_name": "Jane Doe"\n}\n\nRecent conversation:\nUser: hi\nAgent: hello');
    });
  });

  describe('generateReply', () => {
    it('should return the trimmed text of the response', async () => {
      const provider = await createProvider({ ANTHROPIC_API_KEY: 'test-secret', ANTHROPIC_MODEL: 'test-model' });
      mockCreate.mockResolvedValue({ content: [{ type: 'text', text: '  Hello there!  ' }], usage });

      const reply = await provider.generateReply({
        systemPrompt: 'You are Ava.',
        turns: [turn('agent', 'Hi!'), turn('user', 'hello')],
        timeoutMs: 5000,
      });

      expect(reply).toBe('Hello there!');
      expect(mockCreate).toHaveBeenCalledWith(
        expect.objectContaining({
          model: 'test-model',
          system: 'You are Ava.',
          messages: [{ role: 'user', content: 'hello' }],
        }),
        { signal: undefined, timeout: 5000 },
      );
      expect(Anthropic).toHaveBeenCalledWith({ apiKey: 'test-secret', maxRetries: 0 });
    });

    it('should reuse one client', async () => {
      const provider = await createProvider({ ANTHROPIC_API_KEY: 'test-secret' });
      mockCreate.mockResolvedValue({ content: [{ type: 'text', text: 'ok' }], usage });

      await provider.generateReply({ systemPrompt: 's', turns: [turn('user', 'a')] });
      await provider.generateReply({ systemPrompt: 's', turns: [turn('user', 'b')] });

      expect(Anthropic).toHaveBeenCalledTimes(1);
    });

    it('should treat an empty response as malformed', async () => {
      const provider = await createProvider({ ANTHROPIC_API_KEY: 'test-secret' });
      mockCreate.mockResolvedValue({ content: [], usage });

      await expect(
        provider.generateReply({ systemPrompt: 's', turns: [turn('user', 'hello')] }),
      ).rejects.toMatchObject({ providerCode: ProviderErrorCode.MALFORMED_RESPONSE, retryable: true });
    });

    it('should fail without an API key', async () => {
      const provider = await createProvider({ ANTHROPIC_API_KEY: 'your-anthropic-api-key-here' });

      expect(provider.isConfigured()).toBe(false);
      await expect(
        provider.generateReply({ systemPrompt: 's', turns: [turn('user', 'hello')] }),
      ).rejects.toMatchObject({ providerCode: ProviderErrorCode.AUTHENTICATION_FAILED });
      expect(mockCreate).not.toHaveBeenCalled();
    });

    it('should refuse a conversation without a user turn', async () => {
      const provider = await createProvider({ ANTHROPIC_API_KEY: 'test-secret' });

      await expect(
        provider.generateReply({ systemPrompt: 's', turns: [turn('agent', 'Hi!')] }),
      ).rejects.toBeInstanceOf(ProviderError);
    });
  });

  describe('extractPatches', () => {
    const schema = generatePatchSchema(generateRecordSchema(createFormConfiguration()));

    it('should force the update_record tool and return its operations', async () => {
      const provider = await createProvider({ ANTHROPIC_API_KEY: 'test-secret' });
      const operations = [{ op: 'add', path: '/email', value: 'jane@example.com' }];
      mockCreate.mockResolvedValue({
        content: [{ type: 'tool_use', id: 'toolu_1', name: UPDATE_RECORD_TOOL, input: { operations } }],
        usage,
      });

      const result = await provider.extractPatches({
        schema,
        record: {},
        turns: [turn('user', 'my email is jane@example.com')],
      });

      expect(result).toEqual(operations);
      expect(mockCreate).toHaveBeenCalledWith(
        expect.objectContaining({
          temperature: 0,
          tool_choice: { type: 'tool', name: UPDATE_RECORD_TOOL },
          tools: [
            expect.objectContaining({
              name: UPDATE_RECORD_TOOL,
              input_schema: { type: 'object', properties: { operations: schema }, required: ['operations'] },
            }),
          ],
        }),
        expect.anything(),
      );
    });

    it('should reject a response without the tool call', async () => {
      const provider = await createProvider({ ANTHROPIC_API_KEY: 'test-secret' });
      mockCreate.mockResolvedValue({ content: [{ type: 'text', text: 'No changes.' }], usage });

      await expect(
        provider.extractPatches({ schema, record: {}, turns: [turn('user', 'hello')] }),
      ).rejects.toMatchObject({ providerCode: ProviderErrorCode.MALFORMED_RESPONSE });
    });
  });
});
