import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { BadRequestException } from '@nestjs/common';
import { MetricsService } from '../../metrics/metrics.service';
import { InMemorySessionStore } from '../../sessions/in-memory-session.store';
import { SESSION_STORE } from '../../sessions/session-store.interface';
import { DynamicAgentService } from '../dynamic-agent.service';
import { ExtractorService } from '../extractor.service';
import {
  ConfigurationError,
  ConflictError,
  ProviderError,
  RetryableAgentError,
  SessionNotFoundError,
} from '../intake.errors';
import { AgentState } from '../intake.types';
import {
  CONFIGURATION_STORE,
  ExtractionRequest,
  ReplyRequest,
  STRUCTURED_EXTRACTION_PROVIDER,
  StoredConfiguration,
  TEXT_GENERATION_PROVIDER,
} from '../provider.interfaces';
import { ProviderRetryService } from '../provider-retry.service';
import { ProviderErrorCode } from '../provider-retry.types';
import {
  TEST_FORM_ID,
  createConfigService,
  createDeferred,
  createStoredConfiguration,
} from './__mocks__/test-utils';

describe('DynamicAgentService', () => {
  let service: DynamicAgentService;
  let store: InMemorySessionStore;
  let metrics: MetricsService;

  const mockGetConfiguration = jest.fn<Promise<StoredConfiguration>, [string]>();
  const mockGenerateReply = jest.fn<Promise<string>, [ReplyRequest]>();
  const mockExtractPatches = jest.fn<Promise<unknown[]>, [ExtractionRequest]>();

  const createService = async (settings: Record<string, unknown> = {}) => {
    store = new InMemorySessionStore();

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        DynamicAgentService,
        ExtractorService,
        ProviderRetryService,
        MetricsService,
        { provide: SESSION_STORE, useValue: store },
        { provide: CONFIGURATION_STORE, useValue: { getConfiguration: mockGetConfiguration } },
        { provide: TEXT_GENERATION_PROVIDER, useValue: { generateReply: mockGenerateReply } },
        { provide: STRUCTURED_EXTRACTION_PROVIDER, useValue: { extractPatches: mockExtractPatches } },
        { provide: ConfigService, useValue: createConfigService({ PROVIDER_MAX_RETRIES: 0, ...settings }) },
      ],
    }).compile();

    service = module.get<DynamicAgentService>(DynamicAgentService);
    metrics = module.get<MetricsService>(MetricsService);
  };

  beforeEach(async () => {
    jest.resetAllMocks();
    mockGetConfiguration.mockResolvedValue(createStoredConfiguration());
    mockGenerateReply.mockResolvedValue('Thanks! What else can you tell me?');
    mockExtractPatches.mockResolvedValue([]);
    await createService();
  });

  describe('startSession', () => {
    it('should open a session with the greeting as the first agent turn', async () => {
      const state = await service.startSession(TEST_FORM_ID, { sessionId: 'session-1' });

      expect(state.sessionId).toBe('session-1');
      expect(state.formId).toBe(TEST_FORM_ID);
      expect(state.language).toBe('en');
      expect(state.status).toBe(AgentState.AWAITING_INPUT);
      expect(state.completion).toBe(false);
      expect(state.partialRecord).toEqual({});
      expect(state.turns).toHaveLength(1);
      expect(state.turns[0].role).toBe('agent');
      expect(state.turns[0].text).toBe(
        "Hi, I'm Ava from Acme Plumbing. I'll help you get started. How can I help you today?",
      );
    });

    it('should generate a session id when none is given', async () => {
      const state = await service.startSession(TEST_FORM_ID);

      expect(state.sessionId).toMatch(/^[0-9a-f-]{36}$/);
    });

    it('should use the requested language', async () => {
      await service.startSession(TEST_FORM_ID, { sessionId: 'session-1', language: 'fr' });

      const stored = await store.get('session-1');
      expect(stored?.language).toBe('fr');
      expect(stored?.configuration.agent.language).toBe('fr');
    });

    it('should reject an unsupported language', async () => {
      await expect(service.startSession(TEST_FORM_ID, { language: 'xx' })).rejects.toBeInstanceOf(
        ConfigurationError,
      );
    });

    it('should reject an inactive form', async () => {
      mockGetConfiguration.mockResolvedValue(createStoredConfiguration({ isActive: false }));

      await expect(service.startSession(TEST_FORM_ID)).rejects.toBeInstanceOf(ConfigurationError);
    });

    it('should reject a configuration without fields', async () => {
      mockGetConfiguration.mockResolvedValue(createStoredConfiguration({ fields: [] }));

      await expect(service.startSession(TEST_FORM_ID)).rejects.toBeInstanceOf(ConfigurationError);
    });

    it('should reject a duplicate session id', async () => {
      await service.startSession(TEST_FORM_ID, { sessionId: 'session-1' });

      await expect(service.startSession(TEST_FORM_ID, { sessionId: 'session-1' })).rejects.toBeInstanceOf(
        ConflictError,
      );
    });
  });

  describe('startTurn', () => {
    beforeEach(async () => {
      await service.startSession(TEST_FORM_ID, { sessionId: 'session-1' });
    });

    it('should reach completion when name and then phone are given', async () => {
      mockGenerateReply
        .mockResolvedValueOnce("Nice to meet you, Jane. What's the best number to reach you?")
        .mockResolvedValueOnce('Perfect, someone will call you shortly.');
      mockExtractPatches
        .mockResolvedValueOnce([{ op: 'add', path: '/full_name', value: 'Jane Doe' }])
        .mockResolvedValueOnce([{ op: 'replace', path: '/phone', value: '555-123-4567' }]);

      const first = await service.startTurn('session-1', "Hi, I'm Jane Doe");

      expect(first).toEqual({
        sessionId: 'session-1',
        reply: "Nice to meet you, Jane. What's the best number to reach you?",
        partialRecord: { full_name: 'Jane Doe' },
        completion: false,
      });

      const second = await service.startTurn('session-1', 'It is 555-123-4567');

      expect(second.completion).toBe(true);
      expect(second.partialRecord).toEqual({ full_name: 'Jane Doe', phone: '555-123-4567' });

      const state = await service.getState('session-1');
      expect(state.status).toBe(AgentState.COMPLETE);
      expect(state.turns.map((t) => t.role)).toEqual(['agent', 'user', 'agent', 'user', 'agent']);

      const stored = await store.get('session-1');
      expect(stored?.version).toBe(2);
    });

    it('should pass the collected record to the reply prompt', async () => {
      mockExtractPatches.mockResolvedValueOnce([{ op: 'add', path: '/full_name', value: 'Jane Doe' }]);
      await service.startTurn('session-1', "I'm Jane Doe");

      await service.startTurn('session-1', 'What do you need next?');

      const request = mockGenerateReply.mock.calls[1][0];
      expect(request.systemPrompt).toContain('- Full name: Jane Doe');
      expect(request.turns.map((t) => t.text)).toEqual([
        "Hi, I'm Ava from Acme Plumbing. I'll help you get started. How can I help you today?",
        "I'm Jane Doe",
        'Thanks! What else can you tell me?',
        'What do you need next?',
      ]);
    });

    it('should mark voice turns', async () => {
      await service.startTurn('session-1', 'hello', { isVoice: true });

      const state = await service.getState('session-1');
      expect(state.turns[1]).toMatchObject({ role: 'user', text: 'hello', isVoice: true });
      expect(state.turns[2].isVoice).toBeUndefined();
    });

    it('should reject an empty message', async () => {
      await expect(service.startTurn('session-1', '   ')).rejects.toBeInstanceOf(BadRequestException);
      expect(mockGenerateReply).not.toHaveBeenCalled();
    });

    it('should fail for an unknown session', async () => {
      await expect(service.startTurn('missing', 'hello')).rejects.toBeInstanceOf(SessionNotFoundError);
    });

    it('should leave the session unchanged when the reply fails', async () => {
      mockGenerateReply.mockRejectedValue(Object.assign(new Error('unavailable'), { status: 503 }));

      const error = await service.startTurn('session-1', 'hello').catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(RetryableAgentError);
      if (error instanceof RetryableAgentError) {
        expect(error.stage).toBe('reply');
      }
      expect(mockExtractPatches).not.toHaveBeenCalled();

      const stored = await store.get('session-1');
      expect(stored?.turns).toHaveLength(1);
      expect(stored?.version).toBe(0);
    });

    it('should leave the session unchanged when extraction fails', async () => {
      mockExtractPatches.mockRejectedValue(new Error('socket hang up'));

      const error = await service.startTurn('session-1', "I'm Jane Doe").catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(RetryableAgentError);
      if (error instanceof RetryableAgentError) {
        expect(error.stage).toBe('extraction');
      }

      const state = await service.getState('session-1');
      expect(state.turns).toHaveLength(1);
      expect(state.partialRecord).toEqual({});
    });

    it('should record the turn outcome', async () => {
      const timerSpy = jest.spyOn(metrics, 'startTurnTimer');

      await service.startTurn('session-1', 'hello');

      expect(timerSpy).toHaveBeenCalledTimes(1);
    });

    it('should reject a concurrent turn on the same session', async () => {
      const gate = createDeferred<string>();
      mockGenerateReply.mockReturnValueOnce(gate.promise);

      const first = service.startTurn('session-1', 'first');
      await expect(service.startTurn('session-1', 'second')).rejects.toBeInstanceOf(ConflictError);

      gate.resolve('reply to first');
      await expect(first).resolves.toMatchObject({ reply: 'reply to first' });

      const state = await service.getState('session-1');
      expect(state.turns.map((t) => t.text).slice(1)).toEqual(['first', 'reply to first']);
    });

    it('should cancel the turn when the signal aborts', async () => {
      const controller = new AbortController();
      mockGenerateReply.mockImplementation(async () => {
        controller.abort();
        return 'too late';
      });

      const error = await service
        .startTurn('session-1', 'hello', { signal: controller.signal })
        .catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(ProviderError);
      if (error instanceof ProviderError) {
        expect(error.providerCode).toBe(ProviderErrorCode.ABORTED);
      }
      expect(mockExtractPatches).not.toHaveBeenCalled();

      const stored = await store.get('session-1');
      expect(stored?.turns).toHaveLength(1);
    });
  });

  describe('queue policy', () => {
    beforeEach(async () => {
      await createService({ SESSION_CONFLICT_POLICY: 'queue' });
      await service.startSession(TEST_FORM_ID, { sessionId: 'session-1' });
    });

    it('should run concurrent turns one after another', async () => {
      const gate = createDeferred<string>();
      mockGenerateReply.mockReturnValueOnce(gate.promise).mockResolvedValueOnce('reply to second');

      const first = service.startTurn('session-1', 'first');
      const second = service.startTurn('session-1', 'second');
      gate.resolve('reply to first');

      await Promise.all([first, second]);

      const state = await service.getState('session-1');
      expect(state.turns.map((t) => t.text).slice(1)).toEqual([
        'first',
        'reply to first',
        'second',
        'reply to second',
      ]);
    });
  });

  describe('session management', () => {
    it('should reset a session and report whether it existed', async () => {
      await service.startSession(TEST_FORM_ID, { sessionId: 'session-1' });

      await expect(service.resetSession('session-1')).resolves.toBe(true);
      await expect(service.resetSession('session-1')).resolves.toBe(false);
      await expect(service.getState('session-1')).rejects.toBeInstanceOf(SessionNotFoundError);
    });

    it('should list session summaries', async () => {
      await service.startSession(TEST_FORM_ID, { sessionId: 'session-1' });

      const sessions = await service.listSessions({ formId: TEST_FORM_ID });

      expect(sessions).toHaveLength(1);
      expect(sessions[0]).toMatchObject({
        sessionId: 'session-1',
        formId: TEST_FORM_ID,
        turnCount: 1,
        completion: false,
      });
    });
  });
});
