import { BadRequestException, Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { v4 as uuid } from 'uuid';
import { conflictPolicySetting, numberSetting, stringSetting } from '../config/app.config';
import { MetricsService, TurnOutcome } from '../metrics/metrics.service';
import {
  SESSION_STORE,
  SessionListOptions,
  SessionStore,
  cloneSession,
} from '../sessions/session-store.interface';
import { validateFormConfiguration } from './configuration.validator';
import { ExtractorService } from './extractor.service';
import {
  AgentStage,
  ConfigurationError,
  ConflictError,
  ProviderError,
  RetryableAgentError,
  SessionNotFoundError,
} from './intake.errors';
import {
  AgentState,
  ConversationSession,
  FormConfiguration,
  SUPPORTED_LANGUAGES,
  SessionState,
  SessionSummary,
  TurnResult,
} from './intake.types';
import { generateGreeting, generateSystemPrompt } from './prompt-generator';
import {
  CONFIGURATION_STORE,
  ConfigurationStore,
  StoredConfiguration,
  TEXT_GENERATION_PROVIDER,
  TextGenerationProvider,
} from './provider.interfaces';
import { ProviderRetryService } from './provider-retry.service';
import { ProviderErrorCode } from './provider-retry.types';
import { SessionLock } from './session-lock';

export interface StartSessionOptions {
  language?: string;
  /** Client-chosen id; generated when absent */
  sessionId?: string;
}

export interface TurnOptions {
  isVoice?: boolean;
  signal?: AbortSignal;
}

/**
 * Dynamic intake agent.
 *
 * Each turn runs Awaiting-Input → Generating-Reply → Extracting →
 * Awaiting-Input | Complete against a working copy of the session. The copy
 * is saved once, with a version check, after both the reply and the
 * extraction have succeeded; any failure before that leaves the stored
 * session as it was.
 */
@Injectable()
export class DynamicAgentService {
  private readonly logger = new Logger(DynamicAgentService.name);
  private readonly lock: SessionLock;
  private readonly timeoutMs: number;
  private readonly defaultLanguage: string;

  constructor(
    @Inject(SESSION_STORE) private readonly sessions: SessionStore,
    @Inject(CONFIGURATION_STORE) private readonly configurations: ConfigurationStore,
    @Inject(TEXT_GENERATION_PROVIDER) private readonly textProvider: TextGenerationProvider,
    private readonly extractor: ExtractorService,
    private readonly retry: ProviderRetryService,
    private readonly metrics: MetricsService,
    config: ConfigService,
  ) {
    this.lock = new SessionLock(conflictPolicySetting(config));
    this.timeoutMs = numberSetting(config, 'PROVIDER_TIMEOUT_MS', 30000);
    this.defaultLanguage = stringSetting(config, 'DEFAULT_LANGUAGE', 'en');
  }

  /**
   * Open a session on a stored configuration. The configuration is
   * snapshotted so later edits do not affect running conversations.
   */
  async startSession(formId: string, options: StartSessionOptions = {}): Promise<SessionState> {
    const stored = await this.configurations.getConfiguration(formId);
    if (!stored.isActive) {
      throw new ConfigurationError([`form ${formId} is not active`]);
    }
    validateFormConfiguration(stored);

    const language = options.language || stored.agent.language || this.defaultLanguage;
    if (!SUPPORTED_LANGUAGES[language]) {
      throw new ConfigurationError([`unsupported language "${language}"`]);
    }

    const configuration = snapshotConfiguration(stored, language);
    const now = new Date();
    const session: ConversationSession = {
      id: options.sessionId ?? uuid(),
      formId,
      configuration,
      language,
      turns: [{ role: 'agent', text: generateGreeting(configuration), timestamp: now.toISOString() }],
      record: {},
      complete: false,
      status: AgentState.AWAITING_INPUT,
      version: 0,
      createdAt: now,
      updatedAt: now,
    };

    const created = await this.sessions.create(session);
    this.metrics.recordSessionStarted();
    this.logger.log(`Session ${created.id} started on form ${formId} (${language})`);

    return toSessionState(created);
  }

  /**
   * Process one user turn. Same-session calls are serialised per the
   * configured conflict policy.
   */
  async startTurn(sessionId: string, userInput: string, options: TurnOptions = {}): Promise<TurnResult> {
    const text = userInput.trim();
    if (!text) {
      throw new BadRequestException('message must not be empty');
    }

    return this.lock.runExclusive(sessionId, () => this.runTurn(sessionId, text, options));
  }

  async getState(sessionId: string): Promise<SessionState> {
    return toSessionState(await this.loadSession(sessionId));
  }

  /**
   * Discard a session. Resolves false when it did not exist.
   */
  async resetSession(sessionId: string): Promise<boolean> {
    const deleted = await this.lock.runExclusive(sessionId, () => this.sessions.delete(sessionId));
    if (deleted) {
      this.logger.log(`Session ${sessionId} reset`);
    }
    return deleted;
  }

  async listSessions(options: SessionListOptions = {}): Promise<SessionSummary[]> {
    const sessions = await this.sessions.list(options);
    return sessions.map((session) => ({
      sessionId: session.id,
      formId: session.formId,
      turnCount: session.turns.length,
      completion: session.complete,
      createdAt: session.createdAt,
      updatedAt: session.updatedAt,
    }));
  }

  private async runTurn(sessionId: string, text: string, options: TurnOptions): Promise<TurnResult> {
    const endTimer = this.metrics.startTurnTimer();
    const { signal } = options;

    try {
      const stored = await this.loadSession(sessionId);
      const working = cloneSession(stored);

      working.turns.push(
        options.isVoice
          ? { role: 'user', text, timestamp: new Date().toISOString(), isVoice: true }
          : { role: 'user', text, timestamp: new Date().toISOString() },
      );

      this.transition(sessionId, stored.status, AgentState.GENERATING_REPLY);
      const reply = await this.guard(sessionId, 'reply', () =>
        this.retry.execute(
          'reply',
          () =>
            this.textProvider.generateReply({
              systemPrompt: generateSystemPrompt(working.configuration, { collected: working.record }),
              turns: [...working.turns],
              signal,
              timeoutMs: this.timeoutMs,
            }),
          { signal },
        ),
      );
      working.turns.push({ role: 'agent', text: reply, timestamp: new Date().toISOString() });

      this.transition(sessionId, AgentState.GENERATING_REPLY, AgentState.EXTRACTING);
      const extraction = await this.guard(sessionId, 'extraction', () =>
        this.extractor.extract({
          configuration: working.configuration,
          record: working.record,
          turns: working.turns,
          signal,
        }),
      );

      if (signal?.aborted) {
        throw new ProviderError('Turn was cancelled', ProviderErrorCode.ABORTED, false);
      }

      const nextStatus = extraction.complete ? AgentState.COMPLETE : AgentState.AWAITING_INPUT;
      working.record = extraction.record;
      working.complete = extraction.complete;
      working.status = nextStatus;
      working.updatedAt = new Date();

      const saved = await this.sessions.save(working, stored.version);
      this.transition(sessionId, AgentState.EXTRACTING, nextStatus);

      this.metrics.recordPatchOperations(extraction.operations.length, extraction.rejected.length);
      if (saved.complete && !stored.complete) {
        this.metrics.recordSessionCompleted();
        this.logger.log(`Session ${sessionId} collected every required field`);
      }
      endTimer('success');

      return {
        sessionId,
        reply,
        partialRecord: { ...saved.record },
        completion: saved.complete,
      };
    } catch (error) {
      endTimer(turnOutcome(error));
      throw error;
    }
  }

  /**
   * Provider failures become RetryableAgentError; cancellations and
   * everything else pass through unchanged.
   */
  private async guard<T>(sessionId: string, stage: AgentStage, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (error instanceof ProviderError && error.providerCode !== ProviderErrorCode.ABORTED) {
        this.logger.error(`Session ${sessionId}: ${stage} failed: ${error.message}`);
        throw new RetryableAgentError(sessionId, stage, error);
      }
      throw error;
    }
  }

  private async loadSession(sessionId: string): Promise<ConversationSession> {
    const session = await this.sessions.get(sessionId);
    if (!session) {
      throw new SessionNotFoundError(sessionId);
    }
    return session;
  }

  private transition(sessionId: string, from: AgentState, to: AgentState): void {
    this.logger.debug(`Session ${sessionId}: ${from} -> ${to}`);
  }
}

function snapshotConfiguration(stored: StoredConfiguration, language: string): FormConfiguration {
  return {
    id: stored.id,
    name: stored.name,
    industry: stored.industry,
    business: { ...stored.business },
    agent: { ...stored.agent, language },
    fields: structuredClone(stored.fields),
  };
}

function toSessionState(session: ConversationSession): SessionState {
  return {
    sessionId: session.id,
    formId: session.formId,
    language: session.language,
    status: session.status,
    turns: session.turns.map((turn) => ({ ...turn })),
    partialRecord: { ...session.record },
    completion: session.complete,
    createdAt: session.createdAt,
    updatedAt: session.updatedAt,
  };
}

function turnOutcome(error: unknown): TurnOutcome {
  if (error instanceof ConflictError) {
    return 'conflict';
  }
  if (error instanceof RetryableAgentError) {
    return 'retryable';
  }
  if (error instanceof ProviderError && error.providerCode === ProviderErrorCode.ABORTED) {
    return 'aborted';
  }
  return 'error';
}
