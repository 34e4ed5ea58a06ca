import { Injectable, OnModuleInit } from '@nestjs/common';
import {
  Registry,
  Counter,
  Histogram,
  Gauge,
  collectDefaultMetrics,
} from 'prom-client';

export type TurnOutcome = 'success' | 'conflict' | 'retryable' | 'aborted' | 'error';

@Injectable()
export class MetricsService implements OnModuleInit {
  private readonly registry: Registry;

  // Conversation Metrics
  private readonly turnsTotal: Counter;
  private readonly turnDuration: Histogram;
  private readonly patchOperations: Counter;
  private readonly sessionsStarted: Counter;
  private readonly sessionsCompleted: Counter;
  private readonly activeTurns: Gauge;

  // Provider Metrics
  private readonly providerRetries: Counter;
  private readonly providerFailures: Counter;

  // API Metrics
  private readonly apiRequestsTotal: Counter;

  constructor() {
    this.registry = new Registry();

    this.turnsTotal = new Counter({
      name: 'intake_turns_total',
      help: 'Total number of conversation turns by outcome',
      labelNames: ['outcome'],
      registers: [this.registry],
    });

    this.turnDuration = new Histogram({
      name: 'intake_turn_duration_seconds',
      help: 'Duration of a conversation turn, reply and extraction included',
      labelNames: ['outcome'],
      buckets: [0.25, 0.5, 1, 2, 5, 10, 20, 40],
      registers: [this.registry],
    });

    this.patchOperations = new Counter({
      name: 'intake_patch_operations_total',
      help: 'Patch operations proposed by extraction, by result',
      labelNames: ['result'],
      registers: [this.registry],
    });

    this.sessionsStarted = new Counter({
      name: 'intake_sessions_started_total',
      help: 'Total number of intake sessions started',
      registers: [this.registry],
    });

    this.sessionsCompleted = new Counter({
      name: 'intake_sessions_completed_total',
      help: 'Sessions whose record became complete',
      registers: [this.registry],
    });

    this.activeTurns = new Gauge({
      name: 'intake_active_turns',
      help: 'Turns currently being processed',
      registers: [this.registry],
    });

    this.providerRetries = new Counter({
      name: 'intake_provider_retries_total',
      help: 'Retries of model provider calls',
      labelNames: ['operation', 'error_code'],
      registers: [this.registry],
    });

    this.providerFailures = new Counter({
      name: 'intake_provider_failures_total',
      help: 'Provider calls that failed after the retry budget',
      labelNames: ['operation', 'error_code'],
      registers: [this.registry],
    });

    this.apiRequestsTotal = new Counter({
      name: 'intake_api_requests_total',
      help: 'Total number of API requests',
      labelNames: ['method', 'endpoint', 'status_code'],
      registers: [this.registry],
    });
  }

  onModuleInit(): void {
    // Collect default Node.js metrics (CPU, memory, etc.)
    collectDefaultMetrics({
      register: this.registry,
      prefix: 'intake_',
    });
  }

  async getMetrics(): Promise<string> {
    return this.registry.metrics();
  }

  getContentType(): string {
    return this.registry.contentType;
  }

  // Turn Metrics Methods
  startTurnTimer(): (outcome: TurnOutcome) => void {
    const end = this.turnDuration.startTimer();
    this.activeTurns.inc();
    return (outcome) => {
      end({ outcome });
      this.activeTurns.dec();
      this.turnsTotal.inc({ outcome });
    };
  }

  recordPatchOperations(applied: number, rejected: number): void {
    if (applied > 0) {
      this.patchOperations.inc({ result: 'applied' }, applied);
    }
    if (rejected > 0) {
      this.patchOperations.inc({ result: 'rejected' }, rejected);
    }
  }

  recordSessionStarted(): void {
    this.sessionsStarted.inc();
  }

  recordSessionCompleted(): void {
    this.sessionsCompleted.inc();
  }

  // Provider Metrics Methods
  recordProviderRetry(operation: string, errorCode: string): void {
    this.providerRetries.inc({ operation, error_code: errorCode });
  }

  recordProviderFailure(operation: string, errorCode: string): void {
    this.providerFailures.inc({ operation, error_code: errorCode });
  }

  // API Metrics Methods
  recordApiRequest(method: string, endpoint: string, statusCode: number): void {
    this.apiRequestsTotal.inc({
      method,
      endpoint,
      status_code: statusCode.toString(),
    });
  }
}
