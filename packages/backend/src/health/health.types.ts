/**
 * Health check types
 */

export type ServiceStatus = 'up' | 'down' | 'degraded';
export type OverallStatus = 'healthy' | 'degraded' | 'unhealthy';

export interface ServiceHealth {
  status: ServiceStatus;
  latency?: number;
  message?: string;
  lastCheck: string;
}

export interface HealthChecks {
  database: ServiceHealth;
  anthropic: ServiceHealth;
  sessionStore: ServiceHealth;
}

export interface HealthResponse {
  status: OverallStatus;
  timestamp: string;
  version: string;
  uptime: number;
  checks: HealthChecks;
}

export interface ReadinessResponse {
  ready: boolean;
}

export interface LivenessResponse {
  alive: boolean;
}
