import { MetricsService } from './metrics.service';
import { routePattern } from './api-metrics.middleware';

describe('MetricsService', () => {
  let metrics: MetricsService;

  beforeEach(() => {
    metrics = new MetricsService();
  });

  it('should count turns by outcome', async () => {
    metrics.startTurnTimer()('success');
    metrics.startTurnTimer()('conflict');
    metrics.startTurnTimer()('success');

    const output = await metrics.getMetrics();

    expect(output).toContain('intake_turns_total{outcome="success"} 2');
    expect(output).toContain('intake_turns_total{outcome="conflict"} 1');
    expect(output).toContain('intake_active_turns 0');
  });

  it('should count applied and rejected patch operations', async () => {
    metrics.recordPatchOperations(3, 1);
    metrics.recordPatchOperations(0, 0);

    const output = await metrics.getMetrics();

    expect(output).toContain('intake_patch_operations_total{result="applied"} 3');
    expect(output).toContain('intake_patch_operations_total{result="rejected"} 1');
  });

  it('should count completed sessions', async () => {
    metrics.recordSessionStarted();
    metrics.recordSessionCompleted();

    const output = await metrics.getMetrics();

    expect(output).toContain('intake_sessions_started_total 1');
    expect(output).toContain('intake_sessions_completed_total 1');
  });

  it('should expose the Prometheus content type', () => {
    expect(metrics.getContentType()).toContain('text/plain');
  });

  describe('routePattern', () => {
    it('should use the matched route pattern', () => {
      expect(routePattern({ baseUrl: '', route: { path: '/api/chat/:sessionId/state' } })).toBe(
        '/api/chat/:sessionId/state',
      );
    });

    it('should group requests that matched no route', () => {
      expect(routePattern({ baseUrl: '', route: undefined })).toBe('unmatched');
    });
  });
});
