import { beforeEach, describe, expect, it } from 'vitest';
import { MetricsAggregator } from '../MetricsAggregator';
import { LoggingService } from '../../services/logging/LoggingService';

const logger = new LoggingService({ silent: true });

describe('MetricsAggregator', () => {
  let clock: number;
  let metrics: MetricsAggregator;

  beforeEach(() => {
    clock = Date.UTC(2024, 0, 1);
    metrics = new MetricsAggregator(3_600_000, { now: () => clock, logger });
  });

  const repeat = (times: number, fn: () => void) => {
    for (let i = 0; i < times; i++) fn();
  };

  it('derives rates and averages from the recorded samples', () => {
    metrics.recordRequest({ success: true, latencyMs: 1000, confidence: 0.9 });
    metrics.recordRequest({ success: true, latencyMs: 2000, confidence: 0.5, fromCache: true });
    metrics.recordRequest({ success: false, latencyMs: 9000, usedFallback: true });

    expect(metrics.snapshot()).toEqual({
      totalRequests: 3,
      successfulRequests: 2,
      failedRequests: 1,
      timeoutRequests: 0,
      cacheHits: 1,
      cacheMisses: 2,
      successRate: 66.67,
      cacheHitRate: 33.33,
      timeoutRate: 0,
      averageLatencySeconds: 1.5,
      minLatencySeconds: 1,
      maxLatencySeconds: 2,
      averageConfidence: 0.7,
      lowConfidenceCount: 1,
      fallbackCount: 1,
      windowStart: '2024-01-01T00:00:00.000Z',
    });
  });

  it('reports zeros for an empty window', () => {
    const snapshot = metrics.snapshot();
    expect(snapshot.successRate).toBe(0);
    expect(snapshot.minLatencySeconds).toBe(0);
    expect(snapshot.averageConfidence).toBe(0);
  });

  it('stays healthy until the window holds more than ten requests', () => {
    repeat(10, () => metrics.recordRequest({ success: false, latencyMs: 100 }));
    expect(metrics.health()).toMatchObject({ status: 'healthy', issues: [] });

    metrics.recordRequest({ success: false, latencyMs: 100 });
    expect(metrics.health()).toMatchObject({
      status: 'unhealthy',
      issues: ['Low success rate: 0.0%'],
    });
  });

  it('flags a high timeout rate as degraded', () => {
    repeat(7, () => metrics.recordRequest({ success: true, latencyMs: 100 }));
    repeat(4, () => metrics.recordRequest({ success: true, latencyMs: 100, timeout: true }));

    const health = metrics.health();
    expect(health.status).toBe('degraded');
    expect(health.issues).toEqual(['High timeout rate: 36.4%']);
  });

  it('flags a high average latency as degraded', () => {
    repeat(11, () => metrics.recordRequest({ success: true, latencyMs: 31_000 }));

    expect(metrics.health()).toMatchObject({
      status: 'degraded',
      issues: ['High latency: 31.0s'],
    });
  });

  it('lets a low success rate outrank degraded conditions', () => {
    repeat(4, () => metrics.recordRequest({ success: true, latencyMs: 100 }));
    repeat(7, () => metrics.recordRequest({ success: false, latencyMs: 100, timeout: true }));

    const health = metrics.health();
    expect(health.status).toBe('unhealthy');
    expect(health.issues).toEqual(['High timeout rate: 63.6%', 'Low success rate: 36.4%']);
  });

  it('counts created records by category and payment method', () => {
    metrics.recordCreated('food', 'cash');
    metrics.recordCreated('food', 'card');
    metrics.recordCreated('transport', 'cash');

    expect(metrics.health().records).toEqual({
      totalCreated: 3,
      byCategory: { food: 2, transport: 1 },
      byPaymentMethod: { cash: 2, card: 1 },
      windowStart: '2024-01-01T00:00:00.000Z',
    });
  });

  it('starts a new window once the current one elapses', () => {
    metrics.recordRequest({ success: true, latencyMs: 100 });
    metrics.recordCreated('food', 'cash');

    clock += 3_600_001;

    const health = metrics.health();
    expect(health.interpretation.totalRequests).toBe(0);
    expect(health.records.totalCreated).toBe(0);
    expect(health.interpretation.windowStart).toBe('2024-01-01T01:00:00.001Z');
    expect(health.windowSeconds).toBe(0);
  });
});
