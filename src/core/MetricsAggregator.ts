import type { Category, HealthState, PaymentMethod } from "../types";
import { LoggingService, LogLevel } from "../services/logging/LoggingService";

const LOW_CONFIDENCE = 0.6;

// Health is only judged once the window holds more than this many requests
const MIN_SAMPLE_SIZE = 10;
const MAX_TIMEOUT_RATE = 30;
const MIN_SUCCESS_RATE = 70;
const MAX_AVERAGE_LATENCY_SECONDS = 30;

export interface RequestSample {
  success: boolean;
  latencyMs: number;
  confidence?: number;
  timeout?: boolean;
  fromCache?: boolean;
  usedFallback?: boolean;
}

interface InterpretationCounters {
  totalRequests: number;
  successfulRequests: number;
  failedRequests: number;
  timeoutRequests: number;
  cacheHits: number;
  cacheMisses: number;
  totalLatencyMs: number;
  minLatencyMs: number;
  maxLatencyMs: number;
  totalConfidence: number;
  lowConfidenceCount: number;
  fallbackCount: number;
}

interface RecordCounters {
  totalCreated: number;
  byCategory: Partial<Record<Category, number>>;
  byPaymentMethod: Partial<Record<PaymentMethod, number>>;
}

export interface InterpretationSnapshot {
  totalRequests: number;
  successfulRequests: number;
  failedRequests: number;
  timeoutRequests: number;
  cacheHits: number;
  cacheMisses: number;
  successRate: number;
  cacheHitRate: number;
  timeoutRate: number;
  averageLatencySeconds: number;
  minLatencySeconds: number;
  maxLatencySeconds: number;
  averageConfidence: number;
  lowConfidenceCount: number;
  fallbackCount: number;
  windowStart: string;
}

export interface HealthSnapshot {
  status: HealthState;
  timestamp: string;
  windowSeconds: number;
  issues: string[];
  interpretation: InterpretationSnapshot;
  records: RecordCounters & { windowStart: string };
}

const round = (value: number) => Math.round(value * 100) / 100;

const emptyInterpretation = (): InterpretationCounters => ({
  totalRequests: 0,
  successfulRequests: 0,
  failedRequests: 0,
  timeoutRequests: 0,
  cacheHits: 0,
  cacheMisses: 0,
  totalLatencyMs: 0,
  minLatencyMs: Number.POSITIVE_INFINITY,
  maxLatencyMs: 0,
  totalConfidence: 0,
  lowConfidenceCount: 0,
  fallbackCount: 0,
});

const emptyRecords = (): RecordCounters => ({
  totalCreated: 0,
  byCategory: {},
  byPaymentMethod: {},
});

/**
 * Windowed counters for interpretation outcomes and created records. The
 * window rolls over lazily on the next read or write after it elapses.
 */
export class MetricsAggregator {
  private interpretation = emptyInterpretation();
  private records = emptyRecords();
  private windowStart: number;
  private readonly now: () => number;
  private readonly logger: LoggingService;

  constructor(
    private readonly windowMs: number,
    options: { now?: () => number; logger?: LoggingService } = {}
  ) {
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? LoggingService.getInstance();
    this.windowStart = this.now();
  }

  recordRequest(sample: RequestSample): void {
    this.checkReset();
    const m = this.interpretation;

    m.totalRequests++;
    if (sample.fromCache) m.cacheHits++;
    else m.cacheMisses++;

    if (sample.timeout) m.timeoutRequests++;
    if (sample.usedFallback) m.fallbackCount++;

    if (!sample.success) {
      m.failedRequests++;
      return;
    }

    m.successfulRequests++;
    m.totalLatencyMs += sample.latencyMs;
    m.minLatencyMs = Math.min(m.minLatencyMs, sample.latencyMs);
    m.maxLatencyMs = Math.max(m.maxLatencyMs, sample.latencyMs);

    if (sample.confidence !== undefined) {
      m.totalConfidence += sample.confidence;
      if (sample.confidence < LOW_CONFIDENCE) m.lowConfidenceCount++;
    }
  }

  recordCreated(category: Category, paymentMethod: PaymentMethod): void {
    this.checkReset();
    this.records.totalCreated++;
    this.records.byCategory[category] = (this.records.byCategory[category] ?? 0) + 1;
    this.records.byPaymentMethod[paymentMethod] =
      (this.records.byPaymentMethod[paymentMethod] ?? 0) + 1;
  }

  snapshot(): InterpretationSnapshot {
    this.checkReset();
    const m = this.interpretation;
    const percentOfTotal = (count: number) =>
      m.totalRequests === 0 ? 0 : (count / m.totalRequests) * 100;
    const perSuccess = (total: number) =>
      m.successfulRequests === 0 ? 0 : total / m.successfulRequests;

    return {
      totalRequests: m.totalRequests,
      successfulRequests: m.successfulRequests,
      failedRequests: m.failedRequests,
      timeoutRequests: m.timeoutRequests,
      cacheHits: m.cacheHits,
      cacheMisses: m.cacheMisses,
      successRate: round(percentOfTotal(m.successfulRequests)),
      cacheHitRate: round(percentOfTotal(m.cacheHits)),
      timeoutRate: round(percentOfTotal(m.timeoutRequests)),
      averageLatencySeconds: round(perSuccess(m.totalLatencyMs) / 1000),
      minLatencySeconds: Number.isFinite(m.minLatencyMs) ? round(m.minLatencyMs / 1000) : 0,
      maxLatencySeconds: round(m.maxLatencyMs / 1000),
      averageConfidence: round(perSuccess(m.totalConfidence)),
      lowConfidenceCount: m.lowConfidenceCount,
      fallbackCount: m.fallbackCount,
      windowStart: new Date(this.windowStart).toISOString(),
    };
  }

  health(): HealthSnapshot {
    const interpretation = this.snapshot();
    let status: HealthState = "healthy";
    const issues: string[] = [];

    if (interpretation.totalRequests > MIN_SAMPLE_SIZE) {
      if (interpretation.timeoutRate > MAX_TIMEOUT_RATE) {
        status = "degraded";
        issues.push(`High timeout rate: ${interpretation.timeoutRate.toFixed(1)}%`);
      }
      if (interpretation.averageLatencySeconds > MAX_AVERAGE_LATENCY_SECONDS) {
        status = "degraded";
        issues.push(`High latency: ${interpretation.averageLatencySeconds.toFixed(1)}s`);
      }
      // Checked last so it outranks the degraded conditions
      if (interpretation.successRate < MIN_SUCCESS_RATE) {
        status = "unhealthy";
        issues.push(`Low success rate: ${interpretation.successRate.toFixed(1)}%`);
      }
    }

    return {
      status,
      timestamp: new Date(this.now()).toISOString(),
      windowSeconds: (this.now() - this.windowStart) / 1000,
      issues,
      interpretation,
      records: {
        totalCreated: this.records.totalCreated,
        byCategory: { ...this.records.byCategory },
        byPaymentMethod: { ...this.records.byPaymentMethod },
        windowStart: new Date(this.windowStart).toISOString(),
      },
    };
  }

  reset(): void {
    this.logSummary();
    this.interpretation = emptyInterpretation();
    this.records = emptyRecords();
    this.windowStart = this.now();
  }

  private checkReset(): void {
    if (this.now() - this.windowStart > this.windowMs) {
      this.logger.log(LogLevel.INFO, "Resetting metrics window", "MetricsAggregator");
      this.reset();
    }
  }

  private logSummary(): void {
    const m = this.interpretation;
    this.logger.log(LogLevel.INFO, "Metrics summary", "MetricsAggregator", {
      totalRequests: m.totalRequests,
      successfulRequests: m.successfulRequests,
      timeoutRequests: m.timeoutRequests,
      cacheHits: m.cacheHits,
      fallbackCount: m.fallbackCount,
      recordsCreated: this.records.totalCreated,
      byCategory: this.records.byCategory,
      byPaymentMethod: this.records.byPaymentMethod,
    });
  }
}
