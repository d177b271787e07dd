import type { StructuredRecord } from "../types";
import { normalizeMessage } from "./Normalizer";
import { ResponseCache } from "./ResponseCache";
import { RetryingInterpreter } from "./RetryingInterpreter";
import { MetricsAggregator } from "./MetricsAggregator";
import { PatternExtractor } from "./PatternExtractor";
import { LoggingService, LogLevel } from "../services/logging/LoggingService";
import { ErrorCodes, ErrorSeverity, IntakeError, toErrorMessage } from "../utils/error";

export interface MessageInterpreterDeps {
  cache: ResponseCache;
  interpreter: RetryingInterpreter;
  patterns: PatternExtractor;
  metrics: MetricsAggregator;
  logger?: LoggingService;
  now?: () => number;
}

/**
 * Entry point for turning a free-form message into a structured record.
 * Never rejects: when every path fails the caller still gets a record, with
 * `amount: null` when nothing could be extracted.
 */
export class MessageInterpreter {
  private readonly logger: LoggingService;
  private readonly now: () => number;

  constructor(private readonly deps: MessageInterpreterDeps) {
    this.logger = deps.logger ?? LoggingService.getInstance();
    this.now = deps.now ?? Date.now;
  }

  async interpret(rawText: string): Promise<StructuredRecord> {
    const startedAt = this.now();
    const { cache, interpreter, metrics } = this.deps;

    try {
      const { fingerprint } = normalizeMessage(rawText);

      const cached = cache.get(fingerprint);
      if (cached) {
        this.logger.log(LogLevel.INFO, "Using cached interpretation", "MessageInterpreter");
        const record: StructuredRecord = { ...cached, origin: "cache" };
        metrics.recordRequest({
          success: true,
          latencyMs: this.now() - startedAt,
          confidence: record.confidence,
          fromCache: true,
        });
        return record;
      }

      const result = await interpreter.interpret(rawText);
      const latencyMs = this.now() - startedAt;

      if (result.outcome === "accepted") {
        cache.put(fingerprint, result.record);
        this.logger.log(LogLevel.INFO, "Interpretation accepted", "MessageInterpreter", {
          confidence: result.record.confidence,
          latencyMs,
          attempts: result.attempts,
        });
      }

      metrics.recordRequest({
        success:
          result.outcome === "accepted" ||
          (result.outcome === "skipped" && result.record.amount !== null),
        latencyMs,
        confidence: result.record.confidence,
        timeout: result.timedOut,
        usedFallback: result.usedFallback,
      });

      return result.record;
    } catch (error) {
      const wrappedError = new IntakeError(
        "Unexpected error during interpretation",
        ErrorCodes.INFERENCE_FAILED,
        ErrorSeverity.HIGH,
        {
          component: "MessageInterpreter.interpret",
          originalError: toErrorMessage(error),
        }
      );
      this.logger.error(wrappedError, "MessageInterpreter");

      metrics.recordRequest({
        success: false,
        latencyMs: this.now() - startedAt,
        usedFallback: true,
      });
      return this.deps.patterns.extract(rawText, "fallback");
    }
  }
}
