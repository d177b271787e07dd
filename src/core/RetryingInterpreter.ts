import type { AttemptResult, InferenceService, StructuredRecord } from "../types";
import { PatternExtractor } from "./PatternExtractor";
import { LoggingService, LogLevel } from "../services/logging/LoggingService";
import { toErrorMessage } from "../utils/error";

export type Sleep = (ms: number) => Promise<void>;

export const defaultSleep: Sleep = (ms) =>
  new Promise((resolve) => setTimeout(resolve, ms));

export interface RetryPolicy {
  maxRetries: number;
  baseDelayMs: number;
  acceptConfidence: number;
}

export type InterpretationOutcome =
  /** Inference produced a confident, successful record. */
  | "accepted"
  /** Inference answered but below the acceptance gate. */
  | "weak"
  /** Every attempt failed. */
  | "exhausted"
  /** No inference service configured. */
  | "skipped";

export interface RetryingResult {
  record: StructuredRecord;
  outcome: InterpretationOutcome;
  attempts: number;
  /** True when the last attempt ended in a timeout. */
  timedOut: boolean;
  usedFallback: boolean;
}

/**
 * Drives inference attempts with exponential backoff, then gates the answer:
 * only a record with a positive amount and confidence above the threshold is
 * accepted. Anything else is replaced by the pattern extractor's result; a
 * weak inference is discarded, never blended.
 */
export class RetryingInterpreter {
  private readonly sleep: Sleep;
  private readonly logger: LoggingService;

  constructor(
    private readonly inference: InferenceService | null,
    private readonly patterns: PatternExtractor,
    private readonly policy: RetryPolicy,
    options: { sleep?: Sleep; logger?: LoggingService } = {}
  ) {
    this.sleep = options.sleep ?? defaultSleep;
    this.logger = options.logger ?? LoggingService.getInstance();
  }

  backoffDelay(attempt: number): number {
    return this.policy.baseDelayMs * 2 ** attempt;
  }

  isAcceptable(record: StructuredRecord): boolean {
    return (
      record.amount !== null &&
      record.amount > 0 &&
      record.confidence > this.policy.acceptConfidence
    );
  }

  async interpret(message: string): Promise<RetryingResult> {
    const inference = this.inference;
    if (!inference) {
      return {
        record: this.patterns.extract(message, "baseline"),
        outcome: "skipped",
        attempts: 0,
        timedOut: false,
        usedFallback: false,
      };
    }

    let attempt = 0;
    let last: AttemptResult | null = null;

    while (attempt < this.policy.maxRetries) {
      this.logger.log(LogLevel.DEBUG, "Inference attempt", "RetryingInterpreter", {
        attempt: attempt + 1,
        maxRetries: this.policy.maxRetries,
      });

      last = await this.runAttempt(inference, message);
      attempt++;

      if (last.status === "ok") break;

      if (attempt < this.policy.maxRetries) {
        const delay = this.backoffDelay(attempt - 1);
        this.logger.log(LogLevel.WARN, `Inference ${last.status}, retrying`, "RetryingInterpreter", {
          delayMs: delay,
          error: last.error,
        });
        await this.sleep(delay);
      }
    }

    if (last?.status === "ok") {
      if (this.isAcceptable(last.record)) {
        return {
          record: { ...last.record, origin: "inference" },
          outcome: "accepted",
          attempts: attempt,
          timedOut: false,
          usedFallback: false,
        };
      }

      this.logger.log(LogLevel.WARN, "Low confidence inference, using patterns", "RetryingInterpreter", {
        confidence: last.record.confidence,
        amount: last.record.amount,
      });
      return this.fallback(message, "weak", attempt, false);
    }

    this.logger.log(LogLevel.ERROR, "All inference attempts failed, using patterns", "RetryingInterpreter", {
      attempts: attempt,
      lastStatus: last?.status,
    });
    return this.fallback(message, "exhausted", attempt, last?.status === "timeout");
  }

  private async runAttempt(
    inference: InferenceService,
    message: string
  ): Promise<AttemptResult> {
    try {
      return await inference.attempt(message);
    } catch (error) {
      return { status: "failed", error: toErrorMessage(error) };
    }
  }

  private fallback(
    message: string,
    outcome: "weak" | "exhausted",
    attempts: number,
    timedOut: boolean
  ): RetryingResult {
    return {
      record: this.patterns.extract(message, "fallback"),
      outcome,
      attempts,
      timedOut,
      usedFallback: true,
    };
  }
}
