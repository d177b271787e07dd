import { config as defaultConfig, type AppConfig } from "./config";
import { MessageInterpreter } from "./core/MessageInterpreter";
import { MetricsAggregator, type HealthSnapshot } from "./core/MetricsAggregator";
import { PatternExtractor } from "./core/PatternExtractor";
import { ResponseCache } from "./core/ResponseCache";
import { RetryingInterpreter, type Sleep } from "./core/RetryingInterpreter";
import { TaskQueue } from "./core/TaskQueue";
import { InferenceClient } from "./services/inference/InferenceClient";
import { LoggingService, LogLevel } from "./services/logging/LoggingService";
import { createReceiptProcessor } from "./services/receipt/ReceiptProcessor";
import { SupabaseRecordStore } from "./services/storage/SupabaseRecordStore";
import type {
  ExtractionParams,
  ExtractionResult,
  ExtractionTask,
  InferenceService,
  RecordStore,
  StructuredRecord,
  TextRecognizer,
} from "./types";
import { ErrorCodes, ErrorSeverity, IntakeError } from "./utils/error";

export interface Collaborators {
  /** The text-recognition engine used for receipt images. */
  recognizer: TextRecognizer;
  /** Defaults to a Supabase store when credentials are configured. */
  store?: RecordStore | null;
  /** Defaults to an InferenceClient; pass null to run on patterns only. */
  inference?: InferenceService | null;
  logger?: LoggingService;
  sleep?: Sleep;
  now?: () => number;
}

export interface HealthReport extends HealthSnapshot {
  inferenceReachable?: boolean;
}

export interface IntakeContext {
  interpret(text: string): Promise<StructuredRecord>;
  submitExtraction(imagePath: string, params: ExtractionParams, taskId?: string): string;
  getTaskStatus(taskId: string): ExtractionTask;
  cancelTask(taskId: string): boolean;
  getHealth(options?: { checkInference?: boolean }): Promise<HealthReport>;
  shutdown(): Promise<void>;
  readonly cache: ResponseCache;
  readonly metrics: MetricsAggregator;
  readonly queue: TaskQueue<ExtractionResult>;
}

function resolveStore(config: AppConfig, logger: LoggingService): RecordStore | null {
  if (!config.storage.supabaseUrl || !config.storage.supabaseKey) {
    return null;
  }
  return new SupabaseRecordStore({
    supabaseUrl: config.storage.supabaseUrl,
    supabaseKey: config.storage.supabaseKey,
    table: config.storage.table,
    timeZone: config.timeZone,
    logger,
  });
}

function resolveInference(config: AppConfig, logger: LoggingService): InferenceService | null {
  if (!config.inference.enabled) {
    return null;
  }
  return new InferenceClient({
    baseUrl: config.inference.baseUrl,
    apiKey: config.inference.apiKey,
    model: config.inference.model,
    timeoutMs: config.interpreter.timeoutMs,
    penalties: config.interpreter.penalties,
    logger,
  });
}

/**
 * Builds the shared pipeline components once and hands out the operations
 * that use them. Call `shutdown` before the process exits.
 */
export function createIntakeContext(
  collaborators: Collaborators,
  config: AppConfig = defaultConfig
): IntakeContext {
  const logger =
    collaborators.logger ??
    new LoggingService({ level: config.logging.level, file: config.logging.file });
  const now = collaborators.now;

  const inference =
    collaborators.inference === undefined
      ? resolveInference(config, logger)
      : collaborators.inference;
  const store =
    collaborators.store === undefined ? resolveStore(config, logger) : collaborators.store;

  const cache = new ResponseCache({
    ttlMs: config.cache.ttlMs,
    maxEntries: config.cache.maxEntries,
    retainRatio: config.cache.retainRatio,
    acceptConfidence: config.interpreter.acceptConfidence,
    now,
    logger,
  });
  const metrics = new MetricsAggregator(config.metrics.windowMs, { now, logger });
  const patterns = new PatternExtractor({
    baseline: config.interpreter.baselineConfidence,
    fallback: config.interpreter.fallbackConfidence,
  });
  const retrying = new RetryingInterpreter(
    inference,
    patterns,
    {
      maxRetries: config.interpreter.maxRetries,
      baseDelayMs: config.interpreter.baseDelayMs,
      acceptConfidence: config.interpreter.acceptConfidence,
    },
    { sleep: collaborators.sleep, logger }
  );
  const interpreter = new MessageInterpreter({
    cache,
    interpreter: retrying,
    patterns,
    metrics,
    logger,
    now,
  });

  const queue = new TaskQueue<ExtractionResult>(
    createReceiptProcessor({
      recognizer: collaborators.recognizer,
      interpreter,
      store,
      metrics,
      maxImageBytes: config.queue.maxImageBytes,
      logger,
    }),
    {
      concurrency: config.queue.concurrency,
      resultTtlMs: config.queue.resultTtlMs,
      now,
      logger,
    }
  );

  logger.log(LogLevel.INFO, "Intake pipeline ready", "IntakeContext", {
    inference: inference ? config.inference.baseUrl : "disabled",
    storage: store ? config.storage.table : "disabled",
    concurrency: config.queue.concurrency,
  });

  return {
    cache,
    metrics,
    queue,

    interpret: (text) => interpreter.interpret(text),

    submitExtraction: (imagePath, params, taskId) => queue.submit(imagePath, params, taskId),

    getTaskStatus(taskId) {
      const task = queue.status(taskId);
      if (!task) {
        throw new IntakeError(`Task ${taskId} not found`, ErrorCodes.TASK_NOT_FOUND, ErrorSeverity.LOW, {
          component: "IntakeContext.getTaskStatus",
          taskId,
        });
      }
      return task;
    },

    cancelTask: (taskId) => queue.cancel(taskId),

    async getHealth(options = {}) {
      const report: HealthReport = metrics.health();
      if (options.checkInference && inference) {
        report.inferenceReachable = await inference.checkConnection();
        if (!report.inferenceReachable) {
          report.issues.push("Inference service unreachable");
          if (report.status === "healthy") report.status = "degraded";
        }
      }
      return report;
    },

    async shutdown() {
      await queue.close();
      cache.clear();
      logger.log(LogLevel.INFO, "Intake pipeline stopped", "IntakeContext");
      logger.close();
    },
  };
}

export { loadConfig, type AppConfig } from "./config";
export { IntakeError, ErrorCodes, ErrorSeverity } from "./utils/error";
export { LoggingService, LogLevel } from "./services/logging/LoggingService";
export * from "./types";
