import { rm, stat } from "fs/promises";
import type { MessageInterpreter } from "../../core/MessageInterpreter";
import type { MetricsAggregator } from "../../core/MetricsAggregator";
import type { QueuedJob, TaskContext, TaskProcessor } from "../../core/TaskQueue";
import {
  isSuccessfulRecord,
  type ExtractionResult,
  type RecognitionResult,
  type RecordStore,
  type TextRecognizer,
} from "../../types";
import { LoggingService, LogLevel } from "../logging/LoggingService";
import { cleanRecognizedText, extractReceiptMetadata } from "../recognition/receiptText";
import { ErrorCodes, ErrorSeverity, IntakeError, toErrorMessage } from "../../utils/error";

export interface ReceiptProcessorDeps {
  recognizer: TextRecognizer;
  interpreter: MessageInterpreter;
  store: RecordStore | null;
  metrics: MetricsAggregator;
  maxImageBytes: number;
  logger?: LoggingService;
}

/**
 * Builds the worker for receipt jobs: preprocessing (10) → recognition (30) →
 * interpretation (70) → persistence (90, only with createRecord) → done.
 * The image is removed when the job ends, whatever the outcome, or when the
 * job is cancelled before it starts.
 */
export function createReceiptProcessor(
  deps: ReceiptProcessorDeps
): TaskProcessor<ExtractionResult> {
  const logger = deps.logger ?? LoggingService.getInstance();

  const fail = (message: string, code: ErrorCodes, job: QueuedJob, originalError?: string) =>
    new IntakeError(message, code, ErrorSeverity.MEDIUM, {
      component: "ReceiptProcessor",
      taskId: job.taskId,
      imagePath: job.imagePath,
      originalError,
    });

  async function run(job: QueuedJob, context: TaskContext): Promise<ExtractionResult> {
    context.progress("preprocessing", 10);

    let size: number;
    try {
      size = (await stat(job.imagePath)).size;
    } catch (error) {
      throw fail(
        `Image file not found: ${job.imagePath}`,
        ErrorCodes.IMAGE_NOT_FOUND,
        job,
        toErrorMessage(error)
      );
    }
    if (size > deps.maxImageBytes) {
      throw fail(
        `Image exceeds ${deps.maxImageBytes} bytes`,
        ErrorCodes.IMAGE_TOO_LARGE,
        job
      );
    }

    context.progress("recognition", 30);

    let recognition: RecognitionResult;
    try {
      recognition = await deps.recognizer.recognize(job.imagePath);
    } catch (error) {
      throw fail(
        "Text recognition failed",
        ErrorCodes.RECOGNITION_FAILED,
        job,
        toErrorMessage(error)
      );
    }

    const extractedText = cleanRecognizedText(recognition.text);
    if (!extractedText) {
      throw fail("No text could be extracted from the image", ErrorCodes.RECOGNITION_FAILED, job);
    }

    logger.log(LogLevel.DEBUG, "Recognized receipt text", "ReceiptProcessor", {
      taskId: job.taskId,
      preview: extractedText.slice(0, 200),
    });

    context.progress("interpretation", 70);

    const record = await deps.interpreter.interpret(extractedText);
    if (!isSuccessfulRecord(record)) {
      throw fail("No amount found in the recognized text", ErrorCodes.NO_AMOUNT_FOUND, job);
    }

    let recordId: string | null = null;
    if (job.params.createRecord && !deps.store) {
      logger.log(LogLevel.WARN, "No record store configured, skipping persistence", "ReceiptProcessor", {
        taskId: job.taskId,
      });
    }
    if (job.params.createRecord && deps.store) {
      context.progress("persistence", 90);

      try {
        recordId = await deps.store.save(record, {
          source: "receipt",
          originalText: extractedText,
          taskId: job.taskId,
        });
      } catch (error) {
        throw fail("Failed to store record", ErrorCodes.STORAGE_FAILED, job, toErrorMessage(error));
      }
      deps.metrics.recordCreated(record.category, record.paymentMethod);
    }

    context.progress("done", 100);

    return {
      record,
      recordId,
      extractedText,
      recognitionConfidence: recognition.confidence,
      receiptMetadata: extractReceiptMetadata(extractedText),
    };
  }

  async function removeImage(job: QueuedJob): Promise<void> {
    try {
      await rm(job.imagePath, { force: true });
      logger.log(LogLevel.DEBUG, "Removed image file", "ReceiptProcessor", {
        taskId: job.taskId,
        imagePath: job.imagePath,
      });
    } catch (error) {
      logger.log(LogLevel.WARN, "Failed to remove image file", "ReceiptProcessor", {
        taskId: job.taskId,
        imagePath: job.imagePath,
        originalError: toErrorMessage(error),
      });
    }
  }

  const processor = async (job: QueuedJob, context: TaskContext): Promise<ExtractionResult> => {
    try {
      return await run(job, context);
    } finally {
      await removeImage(job);
    }
  };

  // A job cancelled while queued never runs, so its image is dropped here
  return Object.assign(processor, { discard: removeImage });
}
