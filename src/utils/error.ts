export enum ErrorCodes {
  // Inference
  INFERENCE_FAILED = "INFERENCE_FAILED",
  INFERENCE_TIMEOUT = "INFERENCE_TIMEOUT",
  MALFORMED_INFERENCE_OUTPUT = "MALFORMED_INFERENCE_OUTPUT",

  // Receipt extraction
  IMAGE_NOT_FOUND = "IMAGE_NOT_FOUND",
  IMAGE_TOO_LARGE = "IMAGE_TOO_LARGE",
  RECOGNITION_FAILED = "RECOGNITION_FAILED",
  NO_AMOUNT_FOUND = "NO_AMOUNT_FOUND",
  STORAGE_FAILED = "STORAGE_FAILED",

  // Queue
  TASK_NOT_FOUND = "TASK_NOT_FOUND",
  DUPLICATE_TASK = "DUPLICATE_TASK",
  QUEUE_CLOSED = "QUEUE_CLOSED",
  TASK_FAILED = "TASK_FAILED",

  INVALID_CONFIGURATION = "INVALID_CONFIGURATION",
}

export enum ErrorSeverity {
  LOW = "low",
  MEDIUM = "medium",
  HIGH = "high",
  CRITICAL = "critical",
}

export interface ErrorMetadata {
  component: string;
  originalError?: string;
  taskId?: string;
  imagePath?: string;
  [key: string]: unknown;
}

export class IntakeError extends Error {
  code: ErrorCodes;
  severity: ErrorSeverity;
  metadata: ErrorMetadata;

  constructor(
    message: string,
    code: ErrorCodes,
    severity: ErrorSeverity,
    metadata: Partial<ErrorMetadata>
  ) {
    super(message);
    this.name = "IntakeError";
    this.code = code;
    this.severity = severity;
    this.metadata = {
      ...metadata,
      component: metadata.component || "unknown",
    };
  }
}

export function toErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
