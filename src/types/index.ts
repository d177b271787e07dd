export const CATEGORIES = [
  "food",
  "transport",
  "services",
  "entertainment",
  "health",
  "clothing",
  "education",
  "housing",
  "other",
] as const;

export type Category = (typeof CATEGORIES)[number];

export const PAYMENT_METHODS = ["card", "cash", "transfer", "debit"] as const;

export type PaymentMethod = (typeof PAYMENT_METHODS)[number];

export type RecordOrigin = "inference" | "cache" | "pattern-fallback";

export const MAX_DESCRIPTION_LENGTH = 500;
export const FALLBACK_DESCRIPTION_LENGTH = 100;

// Canonical output of interpretation
export interface StructuredRecord {
  amount: number | null;
  description: string;
  category: Category;
  paymentMethod: PaymentMethod;
  location: string | null;
  dateOffset: number;
  confidence: number;
  origin: RecordOrigin;
}

export type SuccessfulRecord = StructuredRecord & { amount: number };

export function isSuccessfulRecord(
  record: StructuredRecord
): record is SuccessfulRecord {
  return record.amount !== null && record.amount > 0;
}

export interface NormalizedMessage {
  normalizedText: string;
  fingerprint: string;
}

// Inference attempts
export type AttemptResult =
  | { status: "ok"; record: StructuredRecord; rawResponse: string }
  | { status: "timeout"; error: string }
  | { status: "failed"; error: string }
  | { status: "malformed"; error: string; rawResponse?: string };

export interface InferenceService {
  attempt(message: string): Promise<AttemptResult>;
  checkConnection(): Promise<boolean>;
}

// Collaborators
export interface RecognitionResult {
  text: string;
  confidence: number;
}

export interface TextRecognizer {
  recognize(imagePath: string): Promise<RecognitionResult>;
}

export interface RecordStore {
  save(record: SuccessfulRecord, context: RecordContext): Promise<string>;
}

export interface RecordContext {
  source: "text" | "receipt";
  originalText: string;
  taskId?: string;
}

// Tasks
export type TaskState = "PENDING" | "PROGRESS" | "SUCCESS" | "FAILURE" | "REVOKED";

export const TERMINAL_STATES: ReadonlySet<TaskState> = new Set([
  "SUCCESS",
  "FAILURE",
  "REVOKED",
]);

export type ProgressStep =
  | "queued"
  | "preprocessing"
  | "recognition"
  | "interpretation"
  | "persistence"
  | "done";

export interface TaskError {
  code: string;
  message: string;
}

export interface ExtractionTask<TResult = ExtractionResult> {
  id: string;
  state: TaskState;
  progressStep: ProgressStep;
  progressPercent: number;
  result?: TResult;
  error?: TaskError;
  createdAt: string;
  updatedAt: string;
}

export interface ExtractionParams {
  createRecord: boolean;
}

export interface ReceiptMetadata {
  receiptNumber?: string;
  taxAmount?: string;
  phone?: string;
  email?: string;
}

export interface ExtractionResult {
  record: SuccessfulRecord;
  recordId: string | null;
  extractedText: string;
  recognitionConfidence: number;
  receiptMetadata: ReceiptMetadata;
}

// Capability interface any broker-backed queue can satisfy
export interface ExtractionQueue<TResult = ExtractionResult> {
  submit(imagePath: string, params: ExtractionParams, taskId?: string): string;
  status(taskId: string): ExtractionTask<TResult> | undefined;
  cancel(taskId: string): boolean;
}

export interface QueueEvents<TResult = ExtractionResult> {
  taskSubmitted: (task: ExtractionTask<TResult>) => void;
  taskUpdated: (task: ExtractionTask<TResult>) => void;
  taskSettled: (task: ExtractionTask<TResult>) => void;
}

// Health
export type HealthState = "healthy" | "degraded" | "unhealthy";
