import { addDays } from "date-fns";
import { formatInTimeZone } from "date-fns-tz";
import { z } from "zod";
import type { SupabaseClient } from "@supabase/supabase-js";
import { createSupabaseClient, type SupabaseCredentials } from "../database/supabase";
import type { RecordContext, RecordStore, SuccessfulRecord } from "../../types";
import { LoggingService, LogLevel } from "../logging/LoggingService";
import { ErrorCodes, ErrorSeverity, IntakeError } from "../../utils/error";

const insertedRowSchema = z.object({
  id: z.union([z.string(), z.number()]),
});

export interface SupabaseRecordStoreOptions extends SupabaseCredentials {
  table: string;
  timeZone: string;
  now?: () => Date;
  logger?: LoggingService;
}

export function toTransactionDate(dateOffset: number, now: Date, timeZone: string): string {
  return formatInTimeZone(addDays(now, dateOffset), timeZone, "yyyy-MM-dd'T'HH:mm:ssXXX");
}

export class SupabaseRecordStore implements RecordStore {
  private readonly now: () => Date;
  private readonly logger: LoggingService;
  private client: SupabaseClient | null = null;

  constructor(private readonly options: SupabaseRecordStoreOptions) {
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? LoggingService.getInstance();
  }

  async save(record: SuccessfulRecord, context: RecordContext): Promise<string> {
    const now = this.now();

    const { data, error } = await this.getClient()
      .from(this.options.table)
      .insert({
        amount: record.amount,
        description: record.description,
        category: record.category,
        payment_method: record.paymentMethod,
        location: record.location,
        transaction_date: toTransactionDate(record.dateOffset, now, this.options.timeZone),
        original_text: context.originalText,
        ai_confidence: record.confidence,
        ai_model_used: record.origin,
        source: context.source,
        metadata: context.taskId ? { task_id: context.taskId } : {},
        created_at: now.toISOString(),
      })
      .select("id")
      .single();

    if (error) {
      throw new IntakeError(
        "Failed to insert record",
        ErrorCodes.STORAGE_FAILED,
        ErrorSeverity.HIGH,
        {
          component: "SupabaseRecordStore.save",
          originalError: error.message,
          taskId: context.taskId,
        }
      );
    }

    const row = insertedRowSchema.parse(data);
    this.logger.log(LogLevel.INFO, "Record stored", "SupabaseRecordStore", {
      id: row.id,
      source: context.source,
    });
    return String(row.id);
  }

  private getClient(): SupabaseClient {
    if (!this.client) {
      this.client = createSupabaseClient(this.options);
    }
    return this.client;
  }
}
