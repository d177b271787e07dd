import type { StructuredRecord } from "../types";
import { LoggingService, LogLevel } from "../services/logging/LoggingService";

export interface CacheOptions {
  ttlMs: number;
  maxEntries: number;
  retainRatio: number;
  acceptConfidence: number;
  now?: () => number;
  logger?: LoggingService;
}

interface CacheEntry {
  fingerprint: string;
  record: Readonly<StructuredRecord>;
  insertedAt: number;
}

/**
 * Bounded TTL store for accepted interpretations, keyed by message fingerprint.
 *
 * Entries are frozen copies, so a reader never sees a record that a caller
 * mutates after `put`. Map insertion order doubles as age order: a refreshed
 * key is deleted and re-inserted at the tail.
 */
export class ResponseCache {
  private entries = new Map<string, CacheEntry>();
  private readonly now: () => number;
  private readonly logger: LoggingService;

  constructor(private readonly options: CacheOptions) {
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? LoggingService.getInstance();
  }

  get(fingerprint: string): StructuredRecord | undefined {
    const entry = this.entries.get(fingerprint);
    if (!entry) return undefined;

    if (this.isExpired(entry)) {
      this.entries.delete(fingerprint);
      return undefined;
    }

    return { ...entry.record };
  }

  /** Returns false when the record is not eligible for caching. */
  put(fingerprint: string, record: StructuredRecord): boolean {
    if (
      record.amount === null ||
      record.amount <= 0 ||
      record.confidence <= this.options.acceptConfidence
    ) {
      return false;
    }

    this.entries.delete(fingerprint);
    this.entries.set(fingerprint, {
      fingerprint,
      record: Object.freeze({ ...record }),
      insertedAt: this.now(),
    });

    this.cleanup();

    this.logger.log(LogLevel.DEBUG, "Cached interpretation", "ResponseCache", {
      size: this.entries.size,
    });
    return true;
  }

  size(): number {
    return this.entries.size;
  }

  clear(): void {
    this.entries.clear();
  }

  private isExpired(entry: CacheEntry): boolean {
    return this.now() - entry.insertedAt > this.options.ttlMs;
  }

  private cleanup(): void {
    for (const [key, entry] of this.entries) {
      if (this.isExpired(entry)) {
        this.entries.delete(key);
      }
    }

    if (this.entries.size <= this.options.maxEntries) return;

    const keep = Math.floor(this.options.maxEntries * this.options.retainRatio);
    const byAge = Array.from(this.entries.values()).sort(
      (a, b) => a.insertedAt - b.insertedAt
    );
    const newest = keep > 0 ? byAge.slice(-keep) : [];

    this.entries = new Map(newest.map((entry) => [entry.fingerprint, entry]));

    this.logger.log(LogLevel.INFO, "Cache size limited", "ResponseCache", {
      size: this.entries.size,
    });
  }
}
