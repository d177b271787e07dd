import keywordTable from "../data/keywords.json";
import {
  CATEGORIES,
  FALLBACK_DESCRIPTION_LENGTH,
  PAYMENT_METHODS,
  type Category,
  type PaymentMethod,
  type StructuredRecord,
} from "../types";
import type { PatternConfidence } from "../config";

interface AmountPattern {
  pattern: RegExp;
  multiplier: number;
}

// "mil" is thousand in the source locale. Order matters: first match wins.
const AMOUNT_PATTERNS: AmountPattern[] = [
  { pattern: /(\d+(?:\.\d+)?)\s*k(?:\s|$)/, multiplier: 1000 },
  { pattern: /(\d+(?:\.\d+)?)\s*mil(?:\s|$)/, multiplier: 1000 },
  { pattern: /(\d{4,})/, multiplier: 1 },
  { pattern: /(\d+(?:\.\d+)?)\s*(?:mil|k)/, multiplier: 1000 },
];

/** Strips diacritics so "débito" and "debito" match the same keyword. */
export function foldAccents(text: string): string {
  return text.normalize("NFD").replace(/[\u0300-\u036f]/g, "");
}

/** Whole-word matcher for a keyword, allowing a Spanish plural ending. */
function wordPattern(keyword: string): RegExp {
  const escaped = foldAccents(keyword).replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
  return new RegExp(`\\b${escaped}(?:s|es)?\\b`);
}

const CATEGORY_KEYWORDS: Record<Category, string[]> = keywordTable.categories;

const PAYMENT_KEYWORDS: Record<PaymentMethod, string[]> = keywordTable.paymentMethods;

// Declaration order decides ties
const CATEGORY_MATCHERS = CATEGORIES.map((name) => ({
  name,
  patterns: CATEGORY_KEYWORDS[name].map(wordPattern),
}));

const PAYMENT_MATCHERS = PAYMENT_METHODS.map((name) => ({
  name,
  patterns: PAYMENT_KEYWORDS[name].map(wordPattern),
}));

export function extractAmount(message: string): number | null {
  const text = message.toLowerCase();

  for (const { pattern, multiplier } of AMOUNT_PATTERNS) {
    const match = pattern.exec(text);
    if (!match) continue;

    // Two decimals at most: 1.1 * 1000 is 1100.0000000000002 in binary floats
    const value = Math.round(Number.parseFloat(match[1]) * multiplier * 100) / 100;
    if (Number.isFinite(value) && value > 0) {
      return value;
    }
  }

  return null;
}

export function detectCategory(message: string): Category {
  const text = foldAccents(message.toLowerCase());

  const hit = CATEGORY_MATCHERS.find(({ patterns }) =>
    patterns.some((pattern) => pattern.test(text))
  );
  return hit?.name ?? "other";
}

export function detectPaymentMethod(message: string): PaymentMethod {
  const text = foldAccents(message.toLowerCase());

  const hit = PAYMENT_MATCHERS.find(({ patterns }) =>
    patterns.some((pattern) => pattern.test(text))
  );
  return hit?.name ?? "card";
}

export function detectDateOffset(message: string): number {
  const text = foldAccents(message.toLowerCase());

  const hit = keywordTable.dateOffsets.find(({ keyword }) =>
    new RegExp(`\\b${foldAccents(keyword)}\\b`).test(text)
  );
  return hit?.offset ?? 0;
}

export class PatternExtractor {
  constructor(
    private readonly confidence: {
      baseline: PatternConfidence;
      fallback: PatternConfidence;
    }
  ) {}

  /**
   * @param mode "baseline" when no inference service is in play, "fallback"
   * when replacing a failed or weak inference.
   */
  extract(message: string, mode: "baseline" | "fallback"): StructuredRecord {
    const amount = extractAmount(message);
    const levels = this.confidence[mode];

    return {
      amount,
      description: message.trim().slice(0, FALLBACK_DESCRIPTION_LENGTH),
      category: detectCategory(message),
      paymentMethod: detectPaymentMethod(message),
      location: null,
      dateOffset: detectDateOffset(message),
      confidence: amount !== null ? levels.found : levels.missing,
      origin: "pattern-fallback",
    };
  }
}
