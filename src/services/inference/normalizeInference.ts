import { z } from "zod";
import keywordTable from "../../data/keywords.json";
import {
  CATEGORIES,
  FALLBACK_DESCRIPTION_LENGTH,
  MAX_DESCRIPTION_LENGTH,
  PAYMENT_METHODS,
  type Category,
  type PaymentMethod,
  type StructuredRecord,
} from "../../types";
import type { ConfidencePenalties } from "../../config";

const categorySchema = z.enum(CATEGORIES);
const paymentMethodSchema = z.enum(PAYMENT_METHODS);

const CATEGORY_ALIASES = z
  .record(z.string(), categorySchema)
  .parse(keywordTable.categoryAliases);
const PAYMENT_ALIASES = z
  .record(z.string(), paymentMethodSchema)
  .parse(keywordTable.paymentAliases);

const payloadSchema = z.record(z.string(), z.unknown());
const amountSchema = z.number().finite().positive();
const confidenceSchema = z.number().finite();
const textSchema = z.string().trim().min(1);
const offsetSchema = z.number().finite();

export function toCategory(value: unknown): Category | null {
  const parsed = textSchema.safeParse(value);
  if (!parsed.success) return null;

  const name = parsed.data.toLowerCase();
  const canonical = categorySchema.safeParse(name);
  if (canonical.success) return canonical.data;
  return CATEGORY_ALIASES[name] ?? null;
}

export function toPaymentMethod(value: unknown): PaymentMethod | null {
  const parsed = textSchema.safeParse(value);
  if (!parsed.success) return null;

  const name = parsed.data.toLowerCase();
  const canonical = paymentMethodSchema.safeParse(name);
  if (canonical.success) return canonical.data;
  return PAYMENT_ALIASES[name] ?? null;
}

/**
 * Returns the first balanced top-level `{...}` block in `raw`, skipping braces
 * that appear inside JSON string literals.
 */
export function extractJsonBlock(raw: string): string | null {
  const start = raw.indexOf("{");
  if (start === -1) return null;

  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < raw.length; i++) {
    const char = raw[i];

    if (inString) {
      if (escaped) escaped = false;
      else if (char === "\\") escaped = true;
      else if (char === '"') inString = false;
      continue;
    }

    if (char === '"') inString = true;
    else if (char === "{") depth++;
    else if (char === "}") {
      depth--;
      if (depth === 0) return raw.slice(start, i + 1);
    }
  }

  return null;
}

/**
 * Parses the inference service's reply into a record. Returns null when the
 * reply has no JSON object in it or the object does not parse.
 */
export function parseInferenceResponse(
  raw: string,
  originalMessage: string,
  penalties: ConfidencePenalties
): StructuredRecord | null {
  const block = extractJsonBlock(raw);
  if (!block) return null;

  let data: unknown;
  try {
    data = JSON.parse(block);
  } catch {
    return null;
  }

  const payload = payloadSchema.safeParse(data);
  if (!payload.success) return null;

  return normalizeInference(payload.data, originalMessage, penalties);
}

export function normalizeInference(
  data: Record<string, unknown>,
  originalMessage: string,
  penalties: ConfidencePenalties
): StructuredRecord {
  const rawConfidence = confidenceSchema.safeParse(data.confidence);
  let confidence = rawConfidence.success
    ? Math.min(Math.max(rawConfidence.data, 0), 1)
    : 0;

  const penalize = (amount: number) => {
    confidence = Math.max(confidence - amount, 0);
  };

  const amount = amountSchema.safeParse(data.amount);
  if (!amount.success) penalize(penalties.invalidAmount);

  const category = toCategory(data.category);
  if (!category) penalize(penalties.invalidCategory);

  const paymentMethod = toPaymentMethod(data.payment_method);
  if (!paymentMethod) penalize(penalties.invalidPaymentMethod);

  const description = textSchema.safeParse(data.description);
  const location = textSchema.safeParse(data.location);
  const dateOffset = offsetSchema.safeParse(data.date_offset);

  return {
    amount: amount.success ? amount.data : null,
    description: description.success
      ? description.data.slice(0, MAX_DESCRIPTION_LENGTH)
      : originalMessage.trim().slice(0, FALLBACK_DESCRIPTION_LENGTH),
    category: category ?? "other",
    paymentMethod: paymentMethod ?? "card",
    location: location.success ? location.data : null,
    dateOffset: dateOffset.success ? Math.trunc(dateOffset.data) : 0,
    confidence,
    origin: "inference",
  };
}
