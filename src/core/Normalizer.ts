import { createHash } from "crypto";
import type { NormalizedMessage } from "../types";

export function normalizeMessage(raw: string): NormalizedMessage {
  const normalizedText = raw.trim().toLowerCase();

  return {
    normalizedText,
    fingerprint: createHash("md5").update(normalizedText, "utf8").digest("hex"),
  };
}
