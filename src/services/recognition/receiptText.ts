import type { ReceiptMetadata } from "../../types";

const RECEIPT_NUMBER_PATTERNS = [
  /(?:recibo|ticket|factura)[\s#:]*(\d+)/i,
  /(?:no|num|number)[\s.:]*(\d+)/i,
  /(\d{6,})/,
];

const TAX_PATTERNS = [
  /iva[\s:]*(\d+[.,]?\d*)/i,
  /tax[\s:]*(\d+[.,]?\d*)/i,
  /impuesto[\s:]*(\d+[.,]?\d*)/i,
];

const PHONE_PATTERN = /(\d{3}[-.\s]?\d{3}[-.\s]?\d{4})/;
const EMAIL_PATTERN = /([a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,})/;

// "|" is the usual misread of a capital I
export function cleanRecognizedText(text: string): string {
  return text
    .replace(/\|/g, "I")
    .replace(/\s+/g, " ")
    .replace(/[^\p{L}\p{N}\s$.,:\-()/@_%+]/gu, "")
    .trim();
}

function firstCapture(text: string, patterns: RegExp[]): string | undefined {
  for (const pattern of patterns) {
    const match = pattern.exec(text);
    if (match) return match[1];
  }
  return undefined;
}

export function extractReceiptMetadata(text: string): ReceiptMetadata {
  const metadata: ReceiptMetadata = {};

  const receiptNumber = firstCapture(text, RECEIPT_NUMBER_PATTERNS);
  if (receiptNumber) metadata.receiptNumber = receiptNumber;

  const taxAmount = firstCapture(text, TAX_PATTERNS);
  if (taxAmount) metadata.taxAmount = taxAmount;

  const phone = PHONE_PATTERN.exec(text);
  if (phone) metadata.phone = phone[1];

  const email = EMAIL_PATTERN.exec(text);
  if (email) metadata.email = email[1];

  return metadata;
}
