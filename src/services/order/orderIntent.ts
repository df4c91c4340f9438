// "order number is 1003", "order #1003", "order no. 1003", "order 1003"
const EXPLICIT_ORDER_NUMBER = /order\s*(?:number|no\.?|#)?(?:\s*(?:is|:))?\s*(\d{3,})/i;
// Any standalone run of 3+ digits; shorter numbers are never order ids
const STANDALONE_NUMBER = /\b(\d{3,})\b/;

const INTENT_KEYWORDS = [
  "order status",
  "track my order",
  "check my order",
  "order update",
];

/**
 * Explicit "order N" phrasing wins over any other number in the text.
 */
export function extractOrderNumber(text: string): string | undefined {
  const explicit = EXPLICIT_ORDER_NUMBER.exec(text);
  if (explicit) return explicit[1];

  const standalone = STANDALONE_NUMBER.exec(text);
  return standalone ? standalone[1] : undefined;
}

export function detectOrderIntent(text: string): boolean {
  const normalized = text.toLowerCase();
  return (
    INTENT_KEYWORDS.some((keyword) => normalized.includes(keyword)) ||
    (normalized.includes("order") && normalized.includes("status"))
  );
}
