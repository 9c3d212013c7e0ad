import { z } from "zod";
import {
  createDecisionRecord,
  type DecisionRecord,
  FAILURE_TAGS,
  holdRecord,
  isDecision,
  isRiskLevel,
} from "./types.ts";

export type ValidationResult =
  | { ok: true; record: DecisionRecord }
  | { ok: false; error: string };

const EXCERPT_LENGTH = 200;

/**
 * Remove an optional ```json (or bare ```) fence around the response.
 */
export function stripCodeFence(text: string): string {
  let cleaned = text.trim();
  if (cleaned.startsWith("```json")) {
    cleaned = cleaned.slice(7);
  } else if (cleaned.startsWith("```")) {
    cleaned = cleaned.slice(3);
  }
  if (cleaned.endsWith("```")) {
    cleaned = cleaned.slice(0, -3);
  }
  return cleaned.trim();
}

function toNumber(value: unknown): number | null {
  if (typeof value === "number") return Number.isNaN(value) ? null : value;
  if (typeof value === "string" && value.trim() !== "") {
    const n = Number(value.trim());
    return Number.isNaN(n) ? null : n;
  }
  return null;
}

function required(field: string) {
  return z.unknown().superRefine((value, ctx) => {
    if (value === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Missing required field: ${field}` });
    }
  });
}

/** Non-negative finite price suggestion, 0 otherwise */
const priceSuggestion = z.unknown().transform((value) => {
  const n = toNumber(value);
  return n !== null && Number.isFinite(n) && n >= 0 ? n : 0;
});

export const DecisionResponseSchema = z.object({
  decision: required("decision").transform((v) => (isDecision(v) ? v : "HOLD" as const)),
  confidence: required("confidence").transform((v, ctx) => {
    const n = toNumber(v);
    if (n === null) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid confidence: ${JSON.stringify(v)}` });
      return z.NEVER;
    }
    return Math.max(0, Math.min(1, n));
  }),
  justification: required("justification").transform((v) => (typeof v === "string" ? v : JSON.stringify(v))),
  riskLevel: required("riskLevel").transform((v) => (isRiskLevel(v) ? v : "MEDIUM" as const)),
  keyFactors: z.unknown().transform((v) =>
    Array.isArray(v) ? v.filter((f): f is string => typeof f === "string") : []
  ),
  stopLoss: priceSuggestion,
  takeProfit: priceSuggestion,
});

/**
 * Parse the reasoning service's text into a DecisionRecord, coercing
 * out-of-range values and rejecting responses that omit required fields.
 */
export function validateDecisionResponse(raw: string): ValidationResult {
  let parsed: unknown;
  try {
    parsed = JSON.parse(stripCodeFence(raw));
  } catch (err) {
    return { ok: false, error: err instanceof Error ? err.message : String(err) };
  }

  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    return { ok: false, error: "Response is not a JSON object" };
  }

  const result = DecisionResponseSchema.safeParse(parsed);
  if (!result.success) {
    return { ok: false, error: result.error.issues.map((i) => i.message).join("; ") };
  }

  return { ok: true, record: createDecisionRecord(result.data) };
}

export function truncateResponse(raw: string, length = EXCERPT_LENGTH): string {
  return raw.length > length ? `${raw.slice(0, length)}...` : raw;
}

export function parsingFailureRecord(raw: string, error: string): DecisionRecord {
  return holdRecord(
    `Failed to parse reasoning response: ${error}. Response: ${truncateResponse(raw)}`,
    [FAILURE_TAGS.parsingError],
  );
}
