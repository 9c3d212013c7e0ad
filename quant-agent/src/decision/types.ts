import type { IndicatorReport } from "../indicators/classifier.ts";
import type { VisualReport } from "../pattern/describer.ts";
import type { TrendReport } from "../trend/types.ts";

export const DECISIONS = ["LONG", "SHORT", "HOLD"] as const;
export const RISK_LEVELS = ["LOW", "MEDIUM", "HIGH"] as const;

export type Decision = typeof DECISIONS[number];
export type RiskLevel = typeof RISK_LEVELS[number];

/** Key factor tags attached to fallback records */
export const FAILURE_TAGS = {
  apiError: "API_ERROR",
  modelDecommissioned: "MODEL_DECOMMISSIONED",
  parsingError: "PARSING_ERROR",
  notConfigured: "NOT_CONFIGURED",
} as const;

export interface DecisionRecord {
  readonly decision: Decision;
  /** 0.0 to 1.0 */
  readonly confidence: number;
  readonly justification: string;
  readonly riskLevel: RiskLevel;
  readonly keyFactors: readonly string[];
  readonly stopLoss: number;
  readonly takeProfit: number;
}

export interface DecisionInputs {
  indicator: IndicatorReport;
  visual: VisualReport;
  trend: TrendReport;
  symbol: string;
}

export type FallbackReason = "service_error" | "model_decommissioned" | "parse_error" | "not_configured";

/** A decision record plus what produced it, kept for audit */
export interface SynthesizedDecision {
  readonly record: DecisionRecord;
  readonly symbol: string;
  /** Model id actually requested, after retired-model remapping */
  readonly model: string | null;
  readonly fallback: FallbackReason | null;
  readonly inputs: Readonly<Omit<DecisionInputs, "symbol">>;
}

export function isDecision(value: unknown): value is Decision {
  return DECISIONS.some((d) => d === value);
}

export function isRiskLevel(value: unknown): value is RiskLevel {
  return RISK_LEVELS.some((r) => r === value);
}

/** Build the single frozen record for one synthesis call */
export function createDecisionRecord(fields: {
  decision: Decision;
  confidence: number;
  justification: string;
  riskLevel: RiskLevel;
  keyFactors?: readonly string[];
  stopLoss?: number;
  takeProfit?: number;
}): DecisionRecord {
  return Object.freeze({
    decision: fields.decision,
    confidence: fields.confidence,
    justification: fields.justification,
    riskLevel: fields.riskLevel,
    keyFactors: Object.freeze([...(fields.keyFactors ?? [])]),
    stopLoss: fields.stopLoss ?? 0,
    takeProfit: fields.takeProfit ?? 0,
  });
}

/** HOLD with zero confidence and HIGH risk, used on every failure path */
export function holdRecord(justification: string, keyFactors: readonly string[]): DecisionRecord {
  return createDecisionRecord({
    decision: "HOLD",
    confidence: 0,
    justification,
    riskLevel: "HIGH",
    keyFactors,
  });
}
