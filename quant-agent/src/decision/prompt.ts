import type { DecisionInputs } from "./types.ts";

export const SYSTEM_INSTRUCTION =
  "You are a professional quantitative trading analyst. Always respond with valid JSON only.";

export const SOURCE_WEIGHTS = {
  indicators: 30,
  patterns: 25,
  trend: 45,
} as const;

/**
 * User prompt for the reasoning service: the three upstream reports,
 * weighting guidance and the exact output schema the validator enforces.
 */
export function buildDecisionPrompt({ indicator, visual, trend, symbol }: DecisionInputs): string {
  return `You are a professional quantitative trading analyst making short-horizon trading decisions.
Analyze the following market data for ${symbol} and provide a structured trading decision.

=== TECHNICAL INDICATORS ANALYSIS ===
${indicator.summary || "No indicator analysis available"}

Indicator Forecast: ${indicator.forecast}
Evidence: ${indicator.evidence}
Trigger: ${indicator.trigger}

=== CHART PATTERN ANALYSIS ===
${visual.patternDescription || "No pattern analysis available"}

Visual Summary: ${visual.visualSummary || "No visual summary"}

=== TREND ANALYSIS ===
${trend.summary || "No trend analysis available"}

Overall Direction: ${trend.direction}
Confidence: ${trend.confidence.toFixed(2)}

=== DECISION REQUIREMENTS ===
Based on the above analysis, provide a trading decision following these guidelines:

1. Consider all three analyses with these weights:
   - Technical Indicators: ${SOURCE_WEIGHTS.indicators}%
   - Chart Patterns: ${SOURCE_WEIGHTS.patterns}%
   - Trend Analysis: ${SOURCE_WEIGHTS.trend}%

2. Account for risk management:
   - Only recommend LONG/SHORT if confidence is reasonable
   - Consider conflicting signals
   - Evaluate market volatility

3. Provide clear justification for your decision

Respond ONLY with a valid JSON object in this exact format:
{
    "decision": "LONG" | "SHORT" | "HOLD",
    "confidence": 0.0-1.0,
    "justification": "Clear explanation of the decision reasoning",
    "riskLevel": "LOW" | "MEDIUM" | "HIGH",
    "keyFactors": ["factor1", "factor2", "factor3"],
    "stopLoss": number,
    "takeProfit": number
}

Ensure the JSON is valid and complete.`;
}
