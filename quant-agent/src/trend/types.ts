export type TrendDirection = "Bullish" | "Bearish" | "Neutral" | "Insufficient";

export type StrengthLabel = "Weak" | "Moderate" | "Strong";

export type Timeframe = "short" | "medium" | "long";

export interface TrendReading {
  direction: TrendDirection;
  /** OLS slope of close against bar index, price units per bar */
  slope: number;
  /** R² of the fit, 0.0 to 1.0 */
  fitQuality: number;
  strengthLabel: StrengthLabel;
}

export type MomentumLabel =
  | "Strong Bullish"
  | "Strong Bearish"
  | "Moderate Bullish"
  | "Moderate Bearish"
  | "Weak";

export type VolumeTrend = "Increasing" | "Decreasing" | "Stable" | "Insufficient data";

export type AccelerationDirection =
  | "Accelerating Up"
  | "Accelerating Down"
  | "Constant Velocity"
  | "Insufficient data";

export interface MomentumReading {
  /** Percentage change over 1, 5 and 10 bars; 0 when history is too short */
  periodReturns: { 1: number; 5: number; 10: number };
  label: MomentumLabel;
  volumeTrend: VolumeTrend;
  volumeRatio: number;
  acceleration: number;
  accelerationDirection: AccelerationDirection;
}

export type StrengthClass = "Weak" | "Moderate" | "Strong" | "Very Strong" | "Insufficient data";

export interface TrendStrength {
  /** ADX-style score, typically 0-100 */
  score: number;
  classification: StrengthClass;
}

export type BreakoutStatus =
  | "None"
  | "ResistanceBreakout"
  | "SupportBreakdown"
  | "Insufficient data";

export interface BreakoutState {
  status: BreakoutStatus;
  /** Percentage distance beyond the broken level, 0 when nothing broke */
  strengthPct: number;
  supportLevel: number;
  resistanceLevel: number;
  currentPrice: number;
}

export type OverallDirection = "Bullish" | "Bearish" | "Neutral";

/** The three capped terms summed into the trend confidence */
export interface ConfidenceFactors {
  agreement: number;
  strength: number;
  momentum: number;
}

export interface TrendReport {
  timeframes: Record<Timeframe, TrendReading>;
  momentum: MomentumReading;
  strength: TrendStrength;
  breakout: BreakoutState;
  direction: OverallDirection;
  /** 0.0 to 1.0 */
  confidence: number;
  confidenceFactors: ConfidenceFactors;
  summary: string;
}
