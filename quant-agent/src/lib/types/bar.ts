import { z } from "zod";

/**
 * OHLCV bar - one observation of a traded instrument
 */
export const BarSchema = z.object({
  /** Bar open time, milliseconds since epoch */
  timestamp: z.number().int().nonnegative(),
  open: z.number().positive(),
  high: z.number().positive(),
  low: z.number().positive(),
  close: z.number().positive(),
  /** Traded volume over the bar */
  volume: z.number().nonnegative(),
});

export type Bar = z.infer<typeof BarSchema>;

/** Time-ordered bars, immutable once handed to the analyzers */
export type PriceSeries = readonly Readonly<Bar>[];

export const PriceSeriesSchema = z.array(BarSchema).superRefine((bars, ctx) => {
  for (let i = 1; i < bars.length; i++) {
    if (bars[i].timestamp <= bars[i - 1].timestamp) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [i, "timestamp"],
        message: bars[i].timestamp === bars[i - 1].timestamp
          ? `Duplicate timestamp ${bars[i].timestamp} at bar ${i}`
          : `Bar ${i} is out of order (${bars[i].timestamp} after ${bars[i - 1].timestamp})`,
      });
    }
  }
});

/**
 * Validate raw bars and freeze them into a PriceSeries.
 * Throws with every zod issue joined when the input is malformed.
 */
export function parsePriceSeries(raw: unknown): PriceSeries {
  const result = PriceSeriesSchema.safeParse(raw);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".") || "series"}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid price series: ${details}`);
  }
  return Object.freeze(result.data.map((bar) => Object.freeze(bar)));
}

const CSV_COLUMNS = ["timestamp", "open", "high", "low", "close", "volume"] as const;

function parseTimestamp(value: string): number {
  const trimmed = value.trim();
  if (/^\d+$/.test(trimmed)) return Number(trimmed);
  return Date.parse(trimmed);
}

/**
 * Parse `timestamp,open,high,low,close,volume` CSV text into raw bars.
 * Column order follows the header row; timestamps may be epoch
 * milliseconds or anything Date.parse accepts.
 */
export function parseCsvBars(text: string): unknown[] {
  const lines = text.split(/\r?\n/).map((l) => l.trim()).filter((l) => l.length > 0);
  if (lines.length === 0) {
    throw new Error("CSV input is empty");
  }

  const header = lines[0].split(",").map((h) => h.trim().toLowerCase());
  const indices = CSV_COLUMNS.map((col) => header.indexOf(col));
  const missing = CSV_COLUMNS.filter((_, i) => indices[i] === -1);
  if (missing.length > 0) {
    throw new Error(`CSV header missing columns: ${missing.join(", ")}`);
  }

  return lines.slice(1).map((line) => {
    const cells = line.split(",");
    const [ts, open, high, low, close, volume] = indices.map((i) => cells[i] ?? "");
    return {
      timestamp: parseTimestamp(ts),
      open: Number(open),
      high: Number(high),
      low: Number(low),
      close: Number(close),
      volume: Number(volume),
    };
  });
}
