import type { AuditSink, DecisionAuditEvent, DecisionAuditEvents } from "../audit/logger.ts";
import { defaultModelFor, type LlmConfig, resolveModel } from "../config.ts";
import type { IndicatorReport } from "../indicators/classifier.ts";
import type { Analyzer } from "../lib/types/analyzer.ts";
import type { VisualReport } from "../pattern/describer.ts";
import type { TrendReport } from "../trend/types.ts";
import { buildDecisionPrompt, SYSTEM_INSTRUCTION } from "./prompt.ts";
import type { ReasoningService } from "./reasoning.ts";
import {
  type DecisionInputs,
  type DecisionRecord,
  FAILURE_TAGS,
  type FallbackReason,
  holdRecord,
  type SynthesizedDecision,
} from "./types.ts";
import { parsingFailureRecord, validateDecisionResponse } from "./validator.ts";

export interface SynthesizerOptions {
  llm: LlmConfig;
  service: ReasoningService;
  audit?: AuditSink;
}

const DECOMMISSIONED_PATTERNS = [/decommissioned/i, /model_not_found/i, /no longer (available|supported)/i];

export function isDecommissionedError(message: string): boolean {
  return DECOMMISSIONED_PATTERNS.some((p) => p.test(message));
}

/**
 * Fallback for a failed service call. A retired-model failure names the
 * currently supported default model so the operator can update config.
 */
export function serviceFailureRecord(err: unknown, llm: LlmConfig): {
  record: DecisionRecord;
  reason: FallbackReason;
} {
  const message = err instanceof Error ? err.message : String(err);

  if (isDecommissionedError(message)) {
    return {
      record: holdRecord(
        "LLM API error: The selected model is no longer available. " +
          `Update your configuration to use '${defaultModelFor(llm.provider)}'.`,
        [FAILURE_TAGS.apiError, FAILURE_TAGS.modelDecommissioned],
      ),
      reason: "model_decommissioned",
    };
  }

  return {
    record: holdRecord(`LLM API error: ${message}`, [FAILURE_TAGS.apiError]),
    reason: "service_error",
  };
}

/**
 * Turns the indicator, pattern and trend reports into one categorical
 * decision via the reasoning service. Never rejects: every failure path
 * resolves to a HOLD record with HIGH risk.
 */
export class DecisionSynthesizer implements Analyzer<DecisionInputs, Promise<SynthesizedDecision>> {
  readonly name = "decision";
  private readonly llm: LlmConfig;
  private readonly service: ReasoningService;
  private readonly audit?: AuditSink;

  constructor(options: SynthesizerOptions) {
    this.llm = options.llm;
    this.service = options.service;
    this.audit = options.audit;
  }

  analyze(inputs: DecisionInputs): Promise<SynthesizedDecision> {
    return this.synthesize(inputs.indicator, inputs.visual, inputs.trend, inputs.symbol);
  }

  async synthesize(
    indicator: IndicatorReport,
    visual: VisualReport,
    trend: TrendReport,
    symbol: string,
  ): Promise<SynthesizedDecision> {
    const model = resolveModel(this.llm);
    const finish = async (record: DecisionRecord, fallback: FallbackReason | null) => {
      await this.record("decision", { symbol, model, fallback, record });
      return Object.freeze({
        record,
        symbol,
        model,
        fallback,
        inputs: Object.freeze({ indicator, visual, trend }),
      });
    };

    let raw: string;
    try {
      const prompt = buildDecisionPrompt({ indicator, visual, trend, symbol });
      await this.record("reasoning_request", { symbol, model, prompt });
      raw = await this.service.complete({
        model,
        system: SYSTEM_INSTRUCTION,
        prompt,
        maxTokens: this.llm.maxTokens,
        temperature: this.llm.temperature,
      });
    } catch (err) {
      const { record, reason } = serviceFailureRecord(err, this.llm);
      console.warn(`[decision] ${symbol}: reasoning service failed (${reason}): ${record.justification}`);
      return finish(record, reason);
    }

    await this.record("reasoning_response", { symbol, model, raw });

    const result = validateDecisionResponse(raw);
    if (!result.ok) {
      console.warn(`[decision] ${symbol}: unusable reasoning response: ${result.error}`);
      return finish(parsingFailureRecord(raw, result.error), "parse_error");
    }

    return finish(result.record, null);
  }

  private async record<E extends DecisionAuditEvent>(event: E, data: DecisionAuditEvents[E]): Promise<void> {
    if (!this.audit) return;
    try {
      await this.audit.log(event, data);
    } catch (err) {
      console.warn(`[audit] Failed to write ${event}: ${err instanceof Error ? err.message : err}`);
    }
  }
}

/** Record used when no reasoning service is configured at all */
export function notConfiguredDecision(
  inputs: DecisionInputs,
  justification = "Reasoning service not configured. Set ANTHROPIC_API_KEY (or OPENAI_API_KEY with QUANT_LLM_PROVIDER=openai).",
): SynthesizedDecision {
  return Object.freeze({
    record: holdRecord(justification, [FAILURE_TAGS.notConfigured]),
    symbol: inputs.symbol,
    model: null,
    fallback: "not_configured",
    inputs: Object.freeze({ indicator: inputs.indicator, visual: inputs.visual, trend: inputs.trend }),
  });
}
