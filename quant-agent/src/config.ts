// quant-agent/src/config.ts
import { readFile } from "node:fs/promises";
import { parse as parseYaml } from "yaml";
import { z } from "zod";

export const VERSION = "0.1.0";

export type LlmProvider = "anthropic" | "openai";

const DEFAULT_MODELS: Record<LlmProvider, string> = {
  anthropic: "claude-sonnet-4-20250514",
  openai: "gpt-4o-mini",
};

export const config = {
  anthropicApiKey: process.env.ANTHROPIC_API_KEY ?? "",
  openaiApiKey: process.env.OPENAI_API_KEY ?? "",
  provider: process.env.QUANT_LLM_PROVIDER,
  model: process.env.QUANT_MODEL,
  baseUrl: process.env.QUANT_LLM_BASE_URL,
  configPath: process.env.QUANT_CONFIG,
  logsPath: process.env.QUANT_LOGS_PATH,
};

export const LlmConfigSchema = z.object({
  provider: z.enum(["anthropic", "openai"]).default("anthropic"),
  /** Requested model id; the provider default when absent */
  model: z.string().min(1).optional(),
  /** OpenAI-compatible endpoint, e.g. a Groq or local proxy URL */
  baseUrl: z.string().url().optional(),
  temperature: z.number().min(0).max(2).default(0.1),
  maxTokens: z.number().int().positive().default(1000),
  timeoutMs: z.number().int().positive().default(30000),
  /** Decommissioned model id -> currently served replacement */
  retiredModels: z.record(z.string()).default({
    "claude-3-sonnet-20240229": DEFAULT_MODELS.anthropic,
    "claude-3-opus-20240229": DEFAULT_MODELS.anthropic,
    "claude-2.1": DEFAULT_MODELS.anthropic,
  }),
});

export const EngineConfigSchema = z.object({
  llm: LlmConfigSchema.default({}),

  data: z.object({
    cacheEnabled: z.boolean().default(true),
    cacheTtlSec: z.number().int().positive().default(300),
    intervalMinutes: z.number().int().positive().default(1440),
    minBars: z.number().int().min(1).default(10),
  }).default({}),

  audit: z.object({
    enabled: z.boolean().default(false),
    logsPath: z.string().default("./logs"),
  }).default({}),
});

export type LlmConfig = z.infer<typeof LlmConfigSchema>;
export type EngineConfig = z.infer<typeof EngineConfigSchema>;

export const DEFAULT_CONFIG: EngineConfig = EngineConfigSchema.parse({});

/**
 * Overlay provider/model/endpoint and log location from the environment.
 */
export function applyEnv(base: EngineConfig, env: typeof config = config): EngineConfig {
  const provider = env.provider === "anthropic" || env.provider === "openai"
    ? env.provider
    : base.llm.provider;

  return {
    ...base,
    llm: {
      ...base.llm,
      provider,
      model: env.model || base.llm.model,
      baseUrl: env.baseUrl || base.llm.baseUrl,
    },
    audit: {
      ...base.audit,
      logsPath: env.logsPath || base.audit.logsPath,
    },
  };
}

export async function loadEngineConfig(configPath?: string): Promise<EngineConfig> {
  if (configPath) {
    const content = await readFile(configPath, "utf-8");
    const raw: unknown = parseYaml(content) ?? {};
    return applyEnv(EngineConfigSchema.parse(raw));
  }
  return applyEnv(DEFAULT_CONFIG);
}

export function defaultModelFor(provider: LlmProvider): string {
  return DEFAULT_MODELS[provider];
}

/**
 * Model identity used for a synthesis call: the requested model (or the
 * provider default) remapped when it names a retired model.
 */
export function resolveModel(llm: LlmConfig): string {
  const requested = llm.model ?? defaultModelFor(llm.provider);
  return llm.retiredModels[requested] ?? requested;
}

export function apiKeyFor(provider: LlmProvider, env: typeof config = config): string {
  return provider === "anthropic" ? env.anthropicApiKey : env.openaiApiKey;
}

export function validateConfig(llm: LlmConfig, env: typeof config = config): void {
  if (!apiKeyFor(llm.provider, env)) {
    throw new Error(
      llm.provider === "anthropic" ? "ANTHROPIC_API_KEY required" : "OPENAI_API_KEY required",
    );
  }
}
