// quant-agent/src/decision/reasoning.ts
import { ChatAnthropic } from "@langchain/anthropic";
import { type BaseMessage, HumanMessage, type MessageContent, SystemMessage } from "@langchain/core/messages";
import { ChatOpenAI } from "@langchain/openai";
import type { LlmConfig } from "../config.ts";

export interface ReasoningRequest {
  model: string;
  system: string;
  prompt: string;
  maxTokens: number;
  temperature: number;
}

/**
 * Single request/response call to a text-generation service. Rejects on
 * transport or service failure; retries are the caller's business.
 */
export interface ReasoningService {
  complete(request: ReasoningRequest): Promise<string>;
}

export function contentToText(content: MessageContent): string {
  if (typeof content === "string") return content;
  return content
    .map((part) => ("text" in part && typeof part.text === "string" ? part.text : ""))
    .join("");
}

async function invokeChatModel(
  llm: LlmConfig,
  apiKey: string,
  request: ReasoningRequest,
  messages: BaseMessage[],
): Promise<MessageContent> {
  const signal = AbortSignal.timeout(llm.timeoutMs);

  if (llm.provider === "openai") {
    const model = new ChatOpenAI({
      model: request.model,
      apiKey,
      temperature: request.temperature,
      maxTokens: request.maxTokens,
      maxRetries: 0,
      configuration: llm.baseUrl ? { baseURL: llm.baseUrl } : undefined,
    });
    return (await model.invoke(messages, { signal })).content;
  }

  const model = new ChatAnthropic({
    model: request.model,
    anthropicApiKey: apiKey,
    temperature: request.temperature,
    maxTokens: request.maxTokens,
    maxRetries: 0,
    anthropicApiUrl: llm.baseUrl,
  });
  return (await model.invoke(messages, { signal })).content;
}

/**
 * ReasoningService backed by a LangChain chat model, one model instance
 * per request.
 */
export function createReasoningService(llm: LlmConfig, apiKey: string): ReasoningService {
  return {
    async complete(request: ReasoningRequest): Promise<string> {
      const content = await invokeChatModel(llm, apiKey, request, [
        new SystemMessage(request.system),
        new HumanMessage(request.prompt),
      ]);
      return contentToText(content);
    },
  };
}
