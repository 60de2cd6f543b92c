// services/extractDate/smartEventExtractorSelector.ts
import type { AppConfig } from "../../config";
import type { SlotExtractor } from "../../types/slots";
import { createOpenAiToolCaller, type ToolCaller } from "../../clients/openai";
import { createToolCallExtractor } from "./toolCallExtractor";
import { createLocalLlmExtractor } from "./llmEventExtractor";

export type ExtractorDeps = {
  /** Replaces the OpenAI client (tests) */
  callTool?: ToolCaller;
  /** Replaces global fetch for the Ollama client (tests) */
  fetchFn?: typeof fetch;
};

export function createSlotExtractor(config: AppConfig, deps: ExtractorDeps = {}): SlotExtractor {
  if (config.strategy === "openai") {
    const callTool = deps.callTool ?? openAiCallerFrom(config);
    return createToolCallExtractor(callTool);
  }

  return createLocalLlmExtractor({
    connection: { url: config.ollama.url, model: config.ollama.model, fetchFn: deps.fetchFn },
    timeoutMs: config.ollama.timeoutMs,
    placeholderYear: config.ollama.placeholderYear,
  });
}

function openAiCallerFrom(config: AppConfig): ToolCaller {
  const { apiKey, project, model } = config.openai;
  if (!apiKey) throw new Error("OPENAI_API_KEY is required for the openai strategy");
  return createOpenAiToolCaller({ apiKey, project, model });
}
