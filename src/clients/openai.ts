// clients/openai.ts
// Forced single function call against the OpenAI chat completions API.
import OpenAI from "openai";

export type ToolDefinition = {
  name: string;
  description: string;
  parameters: Record<string, unknown>;
};

export type ToolCallRequest = {
  system: string;
  user: string;
  tool: ToolDefinition;
};

export type ToolCallReply = {
  toolCalls: { name: string; arguments: string }[];
  /** Set when the model declined to answer */
  refusal: string | null;
};

/** The only thing the extractor needs from a model provider. Faked in tests. */
export type ToolCaller = (req: ToolCallRequest) => Promise<ToolCallReply>;

export type OpenAiToolCallerOptions = {
  apiKey: string;
  project?: string;
  model: string;
  timeoutMs?: number;
};

export function createOpenAiToolCaller(opts: OpenAiToolCallerOptions): ToolCaller {
  const client = new OpenAI({
    apiKey: opts.apiKey,
    project: opts.project,
    timeout: opts.timeoutMs ?? 30_000,
    maxRetries: 0,
  });

  return async (req) => {
    const completion = await client.chat.completions.create({
      model: opts.model,
      messages: [
        { role: "system", content: req.system },
        { role: "user", content: req.user },
      ],
      tools: [
        {
          type: "function",
          function: {
            name: req.tool.name,
            description: req.tool.description,
            parameters: req.tool.parameters,
            strict: true,
          },
        },
      ],
      tool_choice: { type: "function", function: { name: req.tool.name } },
      temperature: 0,
    });

    const message = completion.choices[0]?.message;
    const toolCalls = (message?.tool_calls ?? []).flatMap((toolCall) =>
      toolCall.type === "function"
        ? [{ name: toolCall.function.name, arguments: toolCall.function.arguments }]
        : []
    );
    return { toolCalls, refusal: message?.refusal ?? null };
  };
}
