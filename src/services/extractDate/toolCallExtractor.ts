// =============================
// services/extractDate/toolCallExtractor.ts
// -----------------------------
// Schema-constrained extractor: the hosted model must answer with exactly
// one `extract_event` call whose arguments follow SLOT_SET_JSON_SCHEMA.
// Anything else (no call, bad JSON, schema mismatch, transport error)
// resolves to the inert QueryFreeTime slot set.
// =============================
import type { ExtractInput, SlotExtractor, SlotSet } from "../../types/slots";
import { queryFreeTime } from "../../types/slots";
import type { ToolCallReply, ToolCaller, ToolDefinition } from "../../clients/openai";
import { SLOT_SET_JSON_SCHEMA, parseSlotSet } from "../../schemas/slots.schema";
import { zonedIso } from "../../lib/zonedTime";

export const EXTRACT_EVENT_TOOL: ToolDefinition = {
  name: "extract_event",
  description: "Return calendar intent and slots as structured JSON.",
  parameters: SLOT_SET_JSON_SCHEMA,
};

export const TOOL_CALL_SYSTEM_PROMPT =
  "You extract calendar intents and slots from natural language. " +
  "Resolve relative dates/times to absolute RFC3339 WITH timezone offset " +
  "using the provided reference_time and timezone. " +
  "If only a duration is given (e.g., 'for 45 minutes'), return duration_minutes. " +
  "If info is missing, return what you're confident about and null for the rest. " +
  "Do not invent emails.";

export function buildToolCallUserMessage(input: ExtractInput): string {
  return [
    `reference_time=${zonedIso(input.referenceTime, input.timezone)}`,
    `timezone=${input.timezone}`,
    `utterance=${input.utterance}`,
  ].join("\n");
}

export function createToolCallExtractor(callTool: ToolCaller): SlotExtractor {
  return {
    strategy: "openai",
    async extract(input: ExtractInput): Promise<SlotSet> {
      let reply: ToolCallReply;
      try {
        reply = await callTool({
          system: TOOL_CALL_SYSTEM_PROMPT,
          user: buildToolCallUserMessage(input),
          tool: EXTRACT_EVENT_TOOL,
        });
      } catch (e: unknown) {
        console.error("Tool-call extraction failed:", e instanceof Error ? e.message : e);
        return queryFreeTime();
      }

      const call = reply.toolCalls.find((c) => c.name === EXTRACT_EVENT_TOOL.name);
      if (!call) {
        console.warn(`Model returned no ${EXTRACT_EVENT_TOOL.name} call`, reply.refusal ?? "");
        return queryFreeTime();
      }

      let args: unknown;
      try {
        args = JSON.parse(call.arguments);
      } catch {
        console.warn("Tool-call arguments are not JSON:", call.arguments.slice(0, 200));
        return queryFreeTime();
      }

      const validated = parseSlotSet(args);
      if (!validated.success) {
        console.warn("Tool-call arguments failed slot validation:", validated.error.flatten());
        return queryFreeTime();
      }
      return validated.data;
    },
  };
}
