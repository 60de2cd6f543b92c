// =============================
// services/extractDate/llmEventExtractor.ts
// -----------------------------
// Free-text extractor backed by a local Ollama model.
// - Asks for JSON only, today's date spelled out in both prompts
// - Decodes the Ollama envelope, then the slot JSON inside it (Zod)
// - Repairs placeholder-year dates
// - Timeout via AbortController
// - Any failure falls back to the keyword rules
// =============================

import type { ExtractInput, SlotExtractor, SlotSet } from "../../types/slots";
import { INTENTS } from "../../types/slots";
import { ollamaGenerateJSON, type OllamaConnection } from "../../clients/ollama";
import { parseSlotSet } from "../../schemas/slots.schema";
import { wallClockIn, zonedIso } from "../../lib/zonedTime";
import { correctPlaceholderDates } from "./dateCorrection";
import { extractRules } from "./ruleEventExtractor";

export const LLM_TIMEOUT_CEILING_MS = 30_000;

export type LocalLlmOptions = {
  connection: OllamaConnection;
  /** Per-request budget; clamped to [250, 30000] */
  timeoutMs?: number;
  placeholderYear?: number;
};

// -------- Public API --------
export function createLocalLlmExtractor(opts: LocalLlmOptions): SlotExtractor {
  const timeoutMs = clampPositive(opts.timeoutMs ?? 10_000, 250, LLM_TIMEOUT_CEILING_MS);

  return {
    strategy: "ollama",
    async extract(input: ExtractInput): Promise<SlotSet> {
      const controller = new AbortController();
      const timeout = setTimeout(() => controller.abort(), timeoutMs);

      try {
        const respText = await ollamaGenerateJSON(opts.connection, {
          system: buildSystemPrompt(input),
          prompt: buildUserPrompt(input),
          signal: controller.signal,
          options: { temperature: 0.1 },
        });

        const jsonStr = extractJsonBlock(respText);
        const validated = parseSlotSet(JSON.parse(jsonStr));
        if (!validated.success) {
          const fields = validated.error.issues.map((i) => i.path.join(".") || i.message);
          throw new Error(`slot schema mismatch: ${fields.join(", ")}`);
        }

        return correctPlaceholderDates(validated.data, {
          now: input.referenceTime,
          timezone: input.timezone,
          placeholderYear: opts.placeholderYear,
        });
      } catch (e: unknown) {
        const reason =
          e instanceof Error && e.name === "AbortError"
            ? `llm timeout after ${timeoutMs}ms`
            : e instanceof Error
              ? e.message
              : "llm error";
        console.warn(`Local LLM extraction degraded, using keyword rules (${reason})`);
        return extractRules(input);
      } finally {
        clearTimeout(timeout);
      }
    },
  };
}

// -------- Helpers --------

function todayIn(input: ExtractInput) {
  const { year, month, day } = wallClockIn(input.referenceTime, input.timezone);
  return `${year}-${String(month).padStart(2, "0")}-${String(day).padStart(2, "0")}`;
}

function buildSystemPrompt(input: ExtractInput) {
  return `
You turn a scheduling request into calendar slots. Today is ${todayIn(input)} (${input.timezone}).
Output ONLY a JSON object, no prose, no code fences, with these keys:
{"intent":"${INTENTS.join("|")}","title":"string?","start":"ISO?","end":"ISO?","duration_minutes":45,"timezone":"IANA?","location":"string?","attendees":["string"]?,"recurrence":"RRULE?","reminders":[{"method":"popup|email","minutes":10}]?}

Rules:
- "start" and "end" must be ISO 8601 WITH a UTC offset, e.g. ${zonedIso(input.referenceTime, input.timezone)}.
- Resolve "tomorrow", "next Wednesday", ... against today's date.
- If only a duration is given, set duration_minutes and omit "end".
- duration_minutes and reminder minutes are bare JSON numbers.
- Copy attendees exactly as written. Never invent emails.
- Omit anything you are not sure about.
`.trim();
}

function buildUserPrompt(input: ExtractInput) {
  return `
Today's date: ${todayIn(input)}
Reference time: ${zonedIso(input.referenceTime, input.timezone)}
Timezone: ${input.timezone}

REQUEST:
${input.utterance}
`.trim();
}

function clampPositive(n: number, min: number, max: number) {
  return Math.max(min, Math.min(n, max));
}

/** Extract a JSON object from a response that might include prose or code fences. */
export function extractJsonBlock(s: string): string {
  // Fast path: already pure JSON
  const trimmed = s.trim();
  if (trimmed.startsWith("{") && trimmed.endsWith("}")) return trimmed;

  // Remove code fences if present
  const fenceMatch = trimmed.match(/```(?:json)?\s*([\s\S]*?)\s*```/i);
  if (fenceMatch) return fenceMatch[1].trim();

  // Last resort: try to slice the first {...} block
  const first = trimmed.indexOf("{");
  const last = trimmed.lastIndexOf("}");
  if (first >= 0 && last > first) return trimmed.slice(first, last + 1).trim();

  // Give up
  return trimmed;
}
