// config.ts
// Reads the environment into a typed AppConfig. Nothing here is a singleton:
// server.ts loads it once and passes it down.
import { z } from "zod";
import { isValidTimeZone } from "./lib/zonedTime";
import { DEFAULT_TIMEZONE } from "./services/eventMapper";
import { DEFAULT_PLACEHOLDER_YEAR } from "./services/extractDate/dateCorrection";

const blankToUndefined = (v: unknown) => (typeof v === "string" && v.trim() === "" ? undefined : v);

const EnvSchema = z.object({
  PORT: z.preprocess(blankToUndefined, z.coerce.number().int().positive().default(4000)),
  EXTRACTOR_STRATEGY: z.preprocess(blankToUndefined, z.enum(["openai", "ollama"]).default("ollama")),
  DEFAULT_TIMEZONE: z.preprocess(
    blankToUndefined,
    z
      .string()
      .refine(isValidTimeZone, { message: "must be an IANA timezone name" })
      .default(DEFAULT_TIMEZONE)
  ),

  OPENAI_API_KEY: z.preprocess(blankToUndefined, z.string().optional()),
  OPENAI_PROJECT: z.preprocess(blankToUndefined, z.string().optional()),
  OPENAI_MODEL: z.preprocess(blankToUndefined, z.string().default("gpt-4o-mini")),

  OLLAMA_URL: z.preprocess(blankToUndefined, z.string().url().default("http://localhost:11434")),
  LLM_MODEL: z.preprocess(blankToUndefined, z.string().default("llama3.2")),
  LLM_TIMEOUT_MS: z.preprocess(blankToUndefined, z.coerce.number().int().positive().default(10_000)),
  PLACEHOLDER_YEAR: z.preprocess(
    blankToUndefined,
    z.coerce.number().int().default(DEFAULT_PLACEHOLDER_YEAR)
  ),

  GOOGLE_CALENDAR_ID: z.preprocess(blankToUndefined, z.string().default("primary")),
  GOOGLE_CREDENTIALS_PATH: z.preprocess(blankToUndefined, z.string().optional()),
});

export type AppConfig = {
  port: number;
  strategy: "openai" | "ollama";
  defaultTimezone: string;
  openai: { apiKey?: string; project?: string; model: string };
  ollama: { url: string; model: string; timeoutMs: number; placeholderYear: number };
  google: { calendarId: string; credentialsPath?: string };
};

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`));
  }
  const e = parsed.data;

  if (e.EXTRACTOR_STRATEGY === "openai" && !e.OPENAI_API_KEY) {
    throw new ConfigError(["OPENAI_API_KEY: required when EXTRACTOR_STRATEGY=openai"]);
  }

  return {
    port: e.PORT,
    strategy: e.EXTRACTOR_STRATEGY,
    defaultTimezone: e.DEFAULT_TIMEZONE,
    openai: { apiKey: e.OPENAI_API_KEY, project: e.OPENAI_PROJECT, model: e.OPENAI_MODEL },
    ollama: {
      url: e.OLLAMA_URL,
      model: e.LLM_MODEL,
      timeoutMs: e.LLM_TIMEOUT_MS,
      placeholderYear: e.PLACEHOLDER_YEAR,
    },
    google: { calendarId: e.GOOGLE_CALENDAR_ID, credentialsPath: e.GOOGLE_CREDENTIALS_PATH },
  };
}
