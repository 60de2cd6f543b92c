// clients/ollama.ts
// Thin wrapper over the Ollama HTTP API (non-streaming generate + liveness).
import { z } from "zod";

export type OllamaConnection = {
  url: string;
  model: string;
  /** Swapped out in tests */
  fetchFn?: typeof fetch;
};

export type OllamaGenerateRequest = {
  prompt: string;
  system?: string;
  model?: string;
  signal?: AbortSignal;
  options?: { temperature?: number; num_ctx?: number };
};

export class OllamaHttpError extends Error {
  constructor(readonly status: number, body: string) {
    super(`Ollama HTTP ${status}: ${body.slice(0, 200)}`);
    this.name = "OllamaHttpError";
  }
}

// Ollama wraps the generated text as { response: string, done: boolean, ... }
const GenerateEnvelope = z.object({ response: z.string() });

function endpoint(conn: OllamaConnection, path: string) {
  return `${conn.url.replace(/\/+$/, "")}${path}`;
}

/**
 * Asks the model for JSON and returns the raw `response` text.
 * Throws on transport errors, non-2xx and a malformed envelope.
 */
export async function ollamaGenerateJSON(
  conn: OllamaConnection,
  req: OllamaGenerateRequest
): Promise<string> {
  const fetchFn = conn.fetchFn ?? fetch;
  const resp = await fetchFn(endpoint(conn, "/api/generate"), {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify({
      model: req.model ?? conn.model,
      prompt: req.prompt,
      ...(req.system ? { system: req.system } : {}),
      format: "json",
      stream: false,
      options: req.options ?? {},
    }),
    signal: req.signal,
  });

  if (!resp.ok) {
    const text = await resp.text().catch(() => "");
    throw new OllamaHttpError(resp.status, text);
  }

  const envelope = GenerateEnvelope.parse(await resp.json());
  return envelope.response;
}

/** True when the Ollama server answers `GET /api/tags` within `timeoutMs`. */
export async function ollamaPing(conn: OllamaConnection, timeoutMs = 2000): Promise<boolean> {
  const fetchFn = conn.fetchFn ?? fetch;
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);
  try {
    const resp = await fetchFn(endpoint(conn, "/api/tags"), { signal: controller.signal });
    return resp.ok;
  } catch (e) {
    console.warn(`Ollama unreachable at ${conn.url}:`, e instanceof Error ? e.message : e);
    return false;
  } finally {
    clearTimeout(timeout);
  }
}
