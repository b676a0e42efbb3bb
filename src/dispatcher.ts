/**
 * Makes the actual call to the local Ollama server.
 *
 * Contract:
 *   generate() never throws. Every failure comes back as a tagged
 *   { ok: false, error } value so the orchestrator can pattern-match on it
 *   and fall back without a try/catch around the call.
 *
 * Single attempt:
 *   No retry here or anywhere upstream. A failed call goes straight to the
 *   fallback responder. This is intentional.
 *
 * Error mapping:
 *   - fetch rejects with TimeoutError      → timeout
 *   - fetch rejects with anything else     → unreachable (ECONNREFUSED, DNS…)
 *   - non-2xx status                       → bad_response
 *   - body not JSON / no usable `response` → bad_response
 */

import type { BackendClient, BackendError, BackendResult } from "./types.js";

const PROBE_TIMEOUT_MS = 2_000;

export interface OllamaClientOptions {
  baseUrl: string;
  timeoutMs: number;
}

export function createOllamaClient(opts: OllamaClientOptions): BackendClient {
  const generateUrl = `${opts.baseUrl}/api/generate`;
  const tagsUrl = `${opts.baseUrl}/api/tags`;

  async function generate(prompt: string, model: string): Promise<BackendResult> {
    const signal = AbortSignal.timeout(opts.timeoutMs);

    let response: Response;
    try {
      response = await fetch(generateUrl, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ model, prompt, stream: false }),
        signal,
      });
    } catch (err: unknown) {
      return fail(fetchFailure(err, opts.timeoutMs));
    }

    if (!response.ok) {
      const errBody = await response.text().catch(() => "(unreadable)");
      return fail({
        kind: "bad_response",
        message: `HTTP ${response.status} from Ollama: ${errBody.slice(0, 200)}`,
      });
    }

    let data: unknown;
    try {
      data = await response.json();
    } catch (err: unknown) {
      if (isTimeout(err)) return fail(fetchFailure(err, opts.timeoutMs));
      return fail({ kind: "bad_response", message: "Ollama returned a body that is not JSON" });
    }

    const parsed = parseGenerateBody(data);
    if (!parsed) {
      return fail({ kind: "bad_response", message: "Ollama response has no generated text" });
    }

    return { ok: true, text: parsed.text, model: parsed.model ?? model };
  }

  async function isAvailable(): Promise<boolean> {
    try {
      const response = await fetch(tagsUrl, { signal: AbortSignal.timeout(PROBE_TIMEOUT_MS) });
      // drain so the socket can be reused
      await response.arrayBuffer().catch(() => undefined);
      return response.ok;
    } catch {
      return false;
    }
  }

  return { generate, isAvailable };
}

// ─── Response parsing ─────────────────────────────────────────────────────────
// Ollama (stream: false) answers { model, created_at, response, done, ... }

function parseGenerateBody(data: unknown): { text: string; model?: string } | null {
  const text = field(data, "response");
  const model = field(data, "model");
  if (typeof text !== "string" || text.trim() === "") return null;
  return {
    text,
    model: typeof model === "string" && model !== "" ? model : undefined,
  };
}

// ─── Error mapping ────────────────────────────────────────────────────────────

// fetch errors come from undici, which may live in another realm than our
// Error (test sandboxes), so check shape rather than instanceof.
function field(value: unknown, key: string): unknown {
  return typeof value === "object" && value !== null ? Reflect.get(value, key) : undefined;
}

function isTimeout(err: unknown): boolean {
  const name = field(err, "name");
  return name === "TimeoutError" || name === "AbortError";
}

function fetchFailure(err: unknown, timeoutMs: number): BackendError {
  if (isTimeout(err)) {
    return { kind: "timeout", message: `Ollama did not answer within ${timeoutMs}ms` };
  }
  return { kind: "unreachable", message: `Ollama isn't reachable: ${describeFailure(err)}` };
}

// undici wraps the socket error: TypeError("fetch failed", { cause: { code: "ECONNREFUSED" } })
function describeFailure(err: unknown): string {
  const message = field(err, "message");
  if (typeof message !== "string") return String(err);

  const cause = field(err, "cause");
  const code = field(cause, "code");
  if (typeof code === "string") return `${message} (${code})`;
  const causeMessage = field(cause, "message");
  return typeof causeMessage === "string" ? `${message} (${causeMessage})` : message;
}

function fail(error: BackendError): BackendResult {
  return { ok: false, error };
}
