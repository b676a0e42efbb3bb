/**
 * orchestrator.ts
 * ───────────────
 * Ties all the pieces together for a single /generate request.
 *
 * Flow:
 *   1. Validate   – prompt must be a non-blank string, model a string if given
 *   2. Dispatch   – take the next request id, call the backend once
 *   3. Resolve    – model output, or the canned fallback on any BackendError
 *   4. Account    – bump requests_handled, measure dispatch+resolve time
 *   5. Persist    – one InteractionRecord to the JSONL log
 *   6. Respond
 *
 * Every branch ends in a response. A backend failure is never surfaced to
 * the caller: it becomes offline: true with a fallback answer. Only a
 * rejected prompt comes back as an error (400).
 *
 * Rejected prompts are still written to the log, with `error` set and
 * request_id null. They don't consume an id and don't count as handled.
 */

import { fallbackResponse, FALLBACK_MODEL } from "./fallback.js";
import type { InteractionLogger } from "./interactionLog.js";
import type { StatsTracker } from "./metrics.js";
import type {
  BackendClient,
  GenerateOutcome,
  GenerationRequest,
  GenerationResult,
} from "./types.js";

export interface OrchestratorDeps {
  backend: BackendClient;
  stats: StatsTracker;
  interactionLog: InteractionLogger;
  defaultModel: string;
}

export interface Orchestrator {
  generate(body: unknown): Promise<GenerateOutcome>;
}

type Validation =
  | { ok: true; request: Required<GenerationRequest> }
  | { ok: false; error: string; prompt: string; model: string };

export function createOrchestrator(deps: OrchestratorDeps): Orchestrator {
  function validate(body: unknown): Validation {
    const isObject = typeof body === "object" && body !== null;
    const prompt: unknown = isObject && "prompt" in body ? body.prompt : undefined;
    const model: unknown = isObject && "model" in body ? body.model : undefined;

    // empty string means "not supplied"
    const resolvedModel = typeof model === "string" && model.trim() !== "" ? model.trim() : deps.defaultModel;

    if (prompt === undefined || prompt === null) {
      return { ok: false, error: "Please include a 'prompt' in your request", prompt: "", model: resolvedModel };
    }
    if (typeof prompt !== "string") {
      return { ok: false, error: "'prompt' must be a string", prompt: "", model: resolvedModel };
    }
    if (model !== undefined && model !== null && typeof model !== "string") {
      return { ok: false, error: "'model' must be a string", prompt, model: deps.defaultModel };
    }
    if (prompt.trim() === "") {
      return { ok: false, error: "Prompt cannot be empty", prompt, model: resolvedModel };
    }
    return { ok: true, request: { prompt, model: resolvedModel } };
  }

  async function generate(body: unknown): Promise<GenerateOutcome> {
    const checked = validate(body);

    if (!checked.ok) {
      await deps.interactionLog.append({
        timestamp: new Date().toISOString(),
        user_input: checked.prompt,
        ai_response: "",
        model: checked.model,
        time_taken_seconds: 0,
        error: checked.error,
        request_id: null,
      });
      return { ok: false, status: 400, error: checked.error };
    }

    const { prompt, model } = checked.request;
    const requestId = deps.stats.nextRequestId();
    const start = performance.now();

    const outcome = await deps.backend.generate(prompt, model);

    let response: string;
    let modelUsed: string;
    let offline: boolean;

    if (outcome.ok) {
      response = outcome.text;
      modelUsed = outcome.model;
      offline = false;
    } else {
      console.warn(
        `[Orchestrator] Request ${requestId} falling back (${outcome.error.kind}): ${outcome.error.message}`,
      );
      response = fallbackResponse(prompt);
      modelUsed = FALLBACK_MODEL;
      offline = true;
    }

    const elapsed = Math.max(0, (performance.now() - start) / 1000);
    const timeTaken = Math.round(elapsed * 1000) / 1000;
    deps.stats.recordRequest();

    await deps.interactionLog.append({
      timestamp: new Date().toISOString(),
      user_input: prompt,
      ai_response: response,
      model: modelUsed,
      time_taken_seconds: timeTaken,
      error: null,
      request_id: requestId,
    });

    const result: GenerationResult = {
      response,
      model: modelUsed,
      time_taken_seconds: timeTaken,
      offline,
      request_id: requestId,
    };
    return { ok: true, result };
  }

  return { generate };
}
