// Backend outcome
// unreachable - connection refused, DNS failure, socket reset
// timeout - no answer inside the configured window
// bad_response - non-2xx status or a body we can't use

export type BackendErrorKind = "unreachable" | "timeout" | "bad_response"

export interface BackendError {
    kind: BackendErrorKind;
    message: string;
}

export type BackendResult =
    | { ok: true; text: string; model: string }
    | { ok: false; error: BackendError }

export interface BackendClient {
    generate(prompt: string, model: string): Promise<BackendResult>;
    isAvailable(): Promise<boolean>;
}

export interface GenerationRequest {
    prompt: string;
    model?: string;
}

export interface GenerationResult {
    response: string;
    model: string;
    time_taken_seconds: number;
    offline: boolean;
    request_id: number;
}

// One line of the interaction log. request_id is null only for rejected input.
export interface InteractionRecord {
    timestamp: string;
    user_input: string;
    ai_response: string;
    model: string;
    time_taken_seconds: number;
    error: string | null;
    request_id: number | null;
}

export type GenerateOutcome =
    | { ok: true; result: GenerationResult }
    | { ok: false; status: 400; error: string }

export interface ServerStats {
    startTime: number;
    requestsHandled: number;
    uptimeSeconds: number;
    memoryUsagePercent: number;
    memoryAvailableGb: number;
}

export interface StatusReport {
    status: "running";
    uptime_seconds: number;
    requests_handled: number;
    memory_usage_percent: number;
    memory_available_gb: number;
    ollama_running: boolean;
    log_file: string;
    timestamp: string;
}
