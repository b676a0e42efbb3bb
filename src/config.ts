/**
 * config.ts
 * ─────────
 * Reads the environment once at startup. The returned object is frozen and
 * handed to every component; nothing re-reads process.env after boot.
 *
 *   PORT                 → HTTP port (5000)
 *   HOST                 → bind address (0.0.0.0)
 *   OLLAMA_BASE_URL      → backend root (http://localhost:11434)
 *   DEFAULT_MODEL        → model used when a request names none (llama2)
 *   BACKEND_TIMEOUT_MS   → hard timeout for one generation call (10000)
 *   LOG_FILE             → JSONL interaction log (logs/ai_hub_log.jsonl)
 *   BODY_LIMIT           → largest JSON body accepted (10mb)
 */

export interface Config {
  readonly port: number;
  readonly host: string;
  readonly ollamaBaseUrl: string;
  readonly defaultModel: string;
  readonly backendTimeoutMs: number;
  readonly logFile: string;
  readonly bodyLimit: string;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

const DEFAULTS: Config = {
  port: 5000,
  host: "0.0.0.0",
  ollamaBaseUrl: "http://localhost:11434",
  defaultModel: "llama2",
  backendTimeoutMs: 10_000,
  logFile: "logs/ai_hub_log.jsonl",
  bodyLimit: "10mb",
};

type Env = Record<string, string | undefined>;

function readString(env: Env, name: string, fallback: string): string {
  const raw = env[name]?.trim();
  return raw ? raw : fallback;
}

function readPositiveInt(env: Env, name: string, fallback: number): number {
  const raw = env[name]?.trim();
  if (!raw) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigError(`${name} must be a positive integer, got "${raw}"`);
  }
  return value;
}

export function loadConfig(env: Env = process.env): Config {
  return Object.freeze({
    port: readPositiveInt(env, "PORT", DEFAULTS.port),
    host: readString(env, "HOST", DEFAULTS.host),
    // trailing slash would double up when we append /api/...
    ollamaBaseUrl: readString(env, "OLLAMA_BASE_URL", DEFAULTS.ollamaBaseUrl).replace(/\/+$/, ""),
    defaultModel: readString(env, "DEFAULT_MODEL", DEFAULTS.defaultModel),
    backendTimeoutMs: readPositiveInt(env, "BACKEND_TIMEOUT_MS", DEFAULTS.backendTimeoutMs),
    logFile: readString(env, "LOG_FILE", DEFAULTS.logFile),
    bodyLimit: readString(env, "BODY_LIMIT", DEFAULTS.bodyLimit),
  });
}
