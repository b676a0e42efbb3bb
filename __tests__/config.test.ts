import { describe, it, expect } from "@jest/globals";
import { ConfigError, loadConfig } from "../src/config.js";

describe("loadConfig", () => {
  it("falls back to defaults for an empty environment", () => {
    expect(loadConfig({})).toEqual({
      port: 5000,
      host: "0.0.0.0",
      ollamaBaseUrl: "http://localhost:11434",
      defaultModel: "llama2",
      backendTimeoutMs: 10_000,
      logFile: "logs/ai_hub_log.jsonl",
      bodyLimit: "10mb",
    });
  });

  it("reads every setting from the environment", () => {
    const config = loadConfig({
      PORT: "8080",
      HOST: "127.0.0.1",
      OLLAMA_BASE_URL: "http://gpu-box:11434",
      DEFAULT_MODEL: "mistral",
      BACKEND_TIMEOUT_MS: "2500",
      LOG_FILE: "/tmp/hub/log.jsonl",
      BODY_LIMIT: "512kb",
    });

    expect(config.port).toBe(8080);
    expect(config.host).toBe("127.0.0.1");
    expect(config.ollamaBaseUrl).toBe("http://gpu-box:11434");
    expect(config.defaultModel).toBe("mistral");
    expect(config.backendTimeoutMs).toBe(2500);
    expect(config.logFile).toBe("/tmp/hub/log.jsonl");
    expect(config.bodyLimit).toBe("512kb");
  });

  it("strips trailing slashes from the backend URL", () => {
    expect(loadConfig({ OLLAMA_BASE_URL: "http://localhost:11434//" }).ollamaBaseUrl).toBe(
      "http://localhost:11434",
    );
  });

  it("treats blank values as unset", () => {
    const config = loadConfig({ DEFAULT_MODEL: "   ", PORT: "" });
    expect(config.defaultModel).toBe("llama2");
    expect(config.port).toBe(5000);
  });

  it("rejects a non-numeric port", () => {
    expect(() => loadConfig({ PORT: "abc" })).toThrow(ConfigError);
    expect(() => loadConfig({ PORT: "abc" })).toThrow('PORT must be a positive integer, got "abc"');
  });

  it("rejects a zero or fractional timeout", () => {
    expect(() => loadConfig({ BACKEND_TIMEOUT_MS: "0" })).toThrow(ConfigError);
    expect(() => loadConfig({ BACKEND_TIMEOUT_MS: "1.5" })).toThrow(ConfigError);
  });

  it("returns a frozen object", () => {
    expect(Object.isFrozen(loadConfig({}))).toBe(true);
  });
});
