import { describe, it, expect, beforeEach, afterEach } from "@jest/globals";
import { createOllamaClient } from "../src/dispatcher.js";
import type { BackendClient } from "../src/types.js";
import { closedPortUrl, startOllamaStub } from "./helpers/http.js";
import type { OllamaStub } from "./helpers/http.js";

describe("createOllamaClient", () => {
  let stub: OllamaStub;
  let client: BackendClient;

  beforeEach(async () => {
    stub = await startOllamaStub("I'm LocalAIHub, your local assistant.");
    client = createOllamaClient({ baseUrl: stub.url, timeoutMs: 1_000 });
  });

  afterEach(async () => {
    await stub.close();
  });

  describe("generate", () => {
    it("posts a non-streaming request and returns the text", async () => {
      const result = await client.generate("Hi, who are you?", "llama2");

      expect(result).toEqual({ ok: true, text: "I'm LocalAIHub, your local assistant.", model: "llama2" });
      expect(stub.received).toEqual([{ model: "llama2", prompt: "Hi, who are you?", stream: false }]);
    });

    it("falls back to the requested model when the body does not name one", async () => {
      stub.echoModel = false;
      const result = await client.generate("Hi", "mistral");
      expect(result).toEqual({ ok: true, text: "I'm LocalAIHub, your local assistant.", model: "mistral" });
    });

    it("maps a non-2xx status to bad_response", async () => {
      stub.mode = "http-error";
      const result = await client.generate("Hi", "ghost");

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.kind).toBe("bad_response");
      expect(result.error.message).toMatch(/^HTTP 500 from Ollama: /);
    });

    it("maps a body that is not JSON to bad_response", async () => {
      stub.mode = "not-json";
      const result = await client.generate("Hi", "llama2");
      expect(result).toEqual({
        ok: false,
        error: { kind: "bad_response", message: "Ollama returned a body that is not JSON" },
      });
    });

    it("maps an empty completion to bad_response", async () => {
      stub.mode = "empty";
      const result = await client.generate("Hi", "llama2");
      expect(result).toEqual({
        ok: false,
        error: { kind: "bad_response", message: "Ollama response has no generated text" },
      });
    });

    it("gives up after the timeout", async () => {
      stub.mode = "hang";
      const fast = createOllamaClient({ baseUrl: stub.url, timeoutMs: 100 });

      const started = Date.now();
      const result = await fast.generate("Hi", "llama2");

      expect(result).toEqual({
        ok: false,
        error: { kind: "timeout", message: "Ollama did not answer within 100ms" },
      });
      expect(Date.now() - started).toBeLessThan(2_000);
    });

    it("maps a refused connection to unreachable", async () => {
      const offline = createOllamaClient({ baseUrl: await closedPortUrl(), timeoutMs: 1_000 });
      const result = await offline.generate("Hi", "llama2");

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.kind).toBe("unreachable");
      expect(result.error.message).toMatch(/^Ollama isn't reachable: /);
    });
  });

  describe("isAvailable", () => {
    it("is true when the tags endpoint answers", async () => {
      await expect(client.isAvailable()).resolves.toBe(true);
    });

    it("is false on a non-2xx answer", async () => {
      stub.tagsStatus = 503;
      await expect(client.isAvailable()).resolves.toBe(false);
    });

    it("is false when nothing is listening", async () => {
      const offline = createOllamaClient({ baseUrl: await closedPortUrl(), timeoutMs: 1_000 });
      await expect(offline.isAvailable()).resolves.toBe(false);
    });
  });
});
