import { describe, it, expect, beforeEach, afterEach } from "vitest";
import http from "http";
import Anthropic from "@anthropic-ai/sdk";
import OpenAI from "openai";
import { CapabilityUnavailableError } from "../../src/errors.js";
import { AnthropicCompleter, OpenAICompatibleCompleter, createCompleter } from "../../src/llm.js";

interface RecordedRequest {
  method: string;
  url: string;
  body: unknown;
}

type Route = (req: RecordedRequest) => { status: number; body: unknown };

/** In-process HTTP stand-in for an inference server. */
async function startFakeServer(route: Route) {
  const requests: RecordedRequest[] = [];
  const server = http.createServer((req, res) => {
    let raw = "";
    req.on("data", (chunk: Buffer) => {
      raw += chunk.toString("utf-8");
    });
    req.on("end", () => {
      const recorded: RecordedRequest = {
        method: req.method ?? "GET",
        url: req.url ?? "/",
        body: raw ? JSON.parse(raw) : null,
      };
      requests.push(recorded);
      const { status, body } = route(recorded);
      res.writeHead(status, { "content-type": "application/json" });
      res.end(JSON.stringify(body));
    });
  });
  await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
  const address = server.address();
  if (address === null || typeof address === "string") throw new Error("fake server has no TCP address");
  const { port } = address;
  return {
    requests,
    url: `http://127.0.0.1:${port}`,
    close: () => new Promise<void>((resolve) => server.close(() => resolve())),
  };
}

/** A port nothing listens on. */
async function closedPortUrl(): Promise<string> {
  const fake = await startFakeServer(() => ({ status: 200, body: {} }));
  await fake.close();
  return fake.url;
}

function chatCompletion(content: string) {
  return {
    id: "chatcmpl-test",
    object: "chat.completion",
    created: 0,
    model: "test-model",
    choices: [{ index: 0, message: { role: "assistant", content }, finish_reason: "stop", logprobs: null }],
  };
}

describe("OpenAICompatibleCompleter", () => {
  let fake: Awaited<ReturnType<typeof startFakeServer>>;

  beforeEach(async () => {
    fake = await startFakeServer((req) => {
      if (req.url === "/v1/models") return { status: 200, body: { object: "list", data: [] } };
      if (req.url === "/v1/chat/completions") return { status: 200, body: chatCompletion("hello there") };
      return { status: 404, body: { error: { message: "no route" } } };
    });
  });

  afterEach(async () => {
    await fake.close();
  });

  function completerFor(baseURL: string, model = "test-model") {
    return new OpenAICompatibleCompleter(new OpenAI({ apiKey: "test-secret", baseURL, maxRetries: 0 }), model);
  }

  it("returns the first choice and forwards the sampling settings", async () => {
    const completer = completerFor(`${fake.url}/v1`);
    expect(await completer.complete("Say hi", 64, 0.1)).toBe("hello there");

    const request = fake.requests.find((r) => r.url === "/v1/chat/completions");
    expect(request?.body).toEqual({
      model: "test-model",
      messages: [{ role: "user", content: "Say hi" }],
      max_tokens: 64,
      temperature: 0.1,
    });
  });

  it("defaults the temperature to 0.3", async () => {
    const completer = completerFor(`${fake.url}/v1`);
    await completer.complete("Say hi", 16);
    expect(fake.requests[0].body).toMatchObject({ temperature: 0.3 });
  });

  it("verifies by listing models", async () => {
    await expect(completerFor(`${fake.url}/v1`).verify()).resolves.toBeUndefined();
    expect(fake.requests[0]).toMatchObject({ method: "GET", url: "/v1/models" });
  });

  it("reports an unreachable server as CapabilityUnavailableError", async () => {
    const completer = completerFor(`${await closedPortUrl()}/v1`);
    await expect(completer.verify()).rejects.toBeInstanceOf(CapabilityUnavailableError);
    await expect(completer.complete("hi", 8)).rejects.toBeInstanceOf(CapabilityUnavailableError);
  });

  it("reports a missing model as CapabilityUnavailableError", async () => {
    const completer = completerFor(`${fake.url}/wrong`);
    await expect(completer.complete("hi", 8)).rejects.toBeInstanceOf(CapabilityUnavailableError);
  });

  it("passes other API errors through", async () => {
    const broken = await startFakeServer(() => ({ status: 500, body: { error: { message: "boom" } } }));
    try {
      await expect(completerFor(`${broken.url}/v1`).complete("hi", 8)).rejects.toBeInstanceOf(
        OpenAI.InternalServerError,
      );
    } finally {
      await broken.close();
    }
  });
});

describe("AnthropicCompleter", () => {
  let fake: Awaited<ReturnType<typeof startFakeServer>>;

  beforeEach(async () => {
    fake = await startFakeServer((req) => {
      if (req.url === "/v1/messages") {
        return {
          status: 200,
          body: {
            id: "msg_test",
            type: "message",
            role: "assistant",
            model: "test-model",
            content: [
              { type: "text", text: "hello " },
              { type: "text", text: "there" },
            ],
            stop_reason: "end_turn",
            stop_sequence: null,
            usage: { input_tokens: 1, output_tokens: 2 },
          },
        };
      }
      return { status: 404, body: { type: "error", error: { type: "not_found_error", message: "no route" } } };
    });
  });

  afterEach(async () => {
    await fake.close();
  });

  it("joins the text blocks of the reply", async () => {
    const client = new Anthropic({ apiKey: "test-secret", baseURL: fake.url, maxRetries: 0 });
    const completer = new AnthropicCompleter(client, "test-model");
    expect(await completer.complete("Say hi", 32, 0.2)).toBe("hello there");
    expect(fake.requests[0].body).toEqual({
      model: "test-model",
      max_tokens: 32,
      temperature: 0.2,
      messages: [{ role: "user", content: "Say hi" }],
    });
  });

  it("fails verification without an API key", async () => {
    const completer = new AnthropicCompleter(new Anthropic({ apiKey: null, baseURL: fake.url }), "test-model");
    await expect(completer.verify()).rejects.toBeInstanceOf(CapabilityUnavailableError);
  });

  it("reports an unreachable API as CapabilityUnavailableError", async () => {
    const client = new Anthropic({ apiKey: "test-secret", baseURL: await closedPortUrl(), maxRetries: 0 });
    const completer = new AnthropicCompleter(client, "test-model");
    await expect(completer.complete("hi", 8)).rejects.toBeInstanceOf(CapabilityUnavailableError);
  });
});

describe("createCompleter()", () => {
  it("builds an OpenAI-compatible completer by default", () => {
    const completer = createCompleter({ provider: "openai", model: "llama3.1:8b", baseUrl: "http://127.0.0.1:9/v1" });
    expect(completer).toBeInstanceOf(OpenAICompatibleCompleter);
    expect(completer.description).toBe("llama3.1:8b @ http://127.0.0.1:9/v1");
  });

  it("builds an Anthropic completer when asked", () => {
    const completer = createCompleter({ provider: "anthropic", model: "claude-test", apiKey: "test-secret" });
    expect(completer).toBeInstanceOf(AnthropicCompleter);
    expect(completer.description).toBe("claude-test @ anthropic");
  });
});
