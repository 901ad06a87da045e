import Anthropic from "@anthropic-ai/sdk";
import type { TextBlock } from "@anthropic-ai/sdk/resources/messages";
import OpenAI from "openai";
import { CapabilityUnavailableError } from "./errors.js";
import type { LlmConfig, TextCompleter } from "./types.js";

/**
 * A text completer that can check, before any work starts, whether its backend is usable.
 * One provider is built per process and handed to every component that needs completions.
 */
export interface CompletionProvider extends TextCompleter {
  readonly description: string;
  verify(): Promise<void>;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Chat completions against any OpenAI-compatible endpoint. Local inference servers
 * (Ollama, llama.cpp server, LM Studio) expose this API, so the model stays on the machine.
 */
export class OpenAICompatibleCompleter implements CompletionProvider {
  readonly description: string;

  constructor(
    private readonly client: OpenAI,
    private readonly model: string,
  ) {
    this.description = `${model} @ ${client.baseURL}`;
  }

  async verify(): Promise<void> {
    try {
      await this.client.models.list();
    } catch (error) {
      throw new CapabilityUnavailableError(
        `No inference backend reachable at ${this.client.baseURL}: ${describeError(error)}. ` +
          "Start a local OpenAI-compatible server (for example `ollama serve`) or set LLM_BASE_URL.",
        { cause: error },
      );
    }
  }

  async complete(prompt: string, maxTokens: number, temperature = 0.3): Promise<string> {
    try {
      const response = await this.client.chat.completions.create({
        model: this.model,
        messages: [{ role: "user", content: prompt }],
        max_tokens: maxTokens,
        temperature,
      });
      return response.choices[0]?.message?.content ?? "";
    } catch (error) {
      if (
        error instanceof OpenAI.APIConnectionError ||
        error instanceof OpenAI.AuthenticationError ||
        error instanceof OpenAI.NotFoundError
      ) {
        throw new CapabilityUnavailableError(`Model ${this.description} unavailable: ${error.message}`, {
          cause: error,
        });
      }
      throw error;
    }
  }
}

export class AnthropicCompleter implements CompletionProvider {
  readonly description: string;

  constructor(
    private readonly client: Anthropic,
    private readonly model: string,
  ) {
    this.description = `${model} @ anthropic`;
  }

  async verify(): Promise<void> {
    if (!this.client.apiKey) {
      throw new CapabilityUnavailableError(
        "LLM_API_KEY (or ANTHROPIC_API_KEY) is required for the anthropic provider",
      );
    }
  }

  async complete(prompt: string, maxTokens: number, temperature = 0.3): Promise<string> {
    try {
      const response = await this.client.messages.create({
        model: this.model,
        max_tokens: maxTokens,
        temperature,
        messages: [{ role: "user", content: prompt }],
      });
      return response.content
        .filter((block): block is TextBlock => block.type === "text")
        .map((block) => block.text)
        .join("");
    } catch (error) {
      if (
        error instanceof Anthropic.APIConnectionError ||
        error instanceof Anthropic.AuthenticationError ||
        error instanceof Anthropic.NotFoundError
      ) {
        throw new CapabilityUnavailableError(`Model ${this.description} unavailable: ${error.message}`, {
          cause: error,
        });
      }
      throw error;
    }
  }
}

export function createCompleter(config: LlmConfig): CompletionProvider {
  if (config.provider === "anthropic") {
    const client = new Anthropic({
      apiKey: config.apiKey ?? null,
      ...(config.baseUrl ? { baseURL: config.baseUrl } : {}),
    });
    return new AnthropicCompleter(client, config.model);
  }

  const client = new OpenAI({
    // Local servers ignore the key, but the client refuses to start without one
    apiKey: config.apiKey || "not-needed",
    ...(config.baseUrl ? { baseURL: config.baseUrl } : {}),
  });
  return new OpenAICompatibleCompleter(client, config.model);
}
