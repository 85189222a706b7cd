import type { Logger } from "../logger.js";
import type { LLMProvider } from "../providers/LLMProvider.js";
import {
  ConfigurationError,
  HttpError,
  NetworkError,
  ParseError,
  UnexpectedResponseShapeError
} from "./errors.js";
import { extractCompletionText } from "./responsePaths.js";
import type { CompletionRequest, Credentials } from "./types.js";

type FetchImpl = typeof globalThis.fetch;

export const SYSTEM_INSTRUCTION = "You are a world-class summarization assistant.";
export const DEFAULT_TEMPERATURE = 0.2;
export const DEFAULT_MAX_TOKENS = 512;

export interface LLMClientOptions {
  fetchImpl?: FetchImpl;
  logger?: Logger;
}

function validateCredentials(credentials: Credentials): Credentials {
  const apiKey = credentials.apiKey.trim();
  const apiBase = credentials.apiBase.trim();
  const model = credentials.model.trim();

  if (!apiKey) {
    throw new ConfigurationError("NVIDIA_API_KEY is missing. Provide it via request, secrets file or environment.");
  }
  if (!/^https?:\/\//i.test(apiBase)) {
    throw new ConfigurationError("NVIDIA_API_BASE looks invalid. Expected a URL (e.g., https://.../v1).");
  }
  if (!model) {
    throw new ConfigurationError("NVIDIA_MODEL is missing. Provide the name of a deployed model.");
  }
  if (!Number.isFinite(credentials.timeoutMs) || credentials.timeoutMs <= 0) {
    throw new ConfigurationError(`Request timeout must be a positive number of milliseconds, got ${credentials.timeoutMs}.`);
  }

  return Object.freeze({
    apiKey,
    apiBase: apiBase.replace(/\/+$/, ""),
    model,
    timeoutMs: credentials.timeoutMs
  });
}

export class LLMClient implements LLMProvider {
  readonly name = "nvidia" as const;

  private readonly credentials: Credentials;

  private readonly fetchImpl: FetchImpl;

  private readonly logger?: Logger;

  constructor(credentials: Credentials, options: LLMClientOptions = {}) {
    this.credentials = validateCredentials(credentials);
    this.fetchImpl = options.fetchImpl ?? ((input, init) => globalThis.fetch(input, init));
    this.logger = options.logger?.child({ component: "llm-client", model: this.credentials.model });
  }

  get model(): string {
    return this.credentials.model;
  }

  get chatCompletionsUrl(): string {
    return `${this.credentials.apiBase}/chat/completions`;
  }

  buildRequest(prompt: string, temperature: number, maxTokens: number): CompletionRequest {
    return {
      model: this.credentials.model,
      messages: [
        { role: "system", content: SYSTEM_INSTRUCTION },
        { role: "user", content: prompt }
      ],
      temperature,
      max_tokens: maxTokens,
      stream: false
    };
  }

  async summarize(prompt: string, temperature = DEFAULT_TEMPERATURE, maxTokens = DEFAULT_MAX_TOKENS): Promise<string> {
    const url = this.chatCompletionsUrl;
    const startedAt = Date.now();
    this.logger?.debug({ url, temperature, maxTokens, promptChars: prompt.length }, "Sending chat completion request");

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method: "POST",
        headers: {
          Authorization: `Bearer ${this.credentials.apiKey}`,
          "Content-Type": "application/json"
        },
        body: JSON.stringify(this.buildRequest(prompt, temperature, maxTokens)),
        signal: AbortSignal.timeout(this.credentials.timeoutMs)
      });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.logger?.warn({ url, reason }, "Chat completion request failed before a response");
      throw new NetworkError(`Network error talking to LLM endpoint: ${reason}`, error);
    }

    let raw: string;
    try {
      raw = await response.text();
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new NetworkError(`Network error reading LLM response: ${reason}`, error);
    }

    if (!response.ok) {
      const body = parseJsonOrText(raw);
      this.logger?.warn({ status: response.status, durationMs: Date.now() - startedAt }, "LLM endpoint returned an error status");
      throw new HttpError(response.status, body);
    }

    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ParseError(`Could not parse JSON from LLM endpoint: ${reason}`, error);
    }

    const content = extractCompletionText(data);
    if (!content) {
      throw new UnexpectedResponseShapeError(data);
    }

    this.logger?.debug({ durationMs: Date.now() - startedAt, summaryChars: content.length }, "Chat completion succeeded");
    return content;
  }
}

function parseJsonOrText(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return raw;
  }
}
