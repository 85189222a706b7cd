import type { ProviderName } from "@docsum/shared";

export interface LLMProvider {
  readonly name: ProviderName;
  summarize(prompt: string, temperature?: number, maxTokens?: number): Promise<string>;
}
