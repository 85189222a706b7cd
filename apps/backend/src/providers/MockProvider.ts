import type { LLMProvider } from "./LLMProvider.js";
import { BULLET_INSTRUCTION } from "../prompts/promptBuilder.js";

const DOCUMENT_HEADING = "**Document**:\n";

function trimWords(value: string, maxWords: number): string {
  const words = value.trim().split(/\s+/).filter(Boolean);
  return words.slice(0, maxWords).join(" ");
}

function documentSection(prompt: string): string {
  const index = prompt.indexOf(DOCUMENT_HEADING);
  return index === -1 ? prompt : prompt.slice(index + DOCUMENT_HEADING.length);
}

/** Offline stand-in that echoes the start of the document. */
export class MockProvider implements LLMProvider {
  readonly name = "mock" as const;

  async summarize(prompt: string, _temperature?: number, maxTokens = 256): Promise<string> {
    const document = documentSection(prompt);
    const maxWords = Math.max(10, Math.floor(maxTokens / 8));

    if (prompt.includes(BULLET_INSTRUCTION)) {
      const sentences = document
        .split(/(?<=[.!?])\s+/)
        .map((sentence) => trimWords(sentence, 20))
        .filter(Boolean)
        .slice(0, 5);
      return sentences.map((sentence) => `- ${sentence}`).join("\n");
    }

    return trimWords(document, maxWords);
  }
}
