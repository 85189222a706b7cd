import type { SummaryLength, SummaryOptions, SummaryTone } from "@docsum/shared";

export interface PromptRequest extends Partial<SummaryOptions> {
  docText?: string | null;
}

export const DEFAULT_MAX_CHARS = 12_000;
export const TRUNCATION_MARKER = "\n\n[...truncated for demo...]";

export const LENGTH_GUIDANCE = {
  short: "≈120–150 words",
  medium: "≈200–300 words",
  detailed: "≈400–600 words"
} as const satisfies Record<SummaryLength, string>;
export const DEFAULT_LENGTH_GUIDANCE = "≈150 words";

export const TONE_GUIDANCE = {
  neutral: "neutral, objective",
  professional: "concise, business-professional",
  casual: "friendly, plain-language"
} as const satisfies Record<SummaryTone, string>;
export const DEFAULT_TONE_GUIDANCE = "neutral";

export const TITLE_INSTRUCTION = "Start with a single-line **Title** that captures the main topic.";
export const BULLET_INSTRUCTION = "Use bullet points for key takeaways.";
export const FIDELITY_INSTRUCTION = "Avoid speculation. Preserve the original meaning.";
export const UNSUMMARIZABLE_INSTRUCTION = "If the input is not summarizable, say so briefly.";

// Rough completion budgets per target length.
const MAX_TOKENS_BY_LENGTH = {
  short: 256,
  medium: 512,
  detailed: 896
} as const satisfies Record<SummaryLength, number>;

function lookup<T>(table: Readonly<Record<string, T>>, key: string | undefined, fallback: T): T {
  return key !== undefined && Object.hasOwn(table, key) ? table[key] : fallback;
}

export function maxTokensForLength(length?: string): number {
  return lookup<number>(MAX_TOKENS_BY_LENGTH, length, 512);
}

/** Hard cut on code points; not sentence-aware. */
export function truncateDocument(docText: string | null | undefined, maxChars = DEFAULT_MAX_CHARS): string {
  const text = (docText ?? "").trim();
  const chars = Array.from(text);
  if (chars.length <= maxChars) {
    return text;
  }
  return `${chars.slice(0, maxChars).join("")}${TRUNCATION_MARKER}`;
}

export function buildSummarizationPrompt(request: PromptRequest): string {
  const {
    docText,
    length = "short",
    tone = "neutral",
    bulletPoints = true,
    includeTitle = true,
    maxChars = DEFAULT_MAX_CHARS
  } = request;

  const text = truncateDocument(docText, maxChars);

  const formatInstructions: string[] = [];
  if (includeTitle) {
    formatInstructions.push(TITLE_INSTRUCTION);
  }
  if (bulletPoints) {
    formatInstructions.push(BULLET_INSTRUCTION);
  }
  formatInstructions.push(FIDELITY_INSTRUCTION, UNSUMMARIZABLE_INSTRUCTION);

  return [
    "You are a helpful assistant that produces accurate, faithful summaries.",
    "",
    "**Goal**: Summarize the user's document.",
    `**Target length**: ${lookup<string>(LENGTH_GUIDANCE, length, DEFAULT_LENGTH_GUIDANCE)}`,
    `**Tone**: ${lookup<string>(TONE_GUIDANCE, tone, DEFAULT_TONE_GUIDANCE)}`,
    "**Formatting**:",
    `- ${formatInstructions.join(" ")}`,
    "",
    "**Document**:",
    text
  ]
    .join("\n")
    .trim();
}
