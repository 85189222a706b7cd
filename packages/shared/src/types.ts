export type SummaryLength = "short" | "medium" | "detailed";
export type SummaryTone = "neutral" | "professional" | "casual";
export type ProviderName = "mock" | "nvidia";

export interface SummaryOptions {
  length: SummaryLength;
  tone: SummaryTone;
  bulletPoints: boolean;
  includeTitle: boolean;
  maxChars: number;
}

export interface ConnectionOverrides {
  apiKey?: string;
  apiBase?: string;
  model?: string;
}

export interface SummarizeRequest {
  text: string;
  options?: Partial<SummaryOptions>;
  connection?: ConnectionOverrides;
  previewPrompt?: boolean;
}

export interface PromptPreviewRequest {
  text: string;
  options?: Partial<SummaryOptions>;
}

export interface UsageInfo {
  provider: ProviderName;
  requestId: string;
  inputChars: number;
  maxTokens: number;
}

export interface SummarizeResponse {
  summary: string;
  prompt?: string;
  usage: UsageInfo;
}

export interface PromptPreviewResponse {
  prompt: string;
  inputChars: number;
}

export interface ErrorResponse {
  error: string;
  code?: string;
  requestId?: string;
  upstreamStatus?: number;
  details?: unknown;
}
