export interface Credentials {
  readonly apiKey: string;
  readonly apiBase: string;
  readonly model: string;
  readonly timeoutMs: number;
}

export type ChatRole = "system" | "user";

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

export interface CompletionRequest {
  model: string;
  messages: [ChatMessage & { role: "system" }, ChatMessage & { role: "user" }];
  temperature: number;
  max_tokens: number;
  stream: false;
}
