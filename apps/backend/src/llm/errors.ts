export type LLMErrorKind = "configuration" | "network" | "http" | "parse" | "unexpected_response_shape";

export abstract class LLMClientError extends Error {
  abstract readonly kind: LLMErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigurationError extends LLMClientError {
  readonly kind = "configuration" as const;
}

export class NetworkError extends LLMClientError {
  readonly kind = "network" as const;

  constructor(message: string, cause: unknown) {
    super(message, { cause });
  }
}

export class HttpError extends LLMClientError {
  readonly kind = "http" as const;

  constructor(
    readonly status: number,
    readonly body: unknown
  ) {
    super(`LLM endpoint returned ${status}. Details: ${describeBody(body)}`);
  }
}

export class ParseError extends LLMClientError {
  readonly kind = "parse" as const;

  constructor(message: string, cause: unknown) {
    super(message, { cause });
  }
}

export class UnexpectedResponseShapeError extends LLMClientError {
  readonly kind = "unexpected_response_shape" as const;

  constructor(readonly body: unknown) {
    super(`Unexpected response shape from LLM endpoint: ${describeBody(body)}`);
  }
}

export type KnownLLMError =
  | ConfigurationError
  | NetworkError
  | HttpError
  | ParseError
  | UnexpectedResponseShapeError;

export function isLLMClientError(error: unknown): error is KnownLLMError {
  return error instanceof LLMClientError;
}

function describeBody(body: unknown): string {
  const text = typeof body === "string" ? body : JSON.stringify(body);
  if (text === undefined) {
    return String(body);
  }
  return text.length > 500 ? `${text.slice(0, 500)}...` : text;
}
