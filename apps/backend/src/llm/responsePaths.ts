/**
 * Ordered locations of the completion text in a chat-completion reply.
 * Backends behind the same OpenAI-compatible surface disagree on nesting,
 * so each matcher is tried in turn and the first non-empty string wins,
 * trimmed. A whitespace-only winner therefore yields "".
 */
export type PathSegment = string | number;

export interface ResponsePathMatcher {
  readonly label: string;
  match(body: unknown): string | undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function getNested(value: unknown, path: readonly PathSegment[]): unknown {
  let current = value;
  for (const segment of path) {
    if (typeof segment === "number") {
      if (!Array.isArray(current) || segment < 0 || segment >= current.length) {
        return undefined;
      }
      current = current[segment];
    } else {
      if (!isRecord(current) || !Object.hasOwn(current, segment)) {
        return undefined;
      }
      current = current[segment];
    }
  }
  return current;
}

function pathMatcher(...path: PathSegment[]): ResponsePathMatcher {
  return {
    label: path.map((segment) => (typeof segment === "number" ? `[${segment}]` : `.${segment}`)).join("").slice(1),
    match(body) {
      const found = getNested(body, path);
      if (typeof found !== "string" || found.length === 0) {
        return undefined;
      }
      return found.trim();
    }
  };
}

export const RESPONSE_PATHS: readonly ResponsePathMatcher[] = [
  pathMatcher("choices", 0, "message", "content"),
  pathMatcher("choices", 0, "text"),
  pathMatcher("output_text"),
  pathMatcher("text")
];

export function extractCompletionText(
  body: unknown,
  matchers: readonly ResponsePathMatcher[] = RESPONSE_PATHS
): string | undefined {
  for (const matcher of matchers) {
    const text = matcher.match(body);
    if (text !== undefined) {
      return text;
    }
  }
  return undefined;
}
