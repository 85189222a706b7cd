import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";
import type { ConnectionOverrides } from "@docsum/shared";
import { ConfigurationError } from "../llm/errors.js";
import type { Credentials } from "../llm/types.js";
import type { Logger } from "../logger.js";

export const CONFIG_KEYS = {
  apiKey: "NVIDIA_API_KEY",
  apiBase: "NVIDIA_API_BASE",
  model: "NVIDIA_MODEL",
  timeoutMs: "NVIDIA_TIMEOUT_MS"
} as const;

export const DEFAULT_API_BASE = "https://integrate.api.nvidia.com/v1";
export const DEFAULT_TIMEOUT_MS = 60_000;

export interface ConfigSource {
  readonly name: string;
  get(key: string): string | undefined;
}

export class StaticSource implements ConfigSource {
  constructor(
    readonly name: string,
    private readonly values: Readonly<Record<string, string | undefined>>
  ) {}

  get(key: string): string | undefined {
    return Object.hasOwn(this.values, key) ? this.values[key] : undefined;
  }
}

export class EnvSource implements ConfigSource {
  readonly name = "env";

  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  get(key: string): string | undefined {
    return this.env[key];
  }
}

/**
 * Flat JSON object of secret values, e.g. `{ "NVIDIA_API_KEY": "..." }`.
 * A missing file behaves as an empty source.
 */
export class SecretsFileSource implements ConfigSource {
  readonly name = "secrets";

  private values?: Readonly<Record<string, string>>;

  constructor(
    readonly filePath: string,
    private readonly logger?: Logger
  ) {}

  get(key: string): string | undefined {
    const values = this.load();
    return Object.hasOwn(values, key) ? values[key] : undefined;
  }

  private load(): Readonly<Record<string, string>> {
    if (this.values) {
      return this.values;
    }
    if (!existsSync(this.filePath)) {
      this.values = {};
      return this.values;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(readFileSync(this.filePath, "utf-8"));
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.logger?.error({ path: this.filePath, reason }, "Secrets file is not valid JSON");
      throw new ConfigurationError("Secrets file is not valid JSON", { cause: error });
    }
    // The path stays in the server log; error messages reach HTTP clients.
    if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
      this.logger?.error({ path: this.filePath }, "Secrets file must contain a JSON object");
      throw new ConfigurationError("Secrets file must contain a JSON object");
    }

    const values: Record<string, string> = {};
    for (const [key, value] of Object.entries(parsed)) {
      if (typeof value === "string") {
        values[key] = value;
      }
    }
    this.values = values;
    return values;
  }
}

/** Walks the sources in order; the first non-blank value wins. */
export class ConfigProvider {
  constructor(readonly sources: readonly ConfigSource[]) {}

  get(key: string): string | undefined {
    for (const source of this.sources) {
      const value = source.get(key)?.trim();
      if (value) {
        return value;
      }
    }
    return undefined;
  }

  withOverrides(overrides: ConfigSource): ConfigProvider {
    return new ConfigProvider([overrides, ...this.sources]);
  }
}

export function createDefaultConfigProvider(
  env: NodeJS.ProcessEnv = process.env,
  logger?: Logger
): ConfigProvider {
  const secretsPath = resolve(env.SECRETS_FILE || "secrets.json");
  return new ConfigProvider([
    new SecretsFileSource(secretsPath, logger),
    new EnvSource(env),
    new StaticSource("defaults", {
      [CONFIG_KEYS.apiBase]: DEFAULT_API_BASE,
      [CONFIG_KEYS.timeoutMs]: String(DEFAULT_TIMEOUT_MS)
    })
  ]);
}

export function overridesSource(overrides: ConnectionOverrides = {}): ConfigSource {
  return new StaticSource("request", {
    [CONFIG_KEYS.apiKey]: overrides.apiKey,
    [CONFIG_KEYS.apiBase]: overrides.apiBase,
    [CONFIG_KEYS.model]: overrides.model
  });
}

/**
 * Resolves values only; validation happens when the client is constructed.
 * A request that redirects the endpoint must bring its own key, so the
 * server's key is never sent to a caller-chosen host.
 */
export function resolveCredentials(provider: ConfigProvider, overrides?: ConnectionOverrides): Credentials {
  if (overrides?.apiBase?.trim() && !overrides.apiKey?.trim()) {
    throw new ConfigurationError("A custom API base URL requires an API key in the same request.");
  }
  const chain = overrides ? provider.withOverrides(overridesSource(overrides)) : provider;
  const rawTimeout = chain.get(CONFIG_KEYS.timeoutMs);
  const timeoutMs = rawTimeout === undefined ? DEFAULT_TIMEOUT_MS : Number(rawTimeout);

  return {
    apiKey: chain.get(CONFIG_KEYS.apiKey) ?? "",
    apiBase: chain.get(CONFIG_KEYS.apiBase) ?? DEFAULT_API_BASE,
    model: chain.get(CONFIG_KEYS.model) ?? "",
    timeoutMs
  };
}
