import type { ConnectionOverrides, ProviderName } from "@docsum/shared";
import { resolveCredentials, type ConfigProvider } from "../config/configProvider.js";
import { ConfigurationError } from "../llm/errors.js";
import { LLMClient } from "../llm/LLMClient.js";
import type { Logger } from "../logger.js";
import type { LLMProvider } from "./LLMProvider.js";
import { MockProvider } from "./MockProvider.js";

export interface ProviderFactory {
  readonly name: ProviderName;
  create(overrides?: ConnectionOverrides): LLMProvider;
}

export function createProviderFactory(options: {
  configProvider: ConfigProvider;
  logger?: Logger;
  env?: NodeJS.ProcessEnv;
}): ProviderFactory {
  const env = options.env ?? process.env;
  const providerName = env.PROVIDER?.toLowerCase() || "nvidia";

  if (providerName === "mock") {
    const mock = new MockProvider();
    return { name: "mock", create: () => mock };
  }

  if (providerName !== "nvidia") {
    throw new ConfigurationError(`Unknown PROVIDER '${providerName}'. Expected 'nvidia' or 'mock'.`);
  }

  return {
    name: "nvidia",
    create: (overrides) =>
      new LLMClient(resolveCredentials(options.configProvider, overrides), { logger: options.logger })
  };
}
