import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import assert from "node:assert/strict";
import test from "node:test";

import { ConfigurationError } from "../llm/errors.js";
import {
  ConfigProvider,
  DEFAULT_API_BASE,
  DEFAULT_TIMEOUT_MS,
  EnvSource,
  SecretsFileSource,
  StaticSource,
  createDefaultConfigProvider,
  resolveCredentials
} from "./configProvider.js";

function withTempDir(run: (dir: string) => void): void {
  const dir = mkdtempSync(join(tmpdir(), "docsum-config-"));
  try {
    run(dir);
  } finally {
    rmSync(dir, { recursive: true, force: true });
  }
}

test("ConfigProvider returns the first non-blank value in source order", () => {
  const provider = new ConfigProvider([
    new StaticSource("first", { NVIDIA_MODEL: "  " }),
    new EnvSource({ NVIDIA_MODEL: "env-model", NVIDIA_API_KEY: "env-key" }),
    new StaticSource("defaults", { NVIDIA_MODEL: "default-model" })
  ]);

  assert.equal(provider.get("NVIDIA_MODEL"), "env-model");
  assert.equal(provider.get("NVIDIA_API_KEY"), "env-key");
  assert.equal(provider.get("NVIDIA_API_BASE"), undefined);
});

test("SecretsFileSource reads string values from a JSON object", () => {
  withTempDir((dir) => {
    const path = join(dir, "secrets.json");
    writeFileSync(path, JSON.stringify({ NVIDIA_API_KEY: "secret-key", RETRIES: 3 }), "utf-8");

    const source = new SecretsFileSource(path);

    assert.equal(source.get("NVIDIA_API_KEY"), "secret-key");
    assert.equal(source.get("RETRIES"), undefined);
    assert.equal(source.get("NVIDIA_MODEL"), undefined);
  });
});

test("SecretsFileSource treats a missing file as empty", () => {
  withTempDir((dir) => {
    const source = new SecretsFileSource(join(dir, "absent.json"));

    assert.equal(source.get("NVIDIA_API_KEY"), undefined);
  });
});

test("SecretsFileSource rejects malformed files", () => {
  withTempDir((dir) => {
    const invalid = join(dir, "invalid.json");
    writeFileSync(invalid, "{ not json", "utf-8");
    const list = join(dir, "list.json");
    writeFileSync(list, "[]", "utf-8");

    assert.throws(
      () => new SecretsFileSource(invalid).get("NVIDIA_API_KEY"),
      (error: unknown) => {
        assert.ok(error instanceof ConfigurationError);
        assert.equal(error.message, "Secrets file is not valid JSON");
        assert.ok(error.cause instanceof SyntaxError);
        return true;
      }
    );
    assert.throws(() => new SecretsFileSource(list).get("NVIDIA_API_KEY"), {
      name: "ConfigurationError",
      message: "Secrets file must contain a JSON object"
    });
  });
});

test("createDefaultConfigProvider prefers secrets over env over defaults", () => {
  withTempDir((dir) => {
    const secretsPath = join(dir, "secrets.json");
    writeFileSync(secretsPath, JSON.stringify({ NVIDIA_API_KEY: "secret-key" }), "utf-8");

    const provider = createDefaultConfigProvider({
      SECRETS_FILE: secretsPath,
      NVIDIA_API_KEY: "env-key",
      NVIDIA_MODEL: "env-model"
    });

    assert.deepEqual(provider.sources.map((source) => source.name), ["secrets", "env", "defaults"]);
    assert.deepEqual(resolveCredentials(provider), {
      apiKey: "secret-key",
      apiBase: DEFAULT_API_BASE,
      model: "env-model",
      timeoutMs: DEFAULT_TIMEOUT_MS
    });
  });
});

test("resolveCredentials gives per-call overrides the highest priority", () => {
  const provider = new ConfigProvider([
    new EnvSource({
      NVIDIA_API_KEY: "env-key",
      NVIDIA_API_BASE: "https://env.example.test/v1",
      NVIDIA_MODEL: "env-model",
      NVIDIA_TIMEOUT_MS: "1500"
    })
  ]);

  const credentials = resolveCredentials(provider, { apiKey: "request-key", model: "", apiBase: undefined });

  assert.deepEqual(credentials, {
    apiKey: "request-key",
    apiBase: "https://env.example.test/v1",
    model: "env-model",
    timeoutMs: 1500
  });
});

test("resolveCredentials has no built-in api key or model", () => {
  const credentials = resolveCredentials(new ConfigProvider([new EnvSource({})]));

  assert.equal(credentials.apiKey, "");
  assert.equal(credentials.model, "");
  assert.equal(credentials.apiBase, DEFAULT_API_BASE);
});

test("resolveCredentials refuses a request api base without a request api key", () => {
  const provider = new ConfigProvider([new EnvSource({ NVIDIA_API_KEY: "server-secret", NVIDIA_MODEL: "env-model" })]);

  assert.throws(() => resolveCredentials(provider, { apiBase: "http://127.0.0.1:9" }), {
    name: "ConfigurationError",
    message: "A custom API base URL requires an API key in the same request."
  });
  assert.throws(() => resolveCredentials(provider, { apiBase: "http://127.0.0.1:9", apiKey: "  " }), ConfigurationError);
  assert.equal(resolveCredentials(provider, { apiBase: "  ", model: "request-model" }).apiKey, "server-secret");
  assert.deepEqual(resolveCredentials(provider, { apiBase: "http://127.0.0.1:9", apiKey: "client-key" }), {
    apiKey: "client-key",
    apiBase: "http://127.0.0.1:9",
    model: "env-model",
    timeoutMs: DEFAULT_TIMEOUT_MS
  });
});
