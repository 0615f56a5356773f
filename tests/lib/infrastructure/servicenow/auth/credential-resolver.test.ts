/**
 * Unit Tests for credential resolution and secret store scoping
 */

import { describe, it, expect, vi } from "vitest";
import {
  CredentialResolver,
  EnvironmentCredentialProvider,
  ExplicitCredentialProvider,
  SecretStoreCredentialProvider,
  createDefaultCredentialResolver,
} from "@/infrastructure/servicenow/auth/credential-resolver";
import { withSecretStore, type SecretStoreClient } from "@/infrastructure/servicenow/auth/secret-store";
import { ServiceNowConfigError } from "@/infrastructure/servicenow/errors";

function createStore(getSecret: SecretStoreClient["getSecret"]) {
  const store = {
    getSecret: vi.fn(getSecret),
    close: vi.fn(async () => {}),
  };
  return { store, openStore: vi.fn(async () => store) };
}

describe("withSecretStore", () => {
  it("closes the store after use", async () => {
    const { store, openStore } = createStore(async () => "test-secret");

    await expect(withSecretStore(openStore, (client) => client.getSecret("servicenow-password"))).resolves.toBe(
      "test-secret",
    );
    expect(store.close).toHaveBeenCalledTimes(1);
  });

  it("closes the store when the lookup throws", async () => {
    const { store, openStore } = createStore(async () => {
      throw new Error("permission denied");
    });

    await expect(withSecretStore(openStore, (client) => client.getSecret("servicenow-password"))).rejects.toThrow(
      "permission denied",
    );
    expect(store.close).toHaveBeenCalledTimes(1);
  });

  it("keeps the result when closing fails", async () => {
    const { store, openStore } = createStore(async () => "test-secret");
    store.close.mockRejectedValueOnce(new Error("already closed"));

    await expect(withSecretStore(openStore, (client) => client.getSecret("servicenow-password"))).resolves.toBe(
      "test-secret",
    );
    expect(console.warn).toHaveBeenCalledWith("[Secret Store] Failed to close client: Error");
  });
});

describe("CredentialResolver", () => {
  it("uses the first provider with a non-blank value", async () => {
    const resolver = new CredentialResolver([
      new ExplicitCredentialProvider(undefined),
      new ExplicitCredentialProvider("   "),
      new EnvironmentCredentialProvider("SERVICENOW_PASSWORD", { SERVICENOW_PASSWORD: "test-password" }),
    ]);

    const { secret, source } = await resolver.resolve();

    expect(source).toBe("env:SERVICENOW_PASSWORD");
    expect(secret.reveal()).toBe("test-password");
  });

  it("throws a configuration error when no provider has a value", async () => {
    const resolver = new CredentialResolver([new EnvironmentCredentialProvider("SERVICENOW_PASSWORD", {})]);

    await expect(resolver.resolve()).rejects.toThrow(
      new ServiceNowConfigError(
        "ServiceNow credential not found. Set SERVICENOW_PASSWORD or configure the secret store.",
      ),
    );
  });
});

describe("SecretStoreCredentialProvider", () => {
  it("treats store failures as absent and logs only the error name", async () => {
    const { store, openStore } = createStore(async () => {
      throw new TypeError("vault path secret/data/servicenow is forbidden");
    });
    const provider = new SecretStoreCredentialProvider(openStore, "servicenow-password");

    await expect(provider.resolve()).resolves.toBeNull();
    expect(store.close).toHaveBeenCalledTimes(1);
    expect(console.warn).toHaveBeenCalledWith("[Credentials] Secret store lookup failed: TypeError");
  });
});

describe("createDefaultCredentialResolver", () => {
  it("prefers an explicit value over the store and the environment", async () => {
    const { openStore } = createStore(async () => "store-secret");

    const { source, secret } = await createDefaultCredentialResolver({
      explicit: "explicit-secret",
      secretStore: openStore,
      secretId: "servicenow-password",
      env: { SERVICENOW_PASSWORD: "env-secret" },
    }).resolve();

    expect(source).toBe("explicit");
    expect(secret.reveal()).toBe("explicit-secret");
    expect(openStore).not.toHaveBeenCalled();
  });

  it("reads the configured secret id from the store before the environment", async () => {
    const { store, openStore } = createStore(async () => "store-secret");

    const { source, secret } = await createDefaultCredentialResolver({
      secretStore: openStore,
      secretId: "custom-secret-id",
      env: { SERVICENOW_PASSWORD: "env-secret" },
    }).resolve();

    expect(source).toBe("secret-store");
    expect(secret.reveal()).toBe("store-secret");
    expect(store.getSecret).toHaveBeenCalledWith("custom-secret-id");
    expect(store.close).toHaveBeenCalledTimes(1);
  });

  it("falls back to the environment when the store has no secret", async () => {
    const { openStore } = createStore(async () => null);

    const { source } = await createDefaultCredentialResolver({
      secretStore: openStore,
      secretId: "servicenow-password",
      env: { SERVICENOW_PASSWORD: "env-secret" },
    }).resolve();

    expect(source).toBe("env:SERVICENOW_PASSWORD");
  });
});
