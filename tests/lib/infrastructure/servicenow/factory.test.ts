/**
 * Unit Tests for the CRUD client factory
 */

import { describe, it, expect, vi, type MockInstance } from "vitest";
import { http, HttpResponse } from "msw";
import { server } from "@tests/setup";
import { INSTANCE_URL, TABLE_URL, createTestSettings, noSleep } from "@tests/helpers/servicenow";
import { createAuthProvider, createCrudClient, withCrudClient } from "@/infrastructure/servicenow/factory";
import type { ServiceNowCrudClient } from "@/infrastructure/servicenow/client/crud-client";
import { SecretValue } from "@/infrastructure/servicenow/auth/secret-value";
import { ServiceNowConfigError } from "@/infrastructure/servicenow/errors";

describe("createAuthProvider", () => {
  it("uses basic auth with the resolved password", () => {
    expect(createAuthProvider(createTestSettings()).mode).toBe("basic");
  });

  it("requires a credential for basic auth", () => {
    const settings = { ...createTestSettings(), credential: undefined };
    expect(() => createAuthProvider(settings)).toThrow(ServiceNowConfigError);
  });

  it("uses the token context in bearer mode with an authorization id", async () => {
    const settings = { ...createTestSettings({ authMode: "bearer", authId: "servicenow-oauth" }), credential: undefined };
    const provider = createAuthProvider(settings, { getAccessToken: () => "test-access-token" });

    await expect(provider.getAuthorizationHeader()).resolves.toBe("Bearer test-access-token");
  });

  it("rejects bearer mode with an authorization id but no token context", () => {
    const settings = createTestSettings({ authMode: "bearer", authId: "servicenow-oauth" });
    expect(() => createAuthProvider(settings)).toThrow(
      'Bearer authentication with authorization "servicenow-oauth" requires a token context',
    );
  });

  it("uses the credential as a static token in bearer mode without an authorization id", async () => {
    const settings = { ...createTestSettings({ authMode: "bearer" }), credential: new SecretValue("test-api-token") };

    await expect(createAuthProvider(settings).getAuthorizationHeader()).resolves.toBe("Bearer test-api-token");
  });
});

describe("createCrudClient", () => {
  it("wires settings into the client", () => {
    const client = createCrudClient({
      settings: createTestSettings({ instanceUrl: `${INSTANCE_URL}/`, allowedTables: ["incident"] }),
    });

    expect(client.getInstanceUrl()).toBe(INSTANCE_URL);
    expect(client.getAllowedTables()).toEqual(["incident"]);
  });
});

describe("withCrudClient", () => {
  it("closes the client after the callback returns", async () => {
    server.use(http.get(TABLE_URL, () => HttpResponse.json({ result: [] })));
    const clients: ServiceNowCrudClient[] = [];

    const count = await withCrudClient({ settings: createTestSettings(), sleep: noSleep }, async (client) => {
      clients.push(client);
      const response = await client.read("incident");
      return response.success ? response.count : -1;
    });

    expect(count).toBe(0);
    const afterClose = await clients[0].read("incident");
    expect(afterClose).toMatchObject({
      success: false,
      errorType: "connection_error",
      error: "ServiceNow client was closed",
    });
  });

  it("closes the client when the callback throws", async () => {
    const closeSpies: MockInstance<() => Promise<void>>[] = [];

    await expect(
      withCrudClient({ settings: createTestSettings(), sleep: noSleep }, async (client) => {
        closeSpies.push(vi.spyOn(client, "close"));
        throw new Error("handler failed");
      }),
    ).rejects.toThrow("handler failed");
    expect(closeSpies[0]).toHaveBeenCalledTimes(1);
  });
});
