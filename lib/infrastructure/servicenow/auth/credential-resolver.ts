/**
 * Credential Resolution
 *
 * Resolves the ServiceNow secret (password or API token) from an ordered
 * chain of providers. The first non-empty value wins; an empty chain result
 * is a configuration error at startup.
 */

import { ServiceNowConfigError } from "../errors";
import { SecretValue } from "./secret-value";
import { withSecretStore, type SecretStoreFactory } from "./secret-store";

export interface CredentialProvider {
  readonly name: string;
  resolve(): Promise<string | null>;
}

export class ExplicitCredentialProvider implements CredentialProvider {
  readonly name = "explicit";

  constructor(private readonly value: string | undefined) {}

  async resolve(): Promise<string | null> {
    return this.value ?? null;
  }
}

/**
 * Reads the secret from an external store. Store failures count as "absent"
 * so the chain can fall through to the environment.
 */
export class SecretStoreCredentialProvider implements CredentialProvider {
  readonly name = "secret-store";

  constructor(
    private readonly openStore: SecretStoreFactory,
    private readonly secretId: string,
  ) {}

  async resolve(): Promise<string | null> {
    try {
      return await withSecretStore(this.openStore, (store) => store.getSecret(this.secretId));
    } catch (error) {
      // Only the error name: messages from secret stores can echo resource paths.
      console.warn(
        `[Credentials] Secret store lookup failed: ${error instanceof Error ? error.name : typeof error}`,
      );
      return null;
    }
  }
}

export class EnvironmentCredentialProvider implements CredentialProvider {
  readonly name: string;

  constructor(
    private readonly variable: string,
    private readonly env: NodeJS.ProcessEnv = process.env,
  ) {
    this.name = `env:${variable}`;
  }

  async resolve(): Promise<string | null> {
    return this.env[this.variable] ?? null;
  }
}

export interface ResolvedCredential {
  secret: SecretValue;
  source: string;
}

export class CredentialResolver {
  constructor(private readonly providers: readonly CredentialProvider[]) {}

  async resolve(): Promise<ResolvedCredential> {
    for (const provider of this.providers) {
      const value = await provider.resolve();
      if (value !== null && value.trim() !== "") {
        console.log(`[Credentials] ServiceNow credential resolved from ${provider.name}`);
        return { secret: new SecretValue(value), source: provider.name };
      }
    }

    const tried = this.providers.map((provider) => provider.name).join(", ") || "none";
    console.error(`[Credentials] ServiceNow credential not found (tried: ${tried})`);
    throw new ServiceNowConfigError(
      "ServiceNow credential not found. Set SERVICENOW_PASSWORD or configure the secret store.",
    );
  }
}

export interface DefaultCredentialChainOptions {
  explicit?: string;
  secretStore?: SecretStoreFactory;
  secretId: string;
  envVar?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * explicit value → secret store → environment variable
 */
export function createDefaultCredentialResolver(options: DefaultCredentialChainOptions): CredentialResolver {
  const providers: CredentialProvider[] = [new ExplicitCredentialProvider(options.explicit)];
  if (options.secretStore) {
    providers.push(new SecretStoreCredentialProvider(options.secretStore, options.secretId));
  }
  providers.push(
    new EnvironmentCredentialProvider(options.envVar ?? "SERVICENOW_PASSWORD", options.env),
  );
  return new CredentialResolver(providers);
}
