/**
 * External secret store (a cloud secret manager, a vault, the OS keychain).
 * Implementations live outside this package.
 */
export interface SecretStoreClient {
  /** Retrieve a secret, or null if it does not exist */
  getSecret(secretId: string): Promise<string | null>;
  /** Release connections held by the client */
  close(): Promise<void>;
}

export type SecretStoreFactory = () => Promise<SecretStoreClient>;

/**
 * Open a secret store, run `fn` against it, and close it on every exit path.
 */
export async function withSecretStore<T>(
  openStore: SecretStoreFactory,
  fn: (store: SecretStoreClient) => Promise<T>,
): Promise<T> {
  const store = await openStore();
  try {
    return await fn(store);
  } finally {
    try {
      await store.close();
    } catch (error) {
      console.warn(
        `[Secret Store] Failed to close client: ${error instanceof Error ? error.name : typeof error}`,
      );
    }
  }
}
