/**
 * Authorization header providers for the HTTP transport.
 */

import { Buffer } from "node:buffer";
import { ServiceNowAuthError } from "../errors";
import type { SecretValue } from "./secret-value";

export type ServiceNowAuthMode = "basic" | "bearer";

export interface AuthProvider {
  readonly mode: ServiceNowAuthMode;
  getAuthorizationHeader(): Promise<string>;
}

export class BasicAuthProvider implements AuthProvider {
  readonly mode = "basic";

  constructor(
    private readonly username: string,
    private readonly password: SecretValue,
  ) {}

  async getAuthorizationHeader(): Promise<string> {
    const encoded = Buffer.from(`${this.username}:${this.password.reveal()}`).toString("base64");
    return `Basic ${encoded}`;
  }
}

/**
 * Source of per-user OAuth access tokens, keyed by an authorization id
 * (for example the agent runtime's session state).
 */
export interface TokenContext {
  getAccessToken(authId: string): Promise<string | null> | string | null;
}

export class BearerTokenAuthProvider implements AuthProvider {
  readonly mode = "bearer";

  constructor(
    private readonly tokenContext: TokenContext,
    private readonly authId: string,
  ) {}

  async getAuthorizationHeader(): Promise<string> {
    const token = await this.tokenContext.getAccessToken(this.authId);
    if (!token) {
      throw new ServiceNowAuthError(`No access token available for authorization "${this.authId}"`);
    }
    return `Bearer ${token}`;
  }
}

/**
 * Static bearer token, e.g. a ServiceNow API key resolved at startup.
 */
export class StaticTokenAuthProvider implements AuthProvider {
  readonly mode = "bearer";

  constructor(private readonly token: SecretValue) {}

  async getAuthorizationHeader(): Promise<string> {
    return `Bearer ${this.token.reveal()}`;
  }
}
