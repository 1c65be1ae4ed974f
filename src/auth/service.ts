import { logger } from "../config/logger.js";
import type { Credential } from "../domain/entities/credential.js";
import type { CredentialRepository, ListCredentialsOptions } from "../domain/repositories/credential-repository.js";
import type { IssuedKey, KeyIssuer } from "./key-issuer.js";
import type { KeyValidator } from "./key-validator.js";
import type { TokenService } from "./token-service.js";

export interface TokenGrant {
  accessToken: string;
  tokenType: "bearer";
  expiresIn: number;
}

export interface AuthServiceDeps {
  credentials: CredentialRepository;
  issuer: KeyIssuer;
  validator: KeyValidator;
  tokens: TokenService;
}

/** Credential lifecycle operations exposed to the HTTP layer. */
export class AuthService {
  private readonly credentials: CredentialRepository;
  private readonly issuer: KeyIssuer;
  private readonly validator: KeyValidator;
  private readonly tokens: TokenService;

  constructor(deps: AuthServiceDeps) {
    this.credentials = deps.credentials;
    this.issuer = deps.issuer;
    this.validator = deps.validator;
    this.tokens = deps.tokens;
  }

  createApiKey(name: string, description: string | null = null): Promise<IssuedKey> {
    return this.issuer.issue(name, description);
  }

  /** Exchange a plaintext API key for a session token. Null when the key does not validate. */
  async exchangeKey(apiKey: string): Promise<TokenGrant | null> {
    const credential = await this.validator.validate(apiKey);
    if (!credential) return null;
    const minted = await this.tokens.mint(credential.id, credential.name);
    logger.info("Session token issued", { keyId: credential.id, expiresAt: minted.expiresAt.toISOString() });
    return { accessToken: minted.token, tokenType: "bearer", expiresIn: minted.expiresIn };
  }

  listKeys(options?: ListCredentialsOptions): Promise<Credential[]> {
    return this.credentials.list(options);
  }

  async deactivateKey(id: number): Promise<boolean> {
    const found = await this.credentials.deactivate(id);
    if (found) logger.info("API key deactivated", { keyId: id });
    return found;
  }

  async deleteKey(id: number, hard = false): Promise<boolean> {
    const found = await this.credentials.delete(id, hard);
    if (found) logger.info("API key deleted", { keyId: id, hard });
    return found;
  }

  async restoreKey(id: number): Promise<boolean> {
    const restored = await this.credentials.restore(id);
    if (restored) logger.info("API key restored", { keyId: id });
    return restored;
  }
}
