export const PROVIDER_TYPES = ['gmail'] as const;

export type ProviderType = (typeof PROVIDER_TYPES)[number];

export const INTEGRATION_STATUSES = ['active', 'expired', 'error', 'disconnected'] as const;

export type IntegrationStatus = (typeof INTEGRATION_STATUSES)[number];

/**
 * Free-form, provider-specific settings (e.g. default Gmail query)
 */
export type IntegrationConfig = Record<string, unknown>;

/**
 * Integration record from database
 */
export interface Integration {
  id: string;
  owner_id: string;
  provider_type: ProviderType;
  status: IntegrationStatus;
  config: IntegrationConfig;
  created_at: Date;
  updated_at: Date;
}

/**
 * Token record from database (encrypted)
 * Both token columns hold TokenCipher output, never plaintext.
 */
export interface IntegrationToken {
  id: string;
  integration_id: string;
  access_token_encrypted: string;
  refresh_token_encrypted: string | null;
  token_type: string;
  scopes: string[];
  expires_at: Date | null;
  created_at: Date;
  updated_at: Date;
}

/**
 * Encrypted token columns written by the callback and refresh flows.
 * A null refresh token keeps whatever refresh token is already stored.
 */
export interface EncryptedTokenWrite {
  access_token_encrypted: string;
  refresh_token_encrypted: string | null;
  token_type: string;
  scopes: string[];
  expires_at: Date | null;
}

/**
 * Tokens as returned by a provider's token endpoint
 */
export interface TokenBundle {
  accessToken: string;
  refreshToken?: string;
  expiresIn?: number;
  tokenType: string;
  scopes: string[];
}

/**
 * Decrypted tokens, only ever held in memory for the duration of a call
 */
export interface DecryptedTokens {
  accessToken: string;
  refreshToken: string | null;
  tokenType: string;
  scopes: string[];
  expiresAt: Date | null;
}

/**
 * Pending authorization request bound to a state token
 */
export interface OAuthStateRecord {
  state: string;
  owner_id: string;
  provider_type: string;
  redirect_uri: string;
  scopes: string[];
  created_at: Date;
}

export interface ProviderDescriptor {
  provider_type: ProviderType;
  name: string;
  description: string;
  actions: string[];
  default_scopes: string[];
}

/**
 * Integration as exposed over HTTP (no token material)
 */
export interface IntegrationSummary {
  id: string;
  provider_type: ProviderType;
  status: IntegrationStatus;
  config: IntegrationConfig;
  created_at: string;
  updated_at: string;
}

export interface ExecuteResponse {
  success: boolean;
  data: unknown;
  error: string | null;
}
