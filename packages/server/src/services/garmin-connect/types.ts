/**
 * Garmin Connect types
 */

import { z } from "zod";

// =============================================================================
// Tokens
// =============================================================================

export const OAuth1TokenSchema = z.object({
  oauth_token: z.string().min(1),
  oauth_token_secret: z.string().min(1),
  mfa_token: z.string().optional(),
  mfa_expiration_timestamp: z.string().optional(),
  domain: z.string().min(1),
});

/** OAuth2 token as returned by the exchange endpoint */
export const OAuth2TokenResponseSchema = z.object({
  scope: z.string().optional(),
  jti: z.string().optional(),
  token_type: z.string(),
  access_token: z.string().min(1),
  refresh_token: z.string().min(1),
  expires_in: z.number(),
  refresh_token_expires_in: z.number().optional(),
});

/** OAuth2 token with absolute expiry (epoch seconds) added on receipt */
export const OAuth2TokenSchema = OAuth2TokenResponseSchema.extend({
  expires_at: z.number(),
  refresh_token_expires_at: z.number().optional(),
});

export const GarminTokensSchema = z.object({
  oauth1: OAuth1TokenSchema,
  oauth2: OAuth2TokenSchema,
});

export type OAuth1Token = z.infer<typeof OAuth1TokenSchema>;
export type OAuth2TokenResponse = z.infer<typeof OAuth2TokenResponseSchema>;
export type OAuth2Token = z.infer<typeof OAuth2TokenSchema>;
export type GarminTokens = z.infer<typeof GarminTokensSchema>;

/**
 * Parse a stored token blob, or null when it is not a token pair.
 */
export function parseGarminTokens(raw: unknown): GarminTokens | null {
  const result = GarminTokensSchema.safeParse(raw);
  return result.success ? result.data : null;
}

// =============================================================================
// Client contract
// =============================================================================

export interface GarminCredentials {
  email: string;
  password: string;
}

/** One body composition record. Masses in kg, metabolic rates in kcal. */
export interface BodyComposition {
  timestamp: Date;
  weight: number;
  percentFat?: number;
  percentHydration?: number;
  visceralFatMass?: number;
  boneMass?: number;
  muscleMass?: number;
  basalMet?: number;
  activeMet?: number;
  physiqueRating?: number;
  metabolicAge?: number;
  visceralFatRating?: number;
  bmi?: number;
}

export interface RefreshResult {
  tokens: GarminTokens;
  /** True when a new OAuth2 token was exchanged and should be persisted */
  refreshed: boolean;
}

export interface UploadResult {
  uploadId: number | null;
}

/**
 * Remote operations the bridge needs. Implemented by GarminConnectClient;
 * tests substitute a fake.
 *
 * All methods throw AuthenticationError when the service rejects the
 * credentials or tokens, RateLimitError on 429 and RemoteServiceError for
 * any other failure.
 */
export interface BodyCompositionApi {
  /** Full login with account credentials */
  login(credentials: GarminCredentials): Promise<GarminTokens>;
  /** Exchange a new OAuth2 token if the current one has expired */
  refresh(tokens: GarminTokens): Promise<RefreshResult>;
  /** Lightweight check that the service still accepts the tokens */
  verify(tokens: GarminTokens): Promise<void>;
  addBodyComposition(tokens: GarminTokens, record: BodyComposition): Promise<UploadResult>;
}
