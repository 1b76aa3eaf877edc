/**
 * Address claim, OpenID Connect Core 1.0 Section 5.1.1
 */
export interface AddressClaim {
  formatted?: string;
  street_address?: string;
  locality?: string;
  region?: string;
  postal_code?: string;
  country?: string;
}

/**
 * A user of a tenant, as seen by the protocol layer. The user store, the
 * pluggable authenticator and journey completion all produce this shape.
 * Claims are released by scope: `profile`, `email`, `address`, `phone`.
 */
export interface User {
  id: string; // `sub`
  tenantId?: string;
  username?: string;

  name?: string;
  givenName?: string;
  familyName?: string;
  nickname?: string;
  preferredUsername?: string;
  picture?: string;
  locale?: string;
  updatedAt?: number;

  email?: string;
  emailVerified?: boolean;

  address?: AddressClaim;

  phoneNumber?: string;
  phoneNumberVerified?: boolean;

  // Authentication context of the current session
  authTime?: number;
  acr?: string;
  amr?: string[];

  /** Extra claims, e.g. collected by a journey */
  claims?: Record<string, string>;
}

/**
 * Claims returned from the UserInfo endpoint
 * OpenID Connect Core 1.0 Section 5.3.2
 */
export interface UserInfoResponse {
  sub: string;
  name?: string;
  given_name?: string;
  family_name?: string;
  nickname?: string;
  preferred_username?: string;
  picture?: string;
  locale?: string;
  updated_at?: number;
  email?: string;
  email_verified?: boolean;
  address?: AddressClaim;
  phone_number?: string;
  phone_number_verified?: boolean;
}
