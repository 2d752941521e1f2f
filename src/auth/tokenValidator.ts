import * as jose from 'jose';
import { err, ok, type Result } from 'neverthrow';
import { z } from 'zod';
import { toEpochSeconds } from '../shared/clock';
import { ROLES, type TokenClaims, type TokenType } from '../shared/types';
import type { AuthConfig } from './authConfig';

export type TokenFailureReason = 'Malformed' | 'WrongType' | 'Expired' | 'Revoked';

export interface TokenFailure {
  reason: TokenFailureReason;
  detail: string;
}

const DETAILS: Record<TokenFailureReason, string> = {
  Malformed: 'Token is invalid.',
  WrongType: 'Token has wrong type.',
  Expired: 'Token is expired.',
  Revoked: 'Token is blacklisted.',
};

export function tokenFailure(reason: TokenFailureReason): TokenFailure {
  return { reason, detail: DETAILS[reason] };
}

const payloadSchema = z.object({
  sub: z.string().min(1),
  jti: z.string().min(1),
  token_type: z.enum(['access', 'refresh']),
  iat: z.number().int(),
  exp: z.number().int(),
  iss: z.string(),
  aud: z.union([z.string(), z.array(z.string())]),
  role: z.enum(ROLES).optional(),
});

/**
 * Checks, in this order: signature, claim shape and issuer/audience, token
 * type, expiry, and for refresh tokens the revocation store. Nothing from the
 * payload is trusted before the signature has been checked.
 */
export class TokenValidator {
  private readonly secret: Uint8Array;

  constructor(private readonly config: AuthConfig) {
    this.secret = new TextEncoder().encode(config.signingSecret);
  }

  async validate(token: string, expected: TokenType | 'any'): Promise<Result<TokenClaims, TokenFailure>> {
    let verifiedPayload: Uint8Array;
    try {
      // Only HS256 is accepted, which also rules out alg=none
      const { payload } = await jose.compactVerify(token, this.secret, { algorithms: ['HS256'] });
      verifiedPayload = payload;
    } catch (error) {
      if (error instanceof jose.errors.JOSEError) {
        return err(tokenFailure('Malformed'));
      }
      throw error;
    }

    const claims = this.decodeClaims(verifiedPayload);
    if (!claims) {
      return err(tokenFailure('Malformed'));
    }

    if (expected !== 'any' && claims.tokenType !== expected) {
      return err(tokenFailure('WrongType'));
    }

    if (claims.expiresAt <= toEpochSeconds(this.config.now())) {
      return err(tokenFailure('Expired'));
    }

    if (claims.tokenType === 'refresh' && (await this.config.revocations.isRevoked(claims.jti))) {
      return err(tokenFailure('Revoked'));
    }

    return ok(claims);
  }

  private decodeClaims(payload: Uint8Array): TokenClaims | null {
    let raw: unknown;
    try {
      raw = JSON.parse(new TextDecoder().decode(payload));
    } catch {
      return null;
    }

    const parsed = payloadSchema.safeParse(raw);
    if (!parsed.success) return null;

    const p = parsed.data;
    const audiences = Array.isArray(p.aud) ? p.aud : [p.aud];
    if (p.iss !== this.config.issuer || !audiences.includes(this.config.audience)) {
      return null;
    }

    // Access tokens carry the role snapshot used for authorization
    if (p.token_type === 'access' && !p.role) {
      return null;
    }

    return {
      sub: p.sub,
      tokenType: p.token_type,
      jti: p.jti,
      issuedAt: p.iat,
      expiresAt: p.exp,
      role: p.role,
    };
  }
}
