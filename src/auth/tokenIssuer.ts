import * as jose from 'jose';
import { v4 as uuidv4 } from 'uuid';
import { toEpochSeconds } from '../shared/clock';
import type { Role, TokenPair, TokenType } from '../shared/types';
import type { AuthConfig } from './authConfig';

export interface TokenSubject {
  id: string;
  role: Role;
}

export class TokenIssuer {
  private readonly secret: Uint8Array;

  constructor(private readonly config: AuthConfig) {
    this.secret = new TextEncoder().encode(config.signingSecret);
  }

  async issuePair(subject: TokenSubject): Promise<TokenPair> {
    const [access, refresh] = await Promise.all([
      this.issueAccess(subject),
      this.issueRefresh(subject.id),
    ]);
    return { access, refresh };
  }

  issueAccess(subject: TokenSubject): Promise<string> {
    return this.sign('access', subject.id, this.config.accessTokenTtlSeconds, { role: subject.role });
  }

  issueRefresh(userId: string): Promise<string> {
    return this.sign('refresh', userId, this.config.refreshTokenTtlSeconds, {});
  }

  private sign(
    tokenType: TokenType,
    subject: string,
    ttlSeconds: number,
    extraClaims: jose.JWTPayload,
  ): Promise<string> {
    const now = toEpochSeconds(this.config.now());

    return new jose.SignJWT({ ...extraClaims, token_type: tokenType })
      .setProtectedHeader({ alg: 'HS256', typ: 'JWT' })
      .setSubject(subject)
      .setJti(uuidv4())
      .setIssuedAt(now)
      .setExpirationTime(now + ttlSeconds)
      .setIssuer(this.config.issuer)
      .setAudience(this.config.audience)
      .sign(this.secret);
  }
}
