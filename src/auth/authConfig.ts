import type { RevocationStore } from '../api/store/revocationStore';
import type { AppConfig } from '../shared/config';
import { getNow } from '../shared/clock';

/**
 * Everything the token issuer and validator need, passed explicitly so two
 * instances with different keys can live side by side.
 */
export interface AuthConfig {
  signingSecret: string;
  issuer: string;
  audience: string;
  accessTokenTtlSeconds: number;
  refreshTokenTtlSeconds: number;
  revocations: RevocationStore;
  now: () => Date;
}

export function authConfigFrom(appConfig: AppConfig, revocations: RevocationStore): AuthConfig {
  return {
    signingSecret: appConfig.jwt.secret,
    issuer: appConfig.jwt.issuer,
    audience: appConfig.jwt.audience,
    accessTokenTtlSeconds: appConfig.jwt.accessTokenTtlSeconds,
    refreshTokenTtlSeconds: appConfig.jwt.refreshTokenTtlSeconds,
    revocations,
    now: getNow,
  };
}
