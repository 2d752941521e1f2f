import { err, ok, type Result } from 'neverthrow';
import type { UserStore } from '../api/store/userStore';
import type { Logger } from '../shared/logger';
import type { AuthContext, TokenClaims, TokenPair, User } from '../shared/types';
import type { AuthConfig } from './authConfig';
import type { CredentialFailureReason, CredentialVerifier } from './credentials';
import { TokenIssuer } from './tokenIssuer';
import { TokenValidator, type TokenFailureReason } from './tokenValidator';

export type SessionFailureReason =
  | CredentialFailureReason
  | TokenFailureReason
  | 'UnknownSubject'
  | 'NotTokenOwner';

export interface SessionFailure {
  reason: SessionFailureReason;
  detail: string;
}

const CREDENTIAL_DETAILS: Record<CredentialFailureReason, string> = {
  InvalidCredentials: 'No active account found with the given credentials.',
  AccountDisabled: 'User account is disabled.',
};

/**
 * Login, refresh, verify and logout over the token issuer, validator and
 * revocation store.
 *
 * Refresh always rotates: the presented refresh token is revoked and a new
 * pair is returned. Revocation doubles as the consumption step, so of two
 * concurrent refreshes with one token only the first succeeds.
 */
export class SessionService {
  readonly issuer: TokenIssuer;
  readonly validator: TokenValidator;

  constructor(
    private readonly config: AuthConfig,
    private readonly users: UserStore,
    private readonly credentials: CredentialVerifier,
    private readonly logger: Logger,
  ) {
    this.issuer = new TokenIssuer(config);
    this.validator = new TokenValidator(config);
  }

  async login(identifier: string, password: string): Promise<Result<{ tokens: TokenPair; user: User }, SessionFailure>> {
    const verified = await this.credentials.verify(identifier, password);
    if (verified.isErr()) {
      const { reason } = verified.error;
      this.logger.info('Login rejected', { reason });
      return err({ reason, detail: CREDENTIAL_DETAILS[reason] });
    }

    const user = verified.value;
    const tokens = await this.issuer.issuePair(user);
    this.logger.info('Login succeeded', { userId: user.id });
    return ok({ tokens, user });
  }

  async refresh(refreshToken: string): Promise<Result<TokenPair, SessionFailure>> {
    const validated = await this.validator.validate(refreshToken, 'refresh');
    if (validated.isErr()) {
      return err(validated.error);
    }
    const claims = validated.value;

    // Role and active flag are re-read, never carried over from the old token
    const user = await this.users.getById(claims.sub);
    if (!user || !user.isActive) {
      return err({ reason: 'UnknownSubject', detail: 'User not found or inactive.' });
    }

    const consumed = await this.config.revocations.revoke(claims.jti, this.config.now());
    if (!consumed) {
      this.logger.warn('Refresh token reused', { userId: user.id, jti: claims.jti });
      return err({ reason: 'Revoked', detail: 'Token is blacklisted.' });
    }

    return ok(await this.issuer.issuePair(user));
  }

  async verify(token: string): Promise<Result<TokenClaims, SessionFailure>> {
    const validated = await this.validator.validate(token, 'any');
    return validated.mapErr((failure): SessionFailure => failure);
  }

  /**
   * Revokes a refresh token. When the caller is authenticated the token must
   * belong to them.
   */
  async logout(refreshToken: string, requester?: AuthContext): Promise<Result<void, SessionFailure>> {
    const validated = await this.validator.validate(refreshToken, 'refresh');
    if (validated.isErr()) {
      return err(validated.error);
    }
    const claims = validated.value;

    if (requester && requester.sub !== claims.sub) {
      return err({ reason: 'NotTokenOwner', detail: 'Token does not belong to the authenticated user.' });
    }

    await this.config.revocations.revoke(claims.jti, this.config.now());
    this.logger.info('Refresh token revoked', { userId: claims.sub, jti: claims.jti });
    return ok(undefined);
  }
}
