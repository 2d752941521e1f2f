import { err, ok, type Result } from 'neverthrow';
import type { UserStore } from '../api/store/userStore';
import type { User } from '../shared/types';
import type { PasswordHasher } from './passwords';

export type CredentialFailureReason = 'InvalidCredentials' | 'AccountDisabled';

export interface CredentialFailure {
  reason: CredentialFailureReason;
}

/**
 * Checks an identifier (username, or email) and a plaintext password
 * against the stored hash.
 *
 * The password is compared before the active flag is looked at, so a caller
 * only learns that an account is disabled after proving its password. An
 * unknown identifier still pays for one hash comparison.
 */
export class CredentialVerifier {
  private dummyHash: Promise<string> | null = null;

  constructor(
    private readonly users: UserStore,
    private readonly hasher: PasswordHasher,
  ) {}

  async verify(identifier: string, password: string): Promise<Result<User, CredentialFailure>> {
    const user = await this.lookup(identifier);

    if (!user) {
      await this.hasher.verify(password, await this.getDummyHash());
      return err({ reason: 'InvalidCredentials' });
    }

    const matches = await this.hasher.verify(password, user.passwordHash);
    if (!matches) {
      return err({ reason: 'InvalidCredentials' });
    }

    if (!user.isActive) {
      return err({ reason: 'AccountDisabled' });
    }

    return ok(user);
  }

  private async lookup(identifier: string): Promise<User | null> {
    const byUsername = await this.users.findByUsername(identifier);
    if (byUsername) return byUsername;

    if (identifier.includes('@')) {
      return this.users.findByEmail(identifier);
    }
    return null;
  }

  private getDummyHash(): Promise<string> {
    this.dummyHash ??= this.hasher.hash('timing-equalizer-password');
    return this.dummyHash;
  }
}
