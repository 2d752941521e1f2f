import type Redis from 'ioredis';
import { storeCall } from './redis';

/**
 * Durable set of revoked refresh-token ids. Absence means "not revoked";
 * expiry is checked independently by the token validator.
 */
export interface RevocationStore {
  isRevoked(jti: string): Promise<boolean>;
  /**
   * Idempotent. Resolves true when this call inserted the entry and false
   * when the jti was already revoked; both count as success.
   */
  revoke(jti: string, revokedAt: Date): Promise<boolean>;
}

export class InMemoryRevocationStore implements RevocationStore {
  private entries: Map<string, number> = new Map();

  async isRevoked(jti: string): Promise<boolean> {
    return this.entries.has(jti);
  }

  async revoke(jti: string, revokedAt: Date): Promise<boolean> {
    if (this.entries.has(jti)) {
      return false;
    }
    this.entries.set(jti, revokedAt.getTime());
    return true;
  }

  revokedAt(jti: string): Date | null {
    const at = this.entries.get(jti);
    return at === undefined ? null : new Date(at);
  }

  reset(): void {
    this.entries.clear();
  }
}

export class RedisRevocationStore implements RevocationStore {
  constructor(private readonly client: Redis) {}

  async isRevoked(jti: string): Promise<boolean> {
    const exists = await storeCall('revocation lookup', () => this.client.exists(`revoked:${jti}`));
    return exists === 1;
  }

  async revoke(jti: string, revokedAt: Date): Promise<boolean> {
    // SET NX is the linearization point between concurrent refresh and logout
    const result = await storeCall('revocation write', () =>
      this.client.set(`revoked:${jti}`, revokedAt.toISOString(), 'NX'),
    );
    return result === 'OK';
  }
}
