import type { Express } from 'express';
import * as jose from 'jose';
import request from 'supertest';
import { v4 as uuidv4 } from 'uuid';
import { createApp } from '../api/index';
import { InMemoryAppointmentStore } from '../api/store/appointmentStore';
import { InMemoryBarbershopStore } from '../api/store/barbershopStore';
import { InMemoryReviewStore } from '../api/store/reviewStore';
import { InMemoryRevocationStore } from '../api/store/revocationStore';
import { InMemoryUserStore } from '../api/store/userStore';
import type { AuthConfig } from '../auth/authConfig';
import { createPasswordHasher } from '../auth/passwords';
import { getNow } from '../shared/clock';
import { createLogger, type Logger, type LogSink } from '../shared/logger';
import type { Role, TokenPair, User } from '../shared/types';

export const TEST_PASSWORD = 'password123';

// bcryptjs' minimum cost keeps the suite fast
export const passwords = createPasswordHasher(4);

export function createAuthConfig(overrides: Partial<AuthConfig> = {}): AuthConfig {
  return {
    signingSecret: `test-secret-${uuidv4()}`,
    issuer: 'barbershop-api',
    audience: 'barbershop-clients',
    accessTokenTtlSeconds: 300,
    refreshTokenTtlSeconds: 7 * 24 * 3600,
    revocations: new InMemoryRevocationStore(),
    now: getNow,
    ...overrides,
  };
}

/** Logger that keeps parsed entries in memory. */
export function createCapturingLogger(): { logger: Logger; entries: Record<string, unknown>[] } {
  const entries: Record<string, unknown>[] = [];
  const sink: LogSink = (_level, line) => {
    entries.push(JSON.parse(line));
  };
  return { logger: createLogger('debug', {}, sink), entries };
}

export interface TestApp {
  app: Express;
  auth: AuthConfig;
  users: InMemoryUserStore;
  barbershops: InMemoryBarbershopStore;
  appointments: InMemoryAppointmentStore;
  reviews: InMemoryReviewStore;
  revocations: InMemoryRevocationStore;
  logEntries: Record<string, unknown>[];
}

export function createTestApp(overrides: Partial<AuthConfig> = {}): TestApp {
  const revocations = new InMemoryRevocationStore();
  const auth = createAuthConfig({ revocations, ...overrides });
  const users = new InMemoryUserStore();
  const barbershops = new InMemoryBarbershopStore();
  const appointments = new InMemoryAppointmentStore();
  const reviews = new InMemoryReviewStore();
  const { logger, entries } = createCapturingLogger();

  const app = createApp({
    auth,
    users,
    barbershops,
    appointments,
    reviews,
    passwords,
    logger,
    slowRequestMs: 2000,
    testMode: true,
  });

  return { app, auth, users, barbershops, appointments, reviews, revocations, logEntries: entries };
}

export interface SeedOptions {
  username?: string;
  email?: string;
  role?: Role;
  isActive?: boolean;
  password?: string;
}

export async function seedUser(users: InMemoryUserStore, options: SeedOptions = {}): Promise<User> {
  const username = options.username ?? `user-${uuidv4().slice(0, 8)}`;
  const result = await users.create({
    username,
    email: options.email ?? `${username}@example.com`,
    passwordHash: await passwords.hash(options.password ?? TEST_PASSWORD),
    firstName: '',
    lastName: '',
    phone: '',
    bio: '',
    role: options.role ?? 'CLIENT',
    isActive: options.isActive ?? true,
  });
  if (result.isErr()) {
    throw new Error(`Could not seed user ${username}: duplicate ${result.error.field}`);
  }
  return result.value;
}

export async function login(app: Express, username: string, password = TEST_PASSWORD): Promise<TokenPair> {
  const res = await request(app).post('/token').send({ username, password });
  if (res.status !== 200) {
    throw new Error(`Login failed for ${username}: ${res.status} ${JSON.stringify(res.body)}`);
  }
  return { access: res.body.access, refresh: res.body.refresh };
}

export const bearer = (token: string) => ({ Authorization: `Bearer ${token}` });

export interface RawTokenOptions {
  sub?: string;
  tokenType?: string;
  role?: string;
  jti?: string;
  iss?: string;
  aud?: string;
  iat?: number;
  exp?: number;
  secret?: string;
}

/** Signs arbitrary claims, for tokens the issuer would never produce. */
export async function createRawToken(auth: AuthConfig, options: RawTokenOptions = {}): Promise<string> {
  const now = Math.floor(getNow().getTime() / 1000);

  const payload: jose.JWTPayload = {
    token_type: options.tokenType ?? 'access',
    ...(options.role !== undefined && { role: options.role }),
  };

  return new jose.SignJWT(payload)
    .setProtectedHeader({ alg: 'HS256' })
    .setSubject(options.sub ?? 'user-1')
    .setJti(options.jti ?? uuidv4())
    .setIssuedAt(options.iat ?? now)
    .setExpirationTime(options.exp ?? now + 300)
    .setIssuer(options.iss ?? auth.issuer)
    .setAudience(options.aud ?? auth.audience)
    .sign(new TextEncoder().encode(options.secret ?? auth.signingSecret));
}

export function createAlgNoneToken(auth: AuthConfig, options: RawTokenOptions = {}): string {
  const now = Math.floor(getNow().getTime() / 1000);

  const header = { alg: 'none', typ: 'JWT' };
  const payload = {
    sub: options.sub ?? 'user-1',
    token_type: options.tokenType ?? 'access',
    role: options.role ?? 'ADMIN',
    jti: options.jti ?? uuidv4(),
    iss: options.iss ?? auth.issuer,
    aud: options.aud ?? auth.audience,
    iat: options.iat ?? now,
    exp: options.exp ?? now + 300,
  };

  const encodedHeader = Buffer.from(JSON.stringify(header)).toString('base64url');
  const encodedPayload = Buffer.from(JSON.stringify(payload)).toString('base64url');

  return `${encodedHeader}.${encodedPayload}.`;
}

export function decodePayload(token: string): Record<string, unknown> {
  return jose.decodeJwt(token);
}
