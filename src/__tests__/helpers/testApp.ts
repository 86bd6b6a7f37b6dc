import type express from 'express';
import { createApp, AppDependencies, AppSettings } from '../../infra/http/app.js';
import { SessionClaims, SessionTokens } from '../../application/auth/sessionToken.js';
import { InMemoryDatabase } from './inMemoryDatabase.js';

export const TEST_SETTINGS: AppSettings = {
  jwtSecret: 'test-secret',
  jwtExpiresInSeconds: 3600,
  minAdultAge: 18,
  minVerifiedAge: 21,
  apiRateLimit: 1000,
  loginRateLimit: 1000,
};

export interface TestApp {
  app: express.Application;
  db: InMemoryDatabase;
}

export function buildTestApp(
  overrides: Omit<Partial<AppDependencies>, 'settings'> & { settings?: Partial<AppSettings> } = {}
): TestApp {
  const db = new InMemoryDatabase();
  const { settings, ...rest } = overrides;
  const app = createApp({
    userRepo: db.users,
    postRepo: db.posts,
    healthCheck: async () => {},
    docs: false,
    ...rest,
    settings: { ...TEST_SETTINGS, ...settings },
  });
  return { app, db };
}

export function tokenFor(claims: SessionClaims): string {
  return new SessionTokens(TEST_SETTINGS.jwtSecret, TEST_SETTINGS.jwtExpiresInSeconds).issue(claims);
}

export function bearer(claims: SessionClaims): string {
  return `Bearer ${tokenFor(claims)}`;
}
