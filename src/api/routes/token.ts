import { Router, type RequestHandler } from 'express';
import { z } from 'zod';
import type { SessionFailure, SessionService } from '../../auth/sessions';
import { ApiError, AuthenticationError, AuthorizationError } from '../../shared/errors';
import { currentUser, requireAuth } from '../middleware/auth';
import { route } from '../middleware/errors';
import { serializeLoginUser } from '../serializers';
import { parseInput } from '../validation';

const tokenField = () =>
  z
    .string({ required_error: 'This field is required.', invalid_type_error: 'Not a valid string.' })
    .min(1, 'This field may not be blank.');

const obtainSchema = z.object({ username: tokenField(), password: tokenField() });
const refreshSchema = z.object({ refresh: tokenField() });
const verifySchema = z.object({ token: tokenField() });

function toHttpError(failure: SessionFailure): ApiError {
  if (failure.reason === 'NotTokenOwner') {
    return new AuthorizationError(failure.detail);
  }
  return new AuthenticationError(failure.detail);
}

/**
 * Token endpoints read only their body and ignore any Authorization header.
 * Mount ahead of the global bearer middleware; `/logout` is the one route
 * that runs `authenticate`.
 */
export function createTokenRoutes(sessions: SessionService, authenticate: RequestHandler): Router {
  const router = Router();

  // POST /token - obtain an access/refresh pair
  router.post('/token', route(async (req, res) => {
    const { username, password } = parseInput(obtainSchema, req.body);

    const result = await sessions.login(username, password);
    if (result.isErr()) {
      throw toHttpError(result.error);
    }

    const { tokens, user } = result.value;
    res.json({ ...tokens, user: serializeLoginUser(user) });
  }));

  // POST /token/refresh - rotate: new access and refresh, old refresh revoked
  router.post('/token/refresh', route(async (req, res) => {
    const { refresh } = parseInput(refreshSchema, req.body);

    const result = await sessions.refresh(refresh);
    if (result.isErr()) {
      throw toHttpError(result.error);
    }
    res.json(result.value);
  }));

  router.post('/token/verify', route(async (req, res) => {
    const { token } = parseInput(verifySchema, req.body);

    const result = await sessions.verify(token);
    if (result.isErr()) {
      throw toHttpError(result.error);
    }
    res.json({});
  }));

  router.post('/token/blacklist', route(async (req, res) => {
    const { refresh } = parseInput(refreshSchema, req.body);

    const result = await sessions.logout(refresh);
    if (result.isErr()) {
      throw toHttpError(result.error);
    }
    res.json({ detail: 'Token blacklisted.' });
  }));

  // POST /logout - same as blacklist, but for the authenticated owner of the token
  router.post('/logout', authenticate, requireAuth, route(async (req, res) => {
    const { refresh } = parseInput(refreshSchema, req.body);

    const result = await sessions.logout(refresh, currentUser(req));
    if (result.isErr()) {
      throw toHttpError(result.error);
    }
    res.json({ detail: 'Successfully logged out.' });
  }));

  return router;
}
