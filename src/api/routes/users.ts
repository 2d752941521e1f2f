import { Router, type Request } from 'express';
import { z } from 'zod';
import {
  decideAccountAdministration,
  decideRoleAssignment,
  decideUserAction,
  listScopedToSelf,
  requiresCurrentPassword,
  type Requester,
} from '../../auth/accessControl';
import type { PasswordHasher } from '../../auth/passwords';
import { BadRequestError, NotFoundError, ValidationError } from '../../shared/errors';
import type { Logger } from '../../shared/logger';
import { ROLES, type User, type UserChanges } from '../../shared/types';
import { currentUser, requireAuth } from '../middleware/auth';
import { enforce, route } from '../middleware/errors';
import { serializeUser } from '../serializers';
import { applyUserQuery, type UniqueViolation, type UserStore } from '../store/userStore';
import { optionalText, parseInput, password, requiredString } from '../validation';

const username = () =>
  requiredString()
    .max(150, 'Ensure this field has no more than 150 characters.')
    .regex(/^[\w.@+-]+$/, 'Enter a valid username. Letters, digits and @/./+/-/_ only.');

const email = () => requiredString().email('Enter a valid email address.');

const userFields = {
  username: username(),
  email: email(),
  first_name: optionalText(150).optional(),
  last_name: optionalText(150).optional(),
  phone: optionalText(20).optional(),
  bio: optionalText(2000).optional(),
  role: z.enum(ROLES, { invalid_type_error: 'Not a valid choice.' }).optional(),
  is_active: z.boolean({ invalid_type_error: 'Must be a valid boolean.' }).optional(),
};

const createSchema = z.object({ ...userFields, password: password() });
// PUT replaces the profile but leaves the password alone unless given
const replaceSchema = z.object({ ...userFields, password: password().optional() });
const patchSchema = replaceSchema.partial();

const listQuerySchema = z.object({
  role: z.enum(ROLES).optional(),
  search: z.string().optional(),
  ordering: z.enum(['username', '-username', 'date_joined', '-date_joined']).optional(),
});

const changePasswordSchema = z.object({
  old_password: z.string({ invalid_type_error: 'Not a valid string.' }).optional(),
  new_password: password(),
});

const bulkDeleteSchema = z.object({
  ids: z.array(z.string(), { invalid_type_error: 'Expected a list of ids.' }).optional(),
});

type UserInput = z.infer<typeof patchSchema>;

const uniqueMessages: Record<UniqueViolation['field'], string> = {
  username: 'A user with that username already exists.',
  email: 'User with this email already exists.',
};

function optionalRequester(req: Request): Requester | null {
  return req.authContext ? { id: req.authContext.sub, role: req.authContext.role } : null;
}

function requester(req: Request): Requester {
  const auth = currentUser(req);
  return { id: auth.sub, role: auth.role };
}

export interface UserRouteDeps {
  users: UserStore;
  passwords: PasswordHasher;
  logger: Logger;
}

export function createUserRoutes({ users, passwords, logger }: UserRouteDeps): Router {
  const router = Router();

  function toChanges(input: UserInput): UserChanges {
    const changes: UserChanges = {};
    if (input.username !== undefined) changes.username = input.username;
    if (input.email !== undefined) changes.email = input.email;
    if (input.first_name !== undefined) changes.firstName = input.first_name;
    if (input.last_name !== undefined) changes.lastName = input.last_name;
    if (input.phone !== undefined) changes.phone = input.phone;
    if (input.bio !== undefined) changes.bio = input.bio;
    if (input.role !== undefined) changes.role = input.role;
    if (input.is_active !== undefined) changes.isActive = input.is_active;
    return changes;
  }

  async function loadUser(id: string): Promise<User> {
    const user = await users.getById(id);
    if (!user) {
      throw new NotFoundError('User');
    }
    return user;
  }

  async function updateUser(req: Request, input: UserInput): Promise<User> {
    const caller = requester(req);
    const target = await loadUser(req.params.id);

    const changes = toChanges(input);
    const administrative =
      (changes.role !== undefined && changes.role !== target.role) ||
      (changes.isActive !== undefined && changes.isActive !== target.isActive);
    if (administrative) {
      enforce(decideAccountAdministration(caller));
    }

    if (input.password !== undefined) {
      if (requiresCurrentPassword(caller)) {
        throw ValidationError.field('password', 'Use the change_password endpoint to change your password.');
      }
      changes.passwordHash = await passwords.hash(input.password);
    }

    const result = await users.update(target.id, changes);
    if (result.isErr()) {
      throw ValidationError.field(result.error.field, uniqueMessages[result.error.field]);
    }
    if (!result.value) {
      throw new NotFoundError('User');
    }
    return result.value;
  }

  // GET /users - admins see everyone, everyone else only themselves
  router.get('/', requireAuth, route(async (req, res) => {
    const caller = requester(req);
    enforce(decideUserAction(caller, 'list'));
    const query = parseInput(listQuerySchema, req.query);

    if (listScopedToSelf(caller)) {
      const self = await users.getById(caller.id);
      res.json(applyUserQuery(self ? [self] : [], query).map(serializeUser));
      return;
    }

    const all = await users.list(query);
    res.json(all.map(serializeUser));
  }));

  // POST /users - public registration, or account creation by an admin
  router.post('/', route(async (req, res) => {
    const caller = optionalRequester(req);
    enforce(decideUserAction(caller, 'create'));
    const input = parseInput(createSchema, req.body);

    const role = input.role ?? 'CLIENT';
    enforce(decideRoleAssignment(caller, role));
    if (input.is_active === false) {
      enforce(decideAccountAdministration(caller));
    }

    const result = await users.create({
      username: input.username,
      email: input.email,
      passwordHash: await passwords.hash(input.password),
      firstName: input.first_name ?? '',
      lastName: input.last_name ?? '',
      phone: input.phone ?? '',
      bio: input.bio ?? '',
      role,
      isActive: input.is_active ?? true,
    });

    if (result.isErr()) {
      throw ValidationError.field(result.error.field, uniqueMessages[result.error.field]);
    }

    logger.info('User created', { userId: result.value.id, role, createdBy: caller?.id ?? null });
    res.status(201).json(serializeUser(result.value));
  }));

  // POST /users/bulk_delete - admin only
  router.post('/bulk_delete', requireAuth, route(async (req, res) => {
    const caller = requester(req);
    enforce(decideUserAction(caller, 'bulk_delete'));
    const { ids } = parseInput(bulkDeleteSchema, req.body);

    if (!ids || ids.length === 0) {
      throw new BadRequestError('No IDs provided');
    }

    const deleted = await users.deleteMany(ids);
    logger.info('Users bulk deleted', { requested: ids.length, deleted, deletedBy: caller.id });
    res.status(204).end();
  }));

  router.get('/:id', requireAuth, route(async (req, res) => {
    enforce(decideUserAction(requester(req), 'retrieve', req.params.id));
    res.json(serializeUser(await loadUser(req.params.id)));
  }));

  router.put('/:id', requireAuth, route(async (req, res) => {
    enforce(decideUserAction(requester(req), 'update', req.params.id));
    const input = parseInput(replaceSchema, req.body);
    res.json(serializeUser(await updateUser(req, input)));
  }));

  router.patch('/:id', requireAuth, route(async (req, res) => {
    enforce(decideUserAction(requester(req), 'partial_update', req.params.id));
    const input = parseInput(patchSchema, req.body);
    res.json(serializeUser(await updateUser(req, input)));
  }));

  // DELETE /users/:id - permanent
  router.delete('/:id', requireAuth, route(async (req, res) => {
    const caller = requester(req);
    enforce(decideUserAction(caller, 'destroy', req.params.id));
    const target = await loadUser(req.params.id);

    await users.delete(target.id);
    logger.info('User deleted', { userId: target.id, deletedBy: caller.id });
    res.status(204).end();
  }));

  router.post('/:id/change_password', requireAuth, route(async (req, res) => {
    const caller = requester(req);
    enforce(decideUserAction(caller, 'change_password', req.params.id));
    const input = parseInput(changePasswordSchema, req.body);
    const target = await loadUser(req.params.id);

    if (requiresCurrentPassword(caller)) {
      if (!input.old_password) {
        throw ValidationError.field('old_password', 'This field is required.');
      }
      if (!(await passwords.verify(input.old_password, target.passwordHash))) {
        throw ValidationError.field('old_password', 'Old password is incorrect.');
      }
    }

    const result = await users.update(target.id, { passwordHash: await passwords.hash(input.new_password) });
    if (result.isOk() && !result.value) {
      throw new NotFoundError('User');
    }
    logger.info('Password changed', { userId: target.id, changedBy: caller.id });
    res.json({ detail: 'Password changed successfully.' });
  }));

  return router;
}
