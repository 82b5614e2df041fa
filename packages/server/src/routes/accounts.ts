/**
 * Account endpoints
 *
 * POST /register        — create a pending account and mail its confirmation link
 * GET  /confirmemail    — activate a pending account (?id=&code=)
 * GET  /v1/myaccount    — the caller's account           (requireAuth)
 * PUT  /v1/mypassword   — change the caller's password   (requireAuth)
 */

import { Hono } from 'hono';
import {
  MalformedHashError,
  PasswordMismatchError,
  hashPassword,
  validatePasswordComplexity,
  verifyPassword,
  type AuthVariables,
} from '@packroom/auth';
import { createLogger } from '../lib/logger.js';
import { confirmationMail, type MailSender } from '../lib/mailer.js';
import { DuplicateUsernameError, type AccountStore, type AccountView } from '../db/account-store.js';
import { readJsonBody } from '../middleware/validation.js';
import { changePasswordSchema, confirmEmailQuerySchema, registerSchema } from '../schemas/auth.js';

const log = createLogger('AccountRoutes');

export interface AccountRoutesDeps {
  accounts: AccountStore;
  mailer: MailSender;
  /** Base URL for confirmation links */
  publicUrl: string;
}

export function toAccountJson(account: AccountView) {
  return {
    id: account.id,
    username: account.username,
    email: account.email,
    firstname: account.firstname,
    lastname: account.lastname,
    role: account.role,
    status: account.status,
    created_at: account.createdAt.toISOString(),
    updated_at: account.updatedAt.toISOString(),
  };
}

export function accountRoutes(deps: AccountRoutesDeps) {
  const { accounts, mailer } = deps;
  const app = new Hono<{ Variables: AuthVariables }>();

  // ── POST /register ─────────────────────────────────────
  app.post('/register', async (c) => {
    const body = await readJsonBody(c, registerSchema);
    if (!body.ok) {
      if (body.reason === 'invalid_json') return c.json({ error: 'Invalid request' }, 400);
      return c.json({ error: 'Validation failed', details: body.details }, 400);
    }
    const input = body.data;

    const complexity = validatePasswordComplexity(input.password);
    if (!complexity.valid) {
      return c.json({ error: 'Password does not meet requirements', details: complexity.errors }, 400);
    }

    let created: Awaited<ReturnType<AccountStore['register']>>;
    try {
      created = await accounts.register(
        {
          username: input.username,
          email: input.email,
          firstname: input.firstname,
          lastname: input.lastname,
          passwordHash: await hashPassword(input.password),
        },
        { signal: c.req.raw.signal },
      );
    } catch (err) {
      if (err instanceof DuplicateUsernameError) {
        return c.json({ error: 'username already taken' }, 409);
      }
      log.error('Registration failed', err);
      return c.json({ error: 'Internal server error' }, 500);
    }

    const { account, confirmationCode } = created;
    try {
      await mailer.send(confirmationMail(account.email, deps.publicUrl, account.id, confirmationCode));
    } catch (err) {
      log.warn('Confirmation mail could not be sent', { accountId: account.id, error: err });
      return c.json(
        { id: account.id, message: 'registration succeeded but the confirmation email could not be sent' },
        202,
      );
    }

    return c.json(
      { id: account.id, message: 'registration succeeded, please check your email to confirm your account' },
      201,
    );
  });

  // ── GET /confirmemail ──────────────────────────────────
  app.get('/confirmemail', async (c) => {
    const query = confirmEmailQuerySchema.safeParse({ id: c.req.query('id'), code: c.req.query('code') });
    if (!query.success) {
      return c.json({ error: 'Invalid confirmation code or user ID' }, 400);
    }
    try {
      const confirmed = await accounts.confirm(query.data.id, query.data.code, { signal: c.req.raw.signal });
      if (!confirmed) {
        return c.json({ error: 'Invalid confirmation code or user ID' }, 400);
      }
      return c.json({ message: 'email confirmed' });
    } catch (err) {
      log.error('Email confirmation failed', err);
      return c.json({ error: 'Internal server error' }, 500);
    }
  });

  // ── GET /v1/myaccount ──────────────────────────────────
  app.get('/v1/myaccount', async (c) => {
    try {
      const account = await accounts.findById(c.get('accountId'), { signal: c.req.raw.signal });
      if (!account) return c.json({ error: 'Account not found' }, 404);
      return c.json(toAccountJson(account));
    } catch (err) {
      log.error('Account lookup failed', err);
      return c.json({ error: 'Internal server error' }, 500);
    }
  });

  // ── PUT /v1/mypassword ─────────────────────────────────
  app.put('/v1/mypassword', async (c) => {
    const body = await readJsonBody(c, changePasswordSchema);
    if (!body.ok) return c.json({ error: 'Invalid request' }, 400);
    const { current_password: currentPassword, new_password: newPassword } = body.data;
    const accountId = c.get('accountId');
    const signal = c.req.raw.signal;

    const complexity = validatePasswordComplexity(newPassword);
    if (!complexity.valid) {
      return c.json({ error: 'Password does not meet requirements', details: complexity.errors }, 400);
    }

    try {
      const storedHash = await accounts.getPasswordHash(accountId, { signal });
      if (!storedHash) return c.json({ error: 'Account not found' }, 404);

      try {
        await verifyPassword(currentPassword, storedHash);
      } catch (err) {
        if (err instanceof PasswordMismatchError || err instanceof MalformedHashError) {
          return c.json({ error: 'credentials are incorrect' }, 401);
        }
        throw err;
      }

      if (currentPassword === newPassword) {
        return c.json({ error: 'New password must differ from the current one' }, 400);
      }

      await accounts.updatePassword(accountId, await hashPassword(newPassword), { signal });
      return c.json({ message: 'password updated' });
    } catch (err) {
      log.error('Password change failed', { accountId, error: err });
      return c.json({ error: 'Internal server error' }, 500);
    }
  });

  return app;
}
