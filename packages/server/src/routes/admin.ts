/**
 * Admin endpoints (mounted behind requireAdmin)
 *
 * GET /accounts              — list every account
 * PUT /accounts/:id/status   — activate, park or deactivate an account
 */

import { Hono } from 'hono';
import type { AuthVariables } from '@packroom/auth';
import { createLogger } from '../lib/logger.js';
import { ClientError } from '../lib/error-sanitizer.js';
import type { AccountStore } from '../db/account-store.js';
import { readJsonBody } from '../middleware/validation.js';
import { accountStatusSchema } from '../schemas/auth.js';
import { toAccountJson } from './accounts.js';

const log = createLogger('AdminRoutes');

export function adminRoutes(accounts: AccountStore) {
  const app = new Hono<{ Variables: AuthVariables }>();

  app.get('/accounts', async (c) => {
    try {
      const rows = await accounts.list({ signal: c.req.raw.signal });
      return c.json({ accounts: rows.map(toAccountJson) });
    } catch (err) {
      log.error('Account listing failed', err);
      return c.json({ error: 'Internal server error' }, 500);
    }
  });

  app.put('/accounts/:id/status', async (c) => {
    const id = Number(c.req.param('id'));
    if (!Number.isSafeInteger(id) || id <= 0) throw new ClientError(400, 'Invalid account id');
    const body = await readJsonBody(c, accountStatusSchema);
    if (!body.ok) return c.json({ error: 'Invalid request' }, 400);

    try {
      const updated = await accounts.setStatus(id, body.data.status, { signal: c.req.raw.signal });
      if (!updated) return c.json({ error: 'Account not found' }, 404);
      log.info('Account status changed', { accountId: id, status: body.data.status, by: c.get('accountId') });
      return c.json({ id, status: body.data.status });
    } catch (err) {
      log.error('Account status change failed', err);
      return c.json({ error: 'Internal server error' }, 500);
    }
  });

  return app;
}
