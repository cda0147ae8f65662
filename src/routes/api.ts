/**
 * API Routes
 *
 * A small in-memory user and product API answering with the result envelope.
 */

import { ErrorCode, type Application, type HttpContext, type RouteGroup } from '../../framework/mod.ts';

export interface User {
  name: string;
  email: string;
}

export interface ApiOptions {
  /** Bearer token for the admin routes; admin routes refuse everything when unset */
  adminToken?: string;
  users?: User[];
}

export function registerApiRoutes(app: Application, options: ApiOptions = {}): RouteGroup {
  const users = new Map<string, User>((options.users ?? []).map((user) => [user.name, user]));

  const api = app.group('/api');

  api.before((ctx) => {
    ctx.state.set('startedAt', performance.now());
    return true;
  });

  api.get('/users', (ctx: HttpContext) => {
    ctx.response.success([...users.values()]);
  }, { name: 'users.list' });

  api.get('/users/:name', (ctx: HttpContext) => {
    const user = users.get(ctx.param('name') ?? '');
    if (!user) {
      ctx.response.failure(ErrorCode.ParamError, `unknown user '${ctx.param('name')}'`);
      return;
    }
    ctx.response.success(user);
  }, { name: 'users.show' });

  api.post('/users', async (ctx: HttpContext) => {
    const name = await ctx.request.field('name');
    const email = await ctx.request.field('email');
    if (!name || !email) {
      ctx.response.failure(ErrorCode.ParamError, 'name and email are required');
      return;
    }
    if (users.has(name)) {
      ctx.response.failure(ErrorCode.BizError, `user '${name}' already exists`);
      return;
    }
    const user = { name, email };
    users.set(name, user);
    ctx.response.success(user);
  });

  api.get('/products/{id:[0-9]+}', (ctx: HttpContext) => {
    ctx.response.success({ id: Number(ctx.param('id')) });
  }, { name: 'products.show' });

  const admin = api.group('/admin');
  admin.before((ctx) => {
    const expected = options.adminToken;
    if (expected && ctx.request.header('Authorization') === `Bearer ${expected}`) {
      return true;
    }
    ctx.response.error(401, '401 - Unauthorized');
    return false;
  });

  admin.delete('/users/:name', (ctx: HttpContext) => {
    const name = ctx.param('name') ?? '';
    if (!users.delete(name)) {
      ctx.response.failure(ErrorCode.ParamError, `unknown user '${name}'`);
      return;
    }
    ctx.response.noContent();
  });

  return api;
}
