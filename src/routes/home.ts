/**
 * Home Routes
 *
 * Landing page and health check.
 */

import type { Application, HttpContext } from '../../framework/mod.ts';

const HOME_PAGE = `<!DOCTYPE html>
<html lang="en">
  <head>
    <meta charset="UTF-8" />
    <title>Switchyard</title>
  </head>
  <body>
    <h1>Switchyard</h1>
    <p>Trie-based HTTP routing for Node.js.</p>
    <ul>
      <li><a href="/api/users">/api/users</a></li>
      <li><a href="/health">/health</a></li>
    </ul>
  </body>
</html>
`;

export function registerHomeRoutes(app: Application): void {
  app.get('/', (ctx: HttpContext) => {
    ctx.response.html(HOME_PAGE);
  });

  app.get('/health', (ctx: HttpContext) => {
    ctx.response.json({ status: 'ok', uptime: Math.round(process.uptime()) });
  }, { name: 'health' });
}
