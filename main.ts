/**
 * Application Entry Point
 *
 * Boot sequence: configuration, logging, routes, listen.
 */

import {
  Logger,
  createRouter,
  loadConfig,
  requestLogging,
  SessionNotFoundError,
  type Middleware,
} from './framework/mod.ts';

const SESSION_COOKIE = 'sid';

async function main(): Promise<void> {
  // 1. Load configuration
  const config = await loadConfig();

  // 2. Logger
  const logger = new Logger({
    level: config.get('logLevel'),
    format: config.get('logFormat'),
    context: { env: config.get('env') },
  });

  // 3. Router and global middleware
  const app = createRouter({ logger, config });
  app.use(requestLogging());
  app.use((ctx) => {
    ctx.setContextValue('startedAt', Date.now());
  });

  // 4. Routes
  app.get('/', (ctx) => {
    ctx.res.type('text/plain; charset=utf-8');
    ctx.write('switchyard is running\n');
  });

  const loadUser: Middleware = (ctx) => {
    try {
      ctx.setContextValue('user', ctx.getSession(SESSION_COOKIE).value);
    } catch (error) {
      if (!(error instanceof SessionNotFoundError)) throw error;
      ctx.setContextValue('user', null);
    }
  };

  const account = app.group('/account', loadUser);
  account.post('/login', (ctx) => {
    const token = ctx.newSession(SESSION_COOKIE);
    ctx.writeJSON({ session: token });
  });
  account.get('/me', (ctx) => {
    const user = ctx.getContextValue('user');
    if (user === null) {
      ctx.res.status(401);
    }
    ctx.writeJSON({ user });
  });
  account.post('/logout', (ctx) => {
    ctx.deleteSession(SESSION_COOKIE);
    ctx.writeJSON({ ok: true });
  });

  // 5. Static files
  app.serveFiles('/static/', './public', '/static');
  app.serveFavicon('./public/favicon.ico');

  // 6. Start server
  await app.listen();
}

main().catch((error: unknown) => {
  console.error('Failed to start:', error);
  process.exit(1);
});
