import Fastify from 'fastify';
import type { FastifyServerOptions } from 'fastify';
import type { Clock, CredentialVerifier, EntryStore, SchemaValidator } from 'idm-proto';
import { AuthNegotiator, DEFAULT_FILTER_DEPTH_LIMIT, SessionStore, createSchemaValidator } from 'idm-proto';
import { registerErrorHandler } from './middleware/error-handler.js';
import type { RouteContext } from '../features/operation.js';
import { EntryCredentialVerifier } from '../features/auth/entry-credential-verifier.js';
import { registerAuthRoutes } from '../features/auth/routes.js';
import { registerEntryRoutes } from '../features/entries/routes.js';
import { registerRecycleBinRoutes } from '../features/recycle-bin/routes.js';
import { registerWhoamiRoutes } from '../features/whoami/routes.js';

export interface ServerDeps {
  store: EntryStore;
  /** Defaults to the reference validator with the built-in classes. */
  schema?: SchemaValidator;
  /** Defaults to checking credentials against entries in `store`. */
  verifier?: CredentialVerifier;
  clock?: Clock;
  sessionTtlMs?: number;
  filterDepthLimit?: number;
  logger?: FastifyServerOptions['logger'];
}

export function buildServer(deps: ServerDeps) {
  const app = Fastify({ logger: deps.logger ?? true });

  const sessions = new SessionStore({
    ...(deps.clock !== undefined ? { clock: deps.clock } : {}),
    ...(deps.sessionTtlMs !== undefined ? { ttlMs: deps.sessionTtlMs } : {}),
    onExpired: (sessionid, principal) => app.log.info({ sessionid, principal }, 'auth session expired'),
  });
  const negotiator = new AuthNegotiator({
    verifier: deps.verifier ?? new EntryCredentialVerifier(deps.store),
    sessions,
  });
  const ctx: RouteContext = {
    operations: {
      store: deps.store,
      schema: deps.schema ?? createSchemaValidator(),
      filterLimits: { maxDepth: deps.filterDepthLimit ?? DEFAULT_FILTER_DEPTH_LIMIT },
    },
    negotiator,
  };

  registerErrorHandler(app);

  app.addHook('onReady', async () => {
    sessions.startSweeper();
  });
  app.addHook('onClose', async () => {
    sessions.stop();
  });

  app.register(async (instance) => {
    await registerAuthRoutes(instance, ctx);
    await registerWhoamiRoutes(instance, ctx);
    await registerEntryRoutes(instance, ctx);
    await registerRecycleBinRoutes(instance, ctx);
  }, { prefix: '/v1' });

  return app;
}
