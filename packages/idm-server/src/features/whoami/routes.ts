import type { FastifyInstance } from 'fastify';
import { encodeWhoamiResponse } from 'idm-proto';
import type { RouteContext } from '../operation.js';
import { unwrap } from '../operation.js';
import { requireToken } from '../../api/middleware/authenticate.js';
import { sendWire } from '../../api/reply.js';
import { whoami } from './whoami.js';

export async function registerWhoamiRoutes(app: FastifyInstance, ctx: RouteContext): Promise<void> {
  app.get('/whoami', async (request, reply) => {
    const token = requireToken(request, ctx.negotiator);
    const res = unwrap(await whoami(ctx.operations, token));
    return sendWire(reply, 200, encodeWhoamiResponse(res));
  });
}
