import type { FastifyInstance } from 'fastify';
import { AuthRequestSchema, decodeWith, encodeAuthResponse } from 'idm-proto';
import type { RouteContext } from '../operation.js';
import { unwrap } from '../operation.js';
import { sendWire } from '../../api/reply.js';

export async function registerAuthRoutes(app: FastifyInstance, ctx: RouteContext): Promise<void> {
  // POST /auth: one step of the negotiation; the session id travels in the body
  app.post('/auth', async (request, reply) => {
    const req = unwrap(decodeWith(AuthRequestSchema, request.body));
    const res = unwrap(await ctx.negotiator.step(req.sessionid, req.step));
    request.log.info({ sessionid: res.sessionid, step: req.step.kind, state: res.state.kind }, 'auth step');
    return sendWire(reply, 200, encodeAuthResponse(res));
  });
}
