import type { FastifyInstance } from 'fastify';
import { decodeReviveRecycledRequest, decodeSearchRecycledRequest, encodeSearchResponse } from 'idm-proto';
import type { RouteContext } from '../operation.js';
import { unwrap } from '../operation.js';
import { requireToken } from '../../api/middleware/authenticate.js';
import { sendWire } from '../../api/reply.js';
import { searchRecycled } from './search-recycled.js';
import { reviveRecycled } from './revive-recycled.js';

export async function registerRecycleBinRoutes(app: FastifyInstance, ctx: RouteContext): Promise<void> {
  const { operations, negotiator } = ctx;

  app.post('/recycle_bin/search', async (request, reply) => {
    const token = requireToken(request, negotiator);
    const req = unwrap(decodeSearchRecycledRequest(request.body, operations.filterLimits));
    const res = unwrap(await searchRecycled(operations, token, req));
    return sendWire(reply, 200, encodeSearchResponse(res));
  });

  app.post('/recycle_bin/revive', async (request, reply) => {
    const token = requireToken(request, negotiator);
    const req = unwrap(decodeReviveRecycledRequest(request.body, operations.filterLimits));
    unwrap(await reviveRecycled(operations, token, req));
    request.log.info({ principal: token.name }, 'entries revived');
    return sendWire(reply, 200, {});
  });
}
